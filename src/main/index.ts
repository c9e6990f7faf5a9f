#!/usr/bin/env node
import { LoudnessApp } from './LoudnessApp';

const app = new LoudnessApp();

app
  .run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    // eslint-disable-next-line no-console -- Logging critical failures is necessary for troubleshooting.
    console.error('Failed to run loudness-qc', error);
    process.exitCode = 1;
  });
