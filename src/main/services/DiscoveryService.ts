import fs from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import type { AnalysisSettings, DiscoveryFailureEntry, DiscoveryResult } from '../../shared/models';
import { errorMessage } from '../../shared/format';

/** Prefix marking an argument as a file containing one path per line. */
export const LIST_FILE_MARKER = '@';

/** Separator for several paths packed into one argument. */
export const PATH_SEPARATOR = ';';

/**
 * Expands command line inputs into the list of paths to scan. `@list.txt` reads one path per
 * line (blank lines and `#` comments are ignored), `a.wav;b.wav` is split, duplicates are
 * dropped and an empty input falls back to `cwd`.
 */
export async function expandArguments(args: readonly string[], cwd: string = process.cwd()): Promise<string[]> {
  const collected: string[] = [];
  for (const arg of args) {
    if (arg.startsWith(LIST_FILE_MARKER) && arg.length > LIST_FILE_MARKER.length) {
      const listPath = path.resolve(cwd, arg.slice(LIST_FILE_MARKER.length));
      const content = await fs.readFile(listPath, 'utf-8');
      for (const line of content.split(/\r?\n/)) {
        const trimmed = line.trim();
        if (trimmed.length > 0 && !trimmed.startsWith('#')) {
          collected.push(...splitPathArgument(trimmed));
        }
      }
      continue;
    }
    collected.push(...splitPathArgument(arg));
  }

  const unique = Array.from(new Set(collected));
  return unique.length > 0 ? unique : [cwd];
}

function splitPathArgument(value: string): string[] {
  return value
    .split(PATH_SEPARATOR)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Finds supported audio files below the given files and directories.
 */
export class DiscoveryService {
  private readonly extensions: ReadonlySet<string>;

  public constructor(private readonly settings: Pick<AnalysisSettings, 'extensions' | 'recursive'>) {
    this.extensions = new Set(settings.extensions.map((extension) => extension.toLowerCase()));
  }

  public isSupported(filePath: string): boolean {
    return this.extensions.has(path.extname(filePath).toLowerCase());
  }

  /**
   * Resolves inputs relative to `cwd`, walks directories and returns sorted, unique absolute paths.
   */
  public async discover(inputs: readonly string[], cwd: string = process.cwd()): Promise<DiscoveryResult> {
    const discovered = new Set<string>();
    const failures: DiscoveryFailureEntry[] = [];

    for (const input of inputs) {
      const absoluteSource = path.resolve(cwd, input);
      try {
        const stats = await fs.stat(absoluteSource);
        if (stats.isDirectory()) {
          const matches = await fg(this.buildPatterns(), {
            cwd: absoluteSource,
            absolute: true,
            onlyFiles: true,
            suppressErrors: true,
            caseSensitiveMatch: false,
            dot: true
          });
          for (const match of matches) {
            discovered.add(path.resolve(match));
          }
        } else if (stats.isFile()) {
          if (this.isSupported(absoluteSource)) {
            discovered.add(absoluteSource);
          } else {
            failures.push({ path: absoluteSource, message: 'Unsupported file extension.' });
          }
        } else {
          failures.push({ path: absoluteSource, message: 'Unsupported file system entry.' });
        }
      } catch (error) {
        failures.push({ path: absoluteSource, message: errorMessage(error) });
      }
    }

    const files = Array.from(discovered).sort((a, b) => a.localeCompare(b, undefined, { sensitivity: 'base' }));
    return { files, failures };
  }

  private buildPatterns(): string[] {
    const prefix = this.settings.recursive ? '**/' : '';
    return Array.from(this.extensions, (extension) => `${prefix}*${extension}`);
  }
}
