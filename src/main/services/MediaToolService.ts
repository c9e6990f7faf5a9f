import { spawn } from 'node:child_process';

export type MediaTool = 'ffmpeg' | 'ffprobe';

/**
 * Outcome of a single external tool invocation.
 */
export interface ToolRunResult {
  /** Process exit code, null when the process was killed or never started. */
  exitCode: number | null;
  /** Lines written to stdout only. */
  stdout: string[];
  /** Lines from stdout and stderr, merged in the order the chunks arrived. */
  output: string[];
  /** True when the invocation was killed after exceeding the timeout. */
  timedOut: boolean;
}

/**
 * Seam between the analysis services and the media tools, replaced by a fake in tests.
 */
export interface MediaToolRunner {
  run(tool: MediaTool, args: string[]): Promise<ToolRunResult>;
}

/**
 * Raised when ffmpeg or ffprobe cannot be started at all.
 */
export class MediaToolNotFoundError extends Error {
  public constructor(
    public readonly tool: MediaTool,
    public readonly binary: string,
    cause?: unknown
  ) {
    super(`Unable to run ${tool} (${binary}). Install FFmpeg or point --${tool} at the binary.`, { cause });
    this.name = 'MediaToolNotFoundError';
  }
}

export interface MediaToolOptions {
  /** Path or command name of the ffmpeg binary. */
  ffmpegPath: string;
  /** Path or command name of the ffprobe binary. */
  ffprobePath: string;
  /** Kill an invocation after this many milliseconds. */
  timeoutMs: number;
}

/**
 * Splits buffered process output into lines, dropping the trailing empty line.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Runs ffmpeg/ffprobe as child processes with a per-invocation timeout.
 */
export class MediaToolService implements MediaToolRunner {
  public constructor(private readonly options: MediaToolOptions) {}

  /**
   * Confirms both binaries can be started. Throws {@link MediaToolNotFoundError} otherwise.
   */
  public async verifyAvailable(): Promise<void> {
    for (const tool of ['ffmpeg', 'ffprobe'] as const) {
      try {
        const result = await this.run(tool, ['-version']);
        if (result.exitCode !== 0) {
          throw new Error(`${tool} -version exited with code ${String(result.exitCode)}`);
        }
      } catch (error) {
        throw new MediaToolNotFoundError(tool, this.resolveBinary(tool), error);
      }
    }
  }

  /**
   * Runs a tool to completion. Rejects only when the process cannot be spawned; a non-zero exit
   * or a timeout is reported through the result.
   */
  public run(tool: MediaTool, args: string[]): Promise<ToolRunResult> {
    const binary = this.resolveBinary(tool);
    return new Promise<ToolRunResult>((resolve, reject) => {
      const stdoutChunks: Buffer[] = [];
      const mergedChunks: Buffer[] = [];
      let timedOut = false;
      let settled = false;

      const child = spawn(binary, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true
      });

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, this.options.timeoutMs);

      child.stdout.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk);
        mergedChunks.push(chunk);
      });
      child.stderr.on('data', (chunk: Buffer) => {
        mergedChunks.push(chunk);
      });

      child.on('error', (error) => {
        clearTimeout(timer);
        if (!settled) {
          settled = true;
          reject(error);
        }
      });

      child.on('close', (code) => {
        clearTimeout(timer);
        if (settled) {
          return;
        }
        settled = true;
        resolve({
          exitCode: code,
          stdout: splitLines(Buffer.concat(stdoutChunks).toString('utf-8')),
          output: splitLines(Buffer.concat(mergedChunks).toString('utf-8')),
          timedOut
        });
      });
    });
  }

  private resolveBinary(tool: MediaTool): string {
    return tool === 'ffmpeg' ? this.options.ffmpegPath : this.options.ffprobePath;
  }
}
