import { settingsOverrideSchema, type SettingsOverride } from '../shared/settings';

/**
 * Parsed command line.
 */
export interface CliOptions {
  /** Files, directories, `@list` files or `;`-joined path lists. */
  inputs: string[];
  /** Settings given on the command line. */
  overrides: SettingsOverride;
  outputDir: string | null;
  ffmpegPath: string | null;
  ffprobePath: string | null;
  dbPath: string | null;
  saveSettings: boolean;
  resetSettings: boolean;
  /** Number of history entries to print, or null when history was not requested. */
  history: number | null;
  help: boolean;
}

/**
 * Raised for malformed command lines; maps to exit code 2.
 */
export class CliUsageError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `Usage: loudness-qc [options] [paths...]

Measures integrated loudness, true peak, loudness range and sample peak of audio files with
ffmpeg and writes CSV and HTML reports. Paths may be files or directories; "@list.txt" reads
one path per line and "a.wav;b.wav" passes several paths in one argument. Without paths the
current directory is scanned.

Thresholds:
  --target <lufs>        Integrated loudness target (default -14)
  --tolerance <lu>       Accepted distance from the target (default 1)
  --ceiling <dbtp>       True peak ceiling (default -1)
  --lra-target <lu>      Loudness range target passed to loudnorm (default 8)
  --rates <list>         Allowed sample rates, comma separated (default 44100,48000)

Scanning:
  --ext <list>           Supported extensions, comma separated
  --recursive            Scan directories recursively (default)
  --no-recursive         Only scan the top level of each directory
  --timeout <seconds>    Kill an ffmpeg/ffprobe call after this long (default 600)
  --jobs <n>             Files analysed in parallel (default 1)

Output:
  --out <dir>            Report directory (default: current directory)
  --no-debug             Do not write debug dumps for failed analyses
  --debug                Write debug dumps for failed analyses (default)

Environment:
  --ffmpeg <path>        ffmpeg binary (or LOUDNESS_QC_FFMPEG)
  --ffprobe <path>       ffprobe binary (or LOUDNESS_QC_FFPROBE)
  --db <path>            Settings and history database (or LOUDNESS_QC_DB)
  --save-settings        Store the threshold/scanning options given as new defaults and exit
  --reset-settings       Forget stored defaults and exit
  --history [n]          Print the last n runs (default 10) and exit
  -h, --help             Show this help
`;

const VALUE_FLAGS = new Set([
  '--target',
  '--tolerance',
  '--ceiling',
  '--lra-target',
  '--rates',
  '--ext',
  '--timeout',
  '--jobs',
  '--out',
  '--ffmpeg',
  '--ffprobe',
  '--db'
]);

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim().length === 0 || !Number.isFinite(value)) {
    throw new CliUsageError(`${flag} expects a number, got "${raw}"`);
  }
  return value;
}

function parseList(raw: string): string[] {
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Parses `argv` (without the node binary and script path).
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    inputs: [],
    overrides: {},
    outputDir: null,
    ffmpegPath: null,
    ffprobePath: null,
    dbPath: null,
    saveSettings: false,
    resetSettings: false,
    history: null,
    help: false
  };
  const raw: Record<string, unknown> = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === '--') {
      options.inputs.push(...argv.slice(index + 1));
      break;
    }
    if (!arg.startsWith('-') || arg === '-') {
      options.inputs.push(arg);
      continue;
    }

    const equalsIndex = arg.indexOf('=');
    const flag = equalsIndex === -1 ? arg : arg.slice(0, equalsIndex);
    let value: string | null = equalsIndex === -1 ? null : arg.slice(equalsIndex + 1);
    if (VALUE_FLAGS.has(flag) && value === null) {
      if (index + 1 >= argv.length) {
        throw new CliUsageError(`${flag} expects a value`);
      }
      index += 1;
      value = argv[index];
    }

    switch (flag) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--target':
        raw.targetLufs = parseNumber(flag, value ?? '');
        break;
      case '--tolerance':
        raw.toleranceLu = parseNumber(flag, value ?? '');
        break;
      case '--ceiling':
        raw.truePeakCeilingDbtp = parseNumber(flag, value ?? '');
        break;
      case '--lra-target':
        raw.loudnessRangeTarget = parseNumber(flag, value ?? '');
        break;
      case '--rates':
        raw.allowedSampleRates = parseList(value ?? '').map((entry) => parseNumber(flag, entry));
        break;
      case '--ext':
        raw.extensions = parseList(value ?? '');
        break;
      case '--timeout':
        raw.timeoutMs = Math.round(parseNumber(flag, value ?? '') * 1000);
        break;
      case '--jobs':
        raw.concurrency = parseNumber(flag, value ?? '');
        break;
      case '--recursive':
        raw.recursive = true;
        break;
      case '--no-recursive':
        raw.recursive = false;
        break;
      case '--debug':
        raw.debugDumps = true;
        break;
      case '--no-debug':
        raw.debugDumps = false;
        break;
      case '--out':
        options.outputDir = value;
        break;
      case '--ffmpeg':
        options.ffmpegPath = value;
        break;
      case '--ffprobe':
        options.ffprobePath = value;
        break;
      case '--db':
        options.dbPath = value;
        break;
      case '--save-settings':
        options.saveSettings = true;
        break;
      case '--reset-settings':
        options.resetSettings = true;
        break;
      case '--history': {
        const next = value ?? argv[index + 1];
        if (next !== undefined && /^\d+$/.test(next)) {
          options.history = Number(next);
          if (value === null) {
            index += 1;
          }
        } else if (value !== null) {
          throw new CliUsageError(`--history expects a count, got "${value}"`);
        } else {
          options.history = 10;
        }
        break;
      }
      default:
        throw new CliUsageError(`Unknown option ${flag}`);
    }
  }

  const parsed = settingsOverrideSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CliUsageError(`Invalid value for ${issue.path.join('.')}: ${issue.message}`);
  }
  options.overrides = parsed.data;
  return options;
}
