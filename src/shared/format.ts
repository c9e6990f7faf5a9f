/**
 * Rounds to a fixed number of decimals, returning null for absent or non-finite input.
 */
export function roundTo(value: number | null, decimals = 2): number | null {
  if (value === null || !Number.isFinite(value)) {
    return null;
  }
  const factor = 10 ** decimals;
  const rounded = Math.round(value * factor) / factor;
  // Avoid printing -0 for values like -0.001.
  return Object.is(rounded, -0) ? 0 : rounded;
}

/**
 * Formats seconds as `mm:ss`; minutes are not wrapped into hours.
 */
export function formatDuration(seconds: number | null): string {
  if (seconds === null || !Number.isFinite(seconds) || seconds < 0) {
    return '';
  }
  const whole = Math.floor(seconds);
  const minutes = Math.floor(whole / 60);
  const remainder = whole % 60;
  return `${String(minutes).padStart(2, '0')}:${String(remainder).padStart(2, '0')}`;
}

/**
 * Formats a decibel/LU value with two decimals, or an empty string when unknown.
 */
export function formatDecibels(value: number | null): string {
  return value === null ? '' : value.toFixed(2);
}

/**
 * Timestamp safe for file names, e.g. `20240131_154502`.
 */
export function fileTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Parses a loosely typed numeric value (ffprobe and loudnorm emit numbers as strings).
 */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Normalises unknown thrown values into a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
