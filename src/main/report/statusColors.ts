import type { CSSProperties } from 'react';
import type { Verdict } from '../../shared/models';

/**
 * Color accents for a verdict cell.
 */
export interface StatusSwatch {
  background: string;
  text: string;
}

const STATUS_SWATCHES: Record<Verdict, StatusSwatch> = {
  READY: { background: 'hsl(134, 45%, 28%)', text: 'hsl(134, 60%, 92%)' },
  ADJUST: { background: 'hsl(38, 85%, 40%)', text: 'hsl(38, 100%, 95%)' },
  ERROR: { background: 'hsl(356, 65%, 40%)', text: 'hsl(356, 100%, 95%)' }
};

export function statusSwatch(verdict: Verdict): StatusSwatch {
  return STATUS_SWATCHES[verdict];
}

/**
 * Inline style for a table cell showing the given verdict.
 */
export function statusCellStyle(verdict: Verdict): CSSProperties {
  const swatch = statusSwatch(verdict);
  return {
    backgroundColor: swatch.background,
    color: swatch.text,
    fontWeight: 600,
    textAlign: 'center'
  };
}
