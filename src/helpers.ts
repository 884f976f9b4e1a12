import type { Scaled } from './types';

/**
 * Fixed-point rendering used by every trace line, e.g. `formatFixed(0.0016, 7, 4)`
 * gives `' 0.0016'`. An invalid value renders as `N/A` right-aligned to `width`.
 */
export function formatFixed(value: Scaled, width: number, precision: number): string {
  if (value === null) return 'N/A'.padStart(width);
  return value.toFixed(precision).padStart(width);
}

/** Right-aligned decimal integer. */
export function formatInt(value: number, width: number): string {
  return String(value).padStart(width);
}

/** Zero-padded decimal integer. */
export function formatZeroPadded(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/** Lower-case hex, zero-padded to `width` digits. */
export function formatHex(value: number, width = 2): string {
  return value.toString(16).padStart(width, '0');
}

/** Positions of the set flags, offset by `base` (1 for satellite ids). */
export function setPositions(flags: readonly boolean[], base = 0): number[] {
  const positions: number[] = [];
  flags.forEach((flag, i) => {
    if (flag) positions.push(i + base);
  });
  return positions;
}

export function bytesToHex(data: Uint8Array): string {
  return Array.from(data, byte => formatHex(byte)).join('');
}
