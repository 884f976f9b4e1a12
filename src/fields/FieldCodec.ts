import type { BitCursor } from '../BitCursor';
import { UnknownEnumerationError } from '../errors';
import { INVALID, type SatSys, type Scaled } from '../types';
import signalTable from './signals.json';

/** A signed field whose raw value is multiplied by `scale` into physical units. */
export interface ScaledField {
  readonly width: number;
  readonly scale: number;
}

/**
 * Signed correction fields that reserve their most-negative value as
 * "not available". Units follow the message: metres, TECU, cycles.
 */
export const FIELDS = {
  cssrOrbitRadial: { width: 15, scale: 0.0016 },
  cssrOrbitAlong: { width: 13, scale: 0.0064 },
  cssrOrbitCross: { width: 13, scale: 0.0064 },
  cssrClock: { width: 15, scale: 0.0016 },
  cssrCodeBias: { width: 11, scale: 0.02 },
  cssrPhaseBias: { width: 15, scale: 0.001 },

  stecC00: { width: 14, scale: 0.05 },
  stecC01: { width: 12, scale: 0.02 },
  stecC10: { width: 12, scale: 0.02 },
  stecC11: { width: 10, scale: 0.02 },
  stecC02: { width: 8, scale: 0.005 },
  stecC20: { width: 8, scale: 0.005 },

  gridHydrostatic: { width: 9, scale: 0.004 },
  gridWet: { width: 8, scale: 0.004 },
  gridStecResidualShort: { width: 7, scale: 0.04 },
  gridStecResidualLong: { width: 16, scale: 0.04 },

  tropT00: { width: 9, scale: 0.004 },
  tropT01: { width: 7, scale: 0.002 },
  tropT10: { width: 7, scale: 0.002 },
  tropT11: { width: 7, scale: 0.001 },
  tropResidualShort: { width: 6, scale: 0.004 },
  tropResidualLong: { width: 8, scale: 0.004 },

  stecResidualSize0: { width: 4, scale: 0.04 },
  stecResidualSize1: { width: 4, scale: 0.12 },
  stecResidualSize2: { width: 5, scale: 0.16 },
  stecResidualSize3: { width: 7, scale: 0.24 },

  hasOrbitRadial: { width: 13, scale: 0.0025 },
  hasOrbitAlong: { width: 12, scale: 0.008 },
  hasOrbitCross: { width: 12, scale: 0.008 },
  hasClock: { width: 13, scale: 0.0025 },
  hasCodeBias: { width: 11, scale: 0.02 },
  hasPhaseBias: { width: 11, scale: 0.01 },
} as const satisfies Record<string, ScaledField>;

export type FieldName = keyof typeof FIELDS;

/** STEC residual field selected by the 2-bit residual size of atmosphere messages. */
export const STEC_RESIDUAL_BY_SIZE: readonly ScaledField[] = [
  FIELDS.stecResidualSize0,
  FIELDS.stecResidualSize1,
  FIELDS.stecResidualSize2,
  FIELDS.stecResidualSize3,
];

/** Most-negative value representable in the field's width. */
export function sentinelOf(field: ScaledField): number {
  return -(2 ** (field.width - 1));
}

export function scaleRaw(raw: number, field: ScaledField): Scaled {
  return raw === sentinelOf(field) ? INVALID : raw * field.scale;
}

/** Read a two's-complement field and scale it. */
export function readScaled(cursor: BitCursor, field: ScaledField): Scaled {
  return scaleRaw(cursor.readSigned(field.width), field);
}

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

const GNSS_IDS: readonly SatSys[] = ['G', 'R', 'E', 'C', 'J', 'S'];

/** Map a 4-bit GNSS id from a mask message to its system code. */
export function gnssIdToSatsys(id: number): SatSys {
  const satsys = GNSS_IDS[id];
  if (satsys === undefined) {
    throw new UnknownEnumerationError('GNSS id', id);
  }
  return satsys;
}

const SIGNALS: Partial<Record<SatSys, readonly string[]>> = signalTable;

/**
 * Signal name for a bit position of a 16-bit signal mask.
 * Reserved positions give ''.
 */
export function signalName(satsys: SatSys, index: number): string {
  const names = SIGNALS[satsys];
  if (names === undefined) {
    throw new UnknownEnumerationError('signal table for satellite system', satsys);
  }
  return names[index] ?? '';
}

/** "G01"-style satellite name. */
export function satelliteName(satsys: SatSys, id: number): string {
  return `${satsys}${String(id).padStart(2, '0')}`;
}

// ---------------------------------------------------------------------------
// Validity interval and URA
// ---------------------------------------------------------------------------

const VALIDITY_INTERVALS = [
  5, 10, 15, 20, 30, 60, 90, 120, 180, 240, 300, 600, 900, 1800, 3600, 0,
] as const;

/** Seconds for a 4-bit HAS validity-interval index. Index 15 (0 s) means not applicable. */
export function validityIntervalSeconds(index: number): number {
  const seconds = VALIDITY_INTERVALS[index];
  if (!Number.isInteger(index) || seconds === undefined) {
    throw new UnknownEnumerationError('validity interval index', index);
  }
  return seconds;
}

/**
 * User range accuracy in metres from a 6-bit index:
 * `3^class * (1 + value / 4) - 1` millimetres. Index 0 is undefined.
 */
export function uraMeters(raw: number): Scaled {
  if (raw === 0) return INVALID;
  const uraClass = raw >> 3;
  const value = raw & 7;
  return (3 ** uraClass * (1 + value / 4) - 1) / 1000;
}
