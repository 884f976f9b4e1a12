import type { BitCursor } from '../BitCursor';
import { SequencingError } from '../errors';
import { validityIntervalSeconds } from '../fields/FieldCodec';
import type { MaskContext, SatelliteRef } from '../mask/MaskContext';
import type { BitUsage, SatSys } from '../types';
import { type CorrectionBody, type Outcome, guard, ok } from './DecodeResult';

/**
 * A mask-driven message body: CSSR subtypes 2 to 12 and the HAS correction
 * blocks. The cursor must sit on the first body bit.
 */
export interface CorrectionDecoder {
  /** Prefix of every trace line ("ST2", "CBIAS"). */
  readonly label: string;
  /** False for bodies that can be read before any mask has arrived. */
  readonly requiresMask: boolean;

  decode(cursor: BitCursor, mask: MaskContext): Outcome<CorrectionBody>;
}

/** Base for decoders that read by throwing; {@link decode} turns throws into outcomes. */
export abstract class MaskedDecoder implements CorrectionDecoder {
  abstract readonly label: string;
  readonly requiresMask: boolean = true;

  decode(cursor: BitCursor, mask: MaskContext): Outcome<CorrectionBody> {
    return guard(() => ok(this.decodeBody(cursor, mask)));
  }

  protected abstract decodeBody(cursor: BitCursor, mask: MaskContext): CorrectionBody;
}

/** Bits of a body of `total` bits, `other` of which are not per-satellite or per-signal. */
export function usageOf(kind: 'satellite' | 'signal', total: number, other: number): BitUsage {
  return {
    satellite: kind === 'satellite' ? total - other : 0,
    signal: kind === 'signal' ? total - other : 0,
    other,
  };
}

/** IODE width of orbit corrections: 10 bits for Galileo IODnav, 8 otherwise. */
export function iodeWidth(satsys: SatSys): number {
  return satsys === 'E' ? 10 : 8;
}

export type SubsetMasks = Map<SatSys, boolean[]>;

/**
 * Read one satellite subset mask per system, each as long as that system's
 * satellite list.
 */
export function readSubsetMasks(cursor: BitCursor, mask: MaskContext): SubsetMasks {
  const masks: SubsetMasks = new Map();
  for (const system of mask.systems) {
    setSubset(masks, system.satsys, cursor.readFlags(system.satellites.length));
  }
  return masks;
}

/** Subset masks selecting every satellite. */
export function fullSubsetMasks(mask: MaskContext): SubsetMasks {
  const masks: SubsetMasks = new Map();
  for (const system of mask.systems) {
    setSubset(masks, system.satsys, new Array<boolean>(system.satellites.length).fill(true));
  }
  return masks;
}

function setSubset(masks: SubsetMasks, satsys: SatSys, flags: boolean[]): void {
  if (masks.has(satsys)) {
    throw new SequencingError(`mask lists ${satsys} more than once`);
  }
  masks.set(satsys, flags);
}

export function isSelected(masks: SubsetMasks, ref: SatelliteRef): boolean {
  return masks.get(ref.system.satsys)?.[ref.satIndex] ?? false;
}

export interface ValidityInterval {
  index: number;
  seconds: number;
}

/** Read the 4-bit validity interval that opens every HAS correction block. */
export function readValidityInterval(cursor: BitCursor): ValidityInterval {
  const index = cursor.readUnsigned(4);
  return { index, seconds: validityIntervalSeconds(index) };
}

export function formatValidityInterval(label: string, vi: ValidityInterval): string {
  return `${label} validity_interval=${vi.seconds}s (${vi.index})`;
}
