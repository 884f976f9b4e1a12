import type { BitCursor } from '../BitCursor';
import type { SessionOptionsInput } from '../config';
import {
  type DecodeResult,
  type Decoded,
  guard,
  ok,
  sequencingError,
} from '../decoders/DecodeResult';
import { HAS_BLOCK_ORDER, HAS_DECODERS, type HasBlock } from '../decoders/has';
import { type MaskContext, decodeMask } from '../mask/MaskContext';
import type { CorrectionRecord } from '../types';
import type { StatisticsSnapshot } from './BitStatistics';
import { type PayloadWindow, SessionState, cursorFor } from './SessionState';

export const HAS_HEADER_BITS = 32;

export interface HasHeader {
  /** Time of hour, seconds. */
  toh: number;
  mask: boolean;
  blocks: Record<HasBlock, boolean>;
  maskId: number;
  iodSet: number;
}

export interface HasMessage {
  header: HasHeader;
  /** Set when the message carries a mask block. */
  mask?: MaskContext;
  statistics?: StatisticsSnapshot;
  warnings: string[];
  records: CorrectionRecord[];
}

export type HasSession = SessionState<HasHeader>;

export function createHasSession(options?: SessionOptionsInput): HasSession {
  return new SessionState<HasHeader>('has', options);
}

export function decodeHasHeader(cursor: BitCursor): HasHeader {
  cursor.require(HAS_HEADER_BITS);
  const toh = cursor.readUnsigned(12);
  const mask = cursor.readBit() === 1;
  const flags = cursor.readFlags(HAS_BLOCK_ORDER.length);
  const blocks = {
    orbit: flags[0],
    clockFull: flags[1],
    clockSubset: flags[2],
    codeBias: flags[3],
    phaseBias: flags[4],
  };
  cursor.skip(4);
  const maskId = cursor.readUnsigned(5);
  const iodSet = cursor.readUnsigned(5);
  return { toh, mask, blocks, maskId, iodSet };
}

function summarizeHeader(header: HasHeader): string {
  const labels = header.mask ? ['MASK'] : [];
  for (const block of HAS_BLOCK_ORDER) {
    if (header.blocks[block]) labels.push(HAS_DECODERS[block].label);
  }
  return `HAS TOH=${header.toh} mask_id=${header.maskId} iod_set=${header.iodSet} ${labels.join(' ')}`.trimEnd();
}

/**
 * Decode one Galileo HAS message: the 32-bit header, then the mask block
 * and correction blocks in the order the header flags them.
 */
export function decodeHasMessage(
  state: HasSession,
  data: Uint8Array,
  window?: PayloadWindow,
): DecodeResult<HasMessage> {
  const cursor = cursorFor(data, window);
  const start = cursor.offset;
  if (cursor.isZero()) {
    const bitLength = cursor.remaining;
    state.stats?.addNull(bitLength);
    return state.note<Decoded<HasMessage>>({
      status: 'null-data',
      reason: 'zero-padding',
      bitLength,
    });
  }
  return state.note(
    guard<Decoded<HasMessage>>(() => {
      const header = decodeHasHeader(cursor);
      state.header = header;
      const message: HasMessage = { header, warnings: [], records: [] };
      let trace = '';

      if (header.mask) {
        const decoded = decodeMask(cursor, 'has', header.maskId);
        message.mask = decoded.mask;
        message.warnings.push(...decoded.warnings);
        message.statistics = state.setMask(decoded.mask, cursor.offset - start);
        trace += decoded.trace;
        for (const warning of decoded.warnings) state.logger.warn(warning);
      } else {
        state.stats?.addOther(cursor.offset - start);
      }

      const mask = state.mask;
      if (mask === undefined) return sequencingError('HAS corrections before any mask');
      if (mask.maskId !== header.maskId) {
        return sequencingError(`HAS mask id ${header.maskId} does not match stored mask ${mask.maskId}`);
      }

      for (const block of HAS_BLOCK_ORDER) {
        if (!header.blocks[block]) continue;
        const body = HAS_DECODERS[block].decode(cursor, mask);
        if (body.status !== 'ok') return body;
        message.records.push(...body.value.records);
        trace += body.value.trace;
        state.stats?.add(body.value.usage);
      }

      return ok({
        message,
        summary: summarizeHeader(header),
        trace,
        bitLength: cursor.offset - start,
      });
    }),
  );
}
