import type { BitCursor } from '../BitCursor';
import type { SessionOptionsInput } from '../config';
import { CSSR_DECODERS } from '../decoders/cssr';
import {
  type DecodeResult,
  type Decoded,
  guard,
  ok,
  sequencingError,
  unknownEnumeration,
} from '../decoders/DecodeResult';
import { formatInt } from '../helpers';
import { type MaskContext, decodeMask } from '../mask/MaskContext';
import type { CorrectionRecord } from '../types';
import type { StatisticsSnapshot } from './BitStatistics';
import { EMPTY_MASK, type PayloadWindow, SessionState, cursorFor } from './SessionState';

export const CSSR_MESSAGE_NUMBER = 4073;

export interface CssrHeader {
  messageNumber: number;
  subtype: number;
  /** GNSS epoch time in seconds, subtype 1 only. */
  epoch?: number;
  /** Seconds within the hour, subtypes 2 to 9, 11 and 12. */
  hourlyEpoch?: number;
  /** Update interval index; absent for subtype 10. */
  interval?: number;
  multipleMessage?: boolean;
  iod?: number;
}

export interface CssrMessage {
  header: CssrHeader;
  /** Set by subtype 1. */
  mask?: MaskContext;
  /** Period closed by a subtype 1 mask, when statistics are on. */
  statistics?: StatisticsSnapshot;
  warnings: string[];
  records: CorrectionRecord[];
}

export type CssrSession = SessionState<CssrHeader>;

export function createCssrSession(options?: SessionOptionsInput): CssrSession {
  return new SessionState<CssrHeader>('cssr', options);
}

function decodeCssrHeader(cursor: BitCursor, messageNumber: number): CssrHeader {
  const subtype = cursor.readUnsigned(4);
  const header: CssrHeader = { messageNumber, subtype };
  if (subtype === 10) return header;
  if (subtype === 1) {
    header.epoch = cursor.readUnsigned(20);
  } else {
    header.hourlyEpoch = cursor.readUnsigned(12);
  }
  header.interval = cursor.readUnsigned(4);
  header.multipleMessage = cursor.readBit() === 1;
  header.iod = cursor.readUnsigned(4);
  return header;
}

function summarizeHeader(header: CssrHeader): string {
  const label = `ST${String(header.subtype).padEnd(2)}`;
  if (header.epoch !== undefined) return `${label} epoch=${header.epoch} iod=${header.iod}`;
  if (header.hourlyEpoch !== undefined) {
    return `${label} hepoch=${formatInt(header.hourlyEpoch, 4)} iod=${header.iod}`;
  }
  return label;
}

/**
 * Decode one CSSR message (RTCM 4073) against the stream's state. Subtype 1
 * replaces the stored mask; every other subtype is read against it.
 */
export function decodeCssrMessage(
  state: CssrSession,
  data: Uint8Array,
  window?: PayloadWindow,
): DecodeResult<CssrMessage> {
  const cursor = cursorFor(data, window);
  const start = cursor.offset;
  if (cursor.isZero()) {
    const bitLength = cursor.remaining;
    state.stats?.addNull(bitLength);
    return state.note<Decoded<CssrMessage>>({
      status: 'null-data',
      reason: 'zero-padding',
      bitLength,
    });
  }
  return state.note(
    guard<Decoded<CssrMessage>>(() => {
      const messageNumber = cursor.readUnsigned(12);
      if (messageNumber !== CSSR_MESSAGE_NUMBER) {
        const bitLength = cursor.bitLength - start;
        state.stats?.addNull(bitLength);
        return { status: 'null-data', reason: 'message-number', bitLength, messageNumber };
      }
      const header = decodeCssrHeader(cursor, messageNumber);
      state.header = header;
      const headerBits = cursor.offset - start;
      const summary = summarizeHeader(header);

      if (header.subtype === 1) {
        const { mask, trace, warnings } = decodeMask(cursor, 'cssr');
        const statistics = state.setMask(mask, cursor.offset - start);
        return ok({
          message: { header, mask, statistics, warnings, records: [] },
          summary,
          trace,
          bitLength: cursor.offset - start,
        });
      }

      const decoder = CSSR_DECODERS.get(header.subtype);
      if (decoder === undefined) return unknownEnumeration('CSSR subtype', header.subtype);
      const mask = state.mask;
      if (decoder.requiresMask && mask === undefined) {
        return sequencingError(`CSSR ST${header.subtype} before ST1 mask`);
      }
      const body = decoder.decode(cursor, mask ?? EMPTY_MASK);
      if (body.status !== 'ok') return body;
      state.stats?.addOther(headerBits);
      state.stats?.add(body.value.usage);
      return ok({
        message: { header, warnings: [], records: body.value.records },
        summary,
        trace: body.value.trace,
        bitLength: cursor.offset - start,
      });
    }),
  );
}
