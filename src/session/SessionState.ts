import { BitCursor } from '../BitCursor';
import { type Logger, type SessionOptionsInput, parseSessionOptions } from '../config';
import type { Outcome } from '../decoders/DecodeResult';
import { MaskContext, type MaskKind } from '../mask/MaskContext';
import { BitStatistics, type StatisticsSnapshot, formatStatistics } from './BitStatistics';

export type SessionPhase = 'mask-required' | 'mask-ready';

/** Where a message sits in the caller's buffer. */
export interface PayloadWindow {
  /** First bit of the message. Default 0. */
  bitOffset?: number;
  /** Bits from `bitOffset`. Default: to the end of the buffer. */
  bitLength?: number;
}

/**
 * Per-stream decoding state. Only the mask survives from one message to
 * the next; the header is replaced by every header decode.
 */
export class SessionState<H> {
  readonly kind: MaskKind;
  readonly logger: Logger;
  readonly stats: BitStatistics | undefined;
  private _mask: MaskContext | undefined;
  header: H | undefined;

  constructor(kind: MaskKind, options?: SessionOptionsInput) {
    const { statistics, logger } = parseSessionOptions(options);
    this.kind = kind;
    this.logger = logger;
    this.stats = statistics ? new BitStatistics() : undefined;
  }

  get phase(): SessionPhase {
    return this._mask === undefined ? 'mask-required' : 'mask-ready';
  }

  get mask(): MaskContext | undefined {
    return this._mask;
  }

  /**
   * Replace the stored mask. With statistics on, returns the period the
   * mask closes and logs it.
   */
  setMask(mask: MaskContext, maskBits: number): StatisticsSnapshot | undefined {
    this._mask = mask;
    if (this.stats === undefined) return undefined;
    const closed = this.stats.restart(mask, maskBits);
    this.logger.info(formatStatistics(closed));
    return closed;
  }

  /** Log failures the way the stream reports them, and pass the outcome through. */
  note<T>(outcome: Outcome<T>): Outcome<T> {
    switch (outcome.status) {
      case 'unknown-enumeration':
        this.logger.warn(`unknown ${outcome.field}: ${outcome.value}`);
        break;
      case 'sequencing-error':
        this.logger.warn(outcome.message);
        break;
      case 'insufficient-data':
        this.logger.debug(
          `insufficient data: need ${outcome.needed} bits at offset ${outcome.bitOffset}, ${outcome.available} available`,
        );
        break;
      case 'null-data':
        this.logger.debug(
          outcome.reason === 'zero-padding'
            ? `${this.kind.toUpperCase()} null data ${outcome.bitLength} bits`
            : `${this.kind.toUpperCase()} message number ${outcome.messageNumber}, ${outcome.bitLength} bits skipped`,
        );
        break;
      default:
        break;
    }
    return outcome;
  }
}

/** Cursor over the window of `data` that holds one message. */
export function cursorFor(data: Uint8Array, window: PayloadWindow = {}): BitCursor {
  const bitOffset = window.bitOffset ?? 0;
  const end = window.bitLength === undefined ? data.length * 8 : bitOffset + window.bitLength;
  const cursor = BitCursor.from(data, end);
  cursor.seek(bitOffset);
  return cursor;
}

/** Mask stand-in for bodies that do not depend on one. */
export const EMPTY_MASK = new MaskContext('cssr', []);
