import { InsufficientDataError, SequencingError, UnknownEnumerationError } from '../errors';
import type { BitUsage, CorrectionRecord } from '../types';

export interface Ok<T> {
  status: 'ok';
  value: T;
}

/** The payload is shorter than the field at `bitOffset` requires. Re-deliver a longer one. */
export interface InsufficientData {
  status: 'insufficient-data';
  bitOffset: number;
  needed: number;
  available: number;
}

/** A mask-dependent message arrived before (or without) its mask. */
export interface SequencingFailure {
  status: 'sequencing-error';
  message: string;
}

export interface UnknownEnumeration {
  status: 'unknown-enumeration';
  field: string;
  value: number | string;
}

/** Zero padding or a foreign message number: counted, not decoded. */
export interface NullData {
  status: 'null-data';
  reason: 'zero-padding' | 'message-number';
  bitLength: number;
  messageNumber?: number;
}

export type Failure = InsufficientData | SequencingFailure | UnknownEnumeration | NullData;

export type Outcome<T> = Ok<T> | Failure;

/** A fully decoded message with its trace. */
export interface Decoded<T> {
  message: T;
  /** One-line summary (satellites, epoch, issue of data). */
  summary: string;
  /** Per-satellite detail lines, newline-terminated. */
  trace: string;
  /** Bits consumed from the start offset. */
  bitLength: number;
}

export type DecodeResult<T> = Outcome<Decoded<T>>;

/** Result of a mask-driven message body. */
export interface CorrectionBody {
  records: CorrectionRecord[];
  trace: string;
  usage: BitUsage;
}

export function ok<T>(value: T): Ok<T> {
  return { status: 'ok', value };
}

export function sequencingError(message: string): SequencingFailure {
  return { status: 'sequencing-error', message };
}

export function unknownEnumeration(field: string, value: number | string): UnknownEnumeration {
  return { status: 'unknown-enumeration', field, value };
}

export function isOk<T>(outcome: Outcome<T>): outcome is Ok<T> {
  return outcome.status === 'ok';
}

/** Convert a thrown decode error into its outcome; rethrow anything else. */
export function failureFromError(error: unknown): Failure {
  if (error instanceof InsufficientDataError) {
    return {
      status: 'insufficient-data',
      bitOffset: error.bitOffset,
      needed: error.needed,
      available: error.available,
    };
  }
  if (error instanceof UnknownEnumerationError) {
    return unknownEnumeration(error.field, error.value);
  }
  if (error instanceof SequencingError) {
    return sequencingError(error.message);
  }
  throw error;
}

/** Run `body`, turning thrown decode errors into outcomes. */
export function guard<T>(body: () => Outcome<T>): Outcome<T> {
  try {
    return body();
  } catch (error) {
    return failureFromError(error);
  }
}
