/** Base class for conditions a decoder reports as an outcome rather than a crash. */
export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The payload ended before a field could be read. */
export class InsufficientDataError extends DecodeError {
  constructor(
    readonly bitOffset: number,
    readonly needed: number,
    readonly available: number,
  ) {
    super(`need ${needed} bits at offset ${bitOffset}, ${available} available`);
  }
}

/** A field held a value with no defined meaning (system id, subtype, nav message type). */
export class UnknownEnumerationError extends DecodeError {
  constructor(
    readonly field: string,
    readonly value: number | string,
  ) {
    super(`unknown ${field}: ${value}`);
  }
}

/** A mask-dependent message arrived without a usable mask. */
export class SequencingError extends DecodeError {}
