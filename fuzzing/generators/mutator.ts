/**
 * Mutation strategies for binary payloads. Each takes a valid message and
 * returns a damaged copy; the input is never modified.
 */

import { Rng } from './rng';

export type Mutator = (input: Uint8Array, rng: Rng) => Uint8Array;

/** Flip a random bit in a random byte. */
export function bitFlip(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = input.slice();
  out[rng.int(0, out.length - 1)] ^= 1 << rng.int(0, 7);
  return out;
}

/** Insert a random byte at a random position. */
export function byteInsert(input: Uint8Array, rng: Rng): Uint8Array {
  const pos = rng.int(0, input.length);
  const out = new Uint8Array(input.length + 1);
  out.set(input.subarray(0, pos));
  out[pos] = rng.int(0, 255);
  out.set(input.subarray(pos), pos + 1);
  return out;
}

/** Delete a random byte. */
export function byteDelete(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const pos = rng.int(0, input.length - 1);
  const out = new Uint8Array(input.length - 1);
  out.set(input.subarray(0, pos));
  out.set(input.subarray(pos + 1), pos);
  return out;
}

/** Replace a random byte with another. */
export function byteReplace(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = input.slice();
  out[rng.int(0, out.length - 1)] = rng.int(0, 255);
  return out;
}

/** Truncate the input at a random position. */
export function truncate(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length <= 1) return input;
  return input.slice(0, rng.int(1, input.length - 1));
}

/** Append a run of 0x00 or 0xff. */
export function extend(input: Uint8Array, rng: Rng): Uint8Array {
  const out = new Uint8Array(input.length + rng.int(1, 16));
  out.set(input);
  if (rng.chance(0.5)) out.fill(0xff, input.length);
  return out;
}

/** Overwrite the leading 16 bits, where message number and subtype live. */
export function clobberHeader(input: Uint8Array, rng: Rng): Uint8Array {
  const out = input.slice();
  for (let i = 0; i < Math.min(2, out.length); i++) out[i] = rng.int(0, 255);
  return out;
}

export const MUTATORS: Mutator[] = [
  bitFlip,
  byteInsert,
  byteDelete,
  byteReplace,
  truncate,
  extend,
  clobberHeader,
];

/**
 * Apply 1-N random mutations to a payload.
 * @param count - Number of mutations to apply (default: 1-3)
 */
export function mutate(input: Uint8Array, rng: Rng, count?: number): Uint8Array {
  const n = count ?? rng.int(1, 3);
  let result = input;
  for (let i = 0; i < n; i++) {
    result = rng.pick(MUTATORS)(result, rng);
  }
  return result;
}
