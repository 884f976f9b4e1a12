/**
 * Seed corpus of well-formed messages for mutation-based fuzzing. The CSSR
 * and HAS seeds are streams: each list decodes in order on one session.
 */

import { BitWriter } from '../src/BitWriter';
import { GPS_THREE_BY_TWO, type MaskSystemSpec, cssrHeader, hasHeader, writeMaskBody } from '../tests/fixtures/payloads';

const GALILEO_TWO: MaskSystemSpec = { gnssId: 2, satellites: [2, 11], signals: [0, 3] };

function repeat(w: BitWriter, times: number, write: (w: BitWriter, i: number) => void): BitWriter {
  for (let i = 0; i < times; i++) write(w, i);
  return w;
}

export const CSSR_STREAM: Uint8Array[] = [
  writeMaskBody(cssrHeader(1, { epoch: 345600, iod: 4 }), [GPS_THREE_BY_TWO, GALILEO_TWO]).toUint8Array(),
  repeat(cssrHeader(2, { hourlyEpoch: 600, iod: 4 }), 5, (w, i) => {
    w.writeUnsigned(i + 1, i < 3 ? 8 : 10).writeSigned(-i, 15).writeSigned(i, 13).writeSigned(3, 13);
  }).toUint8Array(),
  repeat(cssrHeader(3, { hourlyEpoch: 600, iod: 4 }), 5, (w, i) => {
    w.writeSigned(i * 100 - 200, 15);
  }).toUint8Array(),
  repeat(cssrHeader(4, { hourlyEpoch: 600, iod: 4 }), 10, (w, i) => {
    w.writeSigned(i - 5, 11);
  }).toUint8Array(),
];

export const HAS_STREAM: Uint8Array[] = [
  writeMaskBody(hasHeader({ toh: 900, mask: true, maskId: 5, iodSet: 2 }), [GALILEO_TWO], 'has').toUint8Array(),
  repeat(hasHeader({ toh: 930, orbit: true, maskId: 5, iodSet: 2 }).writeUnsigned(6, 4), 2, (w, i) => {
    w.writeUnsigned(100 + i, 10).writeSigned(4, 13).writeSigned(-4, 12).writeSigned(0, 12);
  }).toUint8Array(),
];

function zeros(w: BitWriter, count: number): BitWriter {
  return repeat(w, count, out => {
    out.writeBit(0);
  });
}

export const RTCM_SEEDS: Uint8Array[] = [
  zeros(new BitWriter().writeUnsigned(1019, 12).writeUnsigned(7, 6).writeUnsigned(152, 10), 460).toUint8Array(),
  zeros(new BitWriter().writeUnsigned(1046, 12).writeUnsigned(11, 6), 486).toUint8Array(),
  zeros(new BitWriter().writeUnsigned(1020, 12).writeUnsigned(3, 6), 342).toUint8Array(),
  zeros(zeros(new BitWriter().writeUnsigned(1058, 12), 49).writeUnsigned(1, 6).writeUnsigned(4, 6), 70).toUint8Array(),
  CSSR_STREAM[0],
];
