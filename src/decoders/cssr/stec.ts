import type { BitCursor } from '../../BitCursor';
import { FIELDS, readScaled } from '../../fields/FieldCodec';
import { formatFixed } from '../../helpers';
import type { StecPolynomial } from '../../types';

/**
 * STEC polynomial for a 2-bit correction type: c00, then c01/c10 from type 1,
 * c11 from type 2, c02/c20 from type 3. Absent terms are not on the wire.
 */
export function readStecPolynomial(cursor: BitCursor, correctionType: number): StecPolynomial {
  const poly: StecPolynomial = { c00: readScaled(cursor, FIELDS.stecC00) };
  if (correctionType >= 1) {
    cursor.require(FIELDS.stecC01.width + FIELDS.stecC10.width);
    poly.c01 = readScaled(cursor, FIELDS.stecC01);
    poly.c10 = readScaled(cursor, FIELDS.stecC10);
  }
  if (correctionType >= 2) {
    poly.c11 = readScaled(cursor, FIELDS.stecC11);
  }
  if (correctionType >= 3) {
    cursor.require(FIELDS.stecC02.width + FIELDS.stecC20.width);
    poly.c02 = readScaled(cursor, FIELDS.stecC02);
    poly.c20 = readScaled(cursor, FIELDS.stecC20);
  }
  return poly;
}

const tecu = (value: number | null): string => formatFixed(value, 6, 3);

export function formatStecPolynomial(poly: StecPolynomial): string {
  let text = `c00=${tecu(poly.c00)}TECU`;
  if (poly.c01 !== undefined && poly.c10 !== undefined) {
    text += ` c01=${tecu(poly.c01)}TECU/deg c10=${tecu(poly.c10)}TECU/deg`;
  }
  if (poly.c11 !== undefined) {
    text += ` c11=${tecu(poly.c11)}TECU/deg^2`;
  }
  if (poly.c02 !== undefined && poly.c20 !== undefined) {
    text += ` c02=${tecu(poly.c02)}TECU/deg^2 c20=${tecu(poly.c20)}TECU/deg^2`;
  }
  return text;
}
