import type { BitCursor } from '../../BitCursor';
import { FIELDS, STEC_RESIDUAL_BY_SIZE, readScaled } from '../../fields/FieldCodec';
import { formatFixed, formatHex } from '../../helpers';
import type { MaskContext } from '../../mask/MaskContext';
import type {
  CorrectionRecord,
  Scaled,
  TroposphereCorrection,
  TroposphereGridPoint,
  TropospherePolynomial,
} from '../../types';
import type { CorrectionBody } from '../DecodeResult';
import { MaskedDecoder, isSelected, readSubsetMasks, usageOf } from '../Decoder';
import { gridLabel } from './GridDecoder';
import { formatStecPolynomial, readStecPolynomial } from './stec';

const bits = (flags: readonly boolean[]): string => '0b' + flags.map(f => (f ? '1' : '0')).join('');
const meters = (value: Scaled): string => formatFixed(value, 0, 3);

/**
 * CSSR subtype 12: network troposphere polynomial and grid residuals, and
 * per-satellite STEC polynomial with grid residuals.
 */
export class AtmosphereDecoder extends MaskedDecoder {
  readonly label = 'ST12';

  protected decodeBody(cursor: BitCursor, mask: MaskContext): CorrectionBody {
    const start = cursor.offset;
    cursor.require(15);
    const tropo = cursor.readFlags(2);
    const stec = cursor.readFlags(2);
    const networkId = cursor.readUnsigned(5);
    const ngrid = cursor.readUnsigned(6);
    let trace = `${this.label} tropo=${bits(tropo)} stec=${bits(stec)} NID=${networkId} ngrid=${ngrid}\n`;
    const records: CorrectionRecord[] = [];

    if (tropo[0] || tropo[1]) {
      const troposphere: TroposphereCorrection = { kind: 'troposphere', networkId, grid: [] };
      if (tropo[0]) {
        cursor.require(6 + 2 + FIELDS.tropT00.width);
        const quality = cursor.readUnsigned(6);
        const correctionType = cursor.readUnsigned(2);
        const polynomial: TropospherePolynomial = {
          t00: readScaled(cursor, FIELDS.tropT00),
        };
        trace +=
          `${this.label} Trop quality=${quality} correct_type(0-2)=${correctionType}` +
          ` t00=${meters(polynomial.t00)}m`;
        if (correctionType >= 1) {
          polynomial.t01 = readScaled(cursor, FIELDS.tropT01);
          polynomial.t10 = readScaled(cursor, FIELDS.tropT10);
          trace += ` t01=${meters(polynomial.t01)}m/deg t10=${meters(polynomial.t10)}m/deg`;
        }
        if (correctionType >= 2) {
          polynomial.t11 = readScaled(cursor, FIELDS.tropT11);
          trace += ` t11=${meters(polynomial.t11)}m/deg^2`;
        }
        trace += '\n';
        troposphere.quality = quality;
        troposphere.correctionType = correctionType;
        troposphere.polynomial = polynomial;
      }
      if (tropo[1]) {
        cursor.require(5);
        const field = cursor.readBit() === 1 ? FIELDS.tropResidualLong : FIELDS.tropResidualShort;
        const residualOffset = cursor.readUnsigned(4) * 0.02;
        troposphere.residualOffset = residualOffset;
        trace += `${this.label} Trop offset=${residualOffset.toFixed(3)}m\n`;
        cursor.require(field.width * ngrid);
        const grid: TroposphereGridPoint[] = [];
        for (let i = 0; i < ngrid; i++) {
          const residual = readScaled(cursor, field);
          grid.push({ residual });
          trace +=
            `${this.label} Trop ${gridLabel(i, ngrid)}` +
            ` residual=${formatFixed(residual, 7, 3)}m (${field.width}bit)\n`;
        }
        troposphere.grid = grid;
      }
      records.push(troposphere);
    }

    const other = cursor.offset - start;
    if (stec[0]) {
      const subset = readSubsetMasks(cursor, mask);
      for (const ref of mask.satellites()) {
        if (!isSelected(subset, ref)) continue;
        const { satellite } = ref;
        cursor.require(6 + 2 + FIELDS.stecC00.width);
        const quality = cursor.readUnsigned(6);
        const correctionType = cursor.readUnsigned(2);
        const polynomial = readStecPolynomial(cursor, correctionType);
        trace +=
          `${this.label} STEC ${satellite} quality=${formatHex(quality)} type=${correctionType}` +
          ` ${formatStecPolynomial(polynomial)}\n`;
        const field = STEC_RESIDUAL_BY_SIZE[cursor.readUnsigned(2)];
        const residuals: Scaled[] = [];
        for (let i = 0; i < ngrid; i++) {
          const residual = readScaled(cursor, field);
          residuals.push(residual);
          trace +=
            `${this.label} STEC ${satellite} ${gridLabel(i, ngrid)}` +
            ` residual=${formatFixed(residual, 6, 3)}TECU (${field.width}bit)\n`;
        }
        records.push({
          kind: 'stec',
          satellite,
          networkId,
          quality,
          correctionType,
          polynomial,
          residuals,
        });
      }
    }
    return { records, trace, usage: usageOf('satellite', cursor.offset - start, other) };
  }
}
