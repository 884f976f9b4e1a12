import type { BitCursor } from '../../BitCursor';
import { FIELDS, readScaled } from '../../fields/FieldCodec';
import { formatFixed, formatInt } from '../../helpers';
import type { MaskContext } from '../../mask/MaskContext';
import type { TroposphereCorrection, TroposphereGridPoint } from '../../types';
import type { CorrectionBody } from '../DecodeResult';
import { MaskedDecoder, isSelected, readSubsetMasks, usageOf } from '../Decoder';

/** "grid  1/ 4" */
export function gridLabel(index: number, ngrid: number): string {
  return `grid ${formatInt(index + 1, 2)}/${formatInt(ngrid, 2)}`;
}

/**
 * CSSR subtype 9: gridded vertical troposphere delays and per-satellite
 * STEC residuals. The range bit selects 7- or 16-bit residuals.
 */
export class GridDecoder extends MaskedDecoder {
  readonly label = 'ST9';

  protected decodeBody(cursor: BitCursor, mask: MaskContext): CorrectionBody {
    const start = cursor.offset;
    const correctionType = cursor.readUnsigned(2);
    const longRange = cursor.readBit() === 1;
    const residualField = longRange ? FIELDS.gridStecResidualLong : FIELDS.gridStecResidualShort;
    const networkId = cursor.readUnsigned(5);
    const subset = readSubsetMasks(cursor, mask);
    cursor.require(12);
    const quality = cursor.readUnsigned(6);
    const ngrid = cursor.readUnsigned(6);

    let trace =
      `${this.label} Trop correct_type=${correctionType}` +
      ` NID=${networkId} quality=${quality} ngrid=${ngrid}\n`;
    const grid: TroposphereGridPoint[] = [];
    for (let i = 0; i < ngrid; i++) {
      cursor.require(FIELDS.gridHydrostatic.width + FIELDS.gridWet.width);
      const hydrostatic = readScaled(cursor, FIELDS.gridHydrostatic);
      const wet = readScaled(cursor, FIELDS.gridWet);
      trace +=
        `${this.label} Trop     ${gridLabel(i, ngrid)}` +
        ` dry-delay=${formatFixed(hydrostatic, 6, 3)}m wet-delay=${formatFixed(wet, 6, 3)}m\n`;
      const stecResiduals: Array<{ satellite: string; residual: number | null }> = [];
      for (const ref of mask.satellites()) {
        if (!isSelected(subset, ref)) continue;
        const residual = readScaled(cursor, residualField);
        stecResiduals.push({ satellite: ref.satellite, residual });
        trace +=
          `${this.label} STEC ${ref.satellite} ${gridLabel(i, ngrid)}` +
          ` residual=${formatFixed(residual, 6, 3)}TECU (${residualField.width}bit)\n`;
      }
      grid.push({ hydrostatic, wet, stecResiduals });
    }

    const record: TroposphereCorrection = {
      kind: 'troposphere',
      networkId,
      quality,
      correctionType,
      grid,
    };
    const total = cursor.offset - start;
    return { records: [record], trace, usage: usageOf('satellite', total, total) };
  }
}
