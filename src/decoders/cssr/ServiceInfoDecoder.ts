import type { BitCursor } from '../../BitCursor';
import { bytesToHex } from '../../helpers';
import type { AuxInfo } from '../../types';
import type { CorrectionBody } from '../DecodeResult';
import { MaskedDecoder, usageOf } from '../Decoder';

/** CSSR subtype 10: opaque service information in 40-bit units. */
export class ServiceInfoDecoder extends MaskedDecoder {
  readonly label = 'ST10';
  readonly requiresMask = false;

  protected decodeBody(cursor: BitCursor): CorrectionBody {
    const start = cursor.offset;
    cursor.require(5);
    const counter = cursor.readUnsigned(3);
    const size = cursor.readUnsigned(2);
    const data = cursor.readBytes((size + 1) * 40);
    const record: AuxInfo = { kind: 'aux-info', counter, data };
    const total = cursor.offset - start;
    return {
      records: [record],
      trace: `${this.label} ${counter}:${bytesToHex(data)}\n`,
      usage: usageOf('satellite', total, total),
    };
  }
}
