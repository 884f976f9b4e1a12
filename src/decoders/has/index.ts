import { FIELDS } from '../../fields/FieldCodec';
import { CodeBiasDecoder } from '../cssr/CodeBiasDecoder';
import { OrbitDecoder } from '../cssr/OrbitDecoder';
import { PhaseBiasDecoder } from '../cssr/PhaseBiasDecoder';
import type { CorrectionDecoder } from '../Decoder';
import { ClockFullDecoder } from './ClockFullDecoder';
import { ClockSubsetDecoder } from './ClockSubsetDecoder';

export { ClockFullDecoder } from './ClockFullDecoder';
export { ClockSubsetDecoder } from './ClockSubsetDecoder';

export type HasBlock = 'orbit' | 'clockFull' | 'clockSubset' | 'codeBias' | 'phaseBias';

/** Correction blocks after the mask, in the order the header flags them. */
export const HAS_BLOCK_ORDER: readonly HasBlock[] = [
  'orbit',
  'clockFull',
  'clockSubset',
  'codeBias',
  'phaseBias',
];

export const HAS_DECODERS: Readonly<Record<HasBlock, CorrectionDecoder>> = {
  orbit: new OrbitDecoder({
    label: 'ORBIT',
    radial: FIELDS.hasOrbitRadial,
    along: FIELDS.hasOrbitAlong,
    cross: FIELDS.hasOrbitCross,
    alongName: 'd_track',
    validityInterval: true,
  }),
  clockFull: new ClockFullDecoder(),
  clockSubset: new ClockSubsetDecoder(),
  codeBias: new CodeBiasDecoder({
    label: 'CBIAS',
    field: FIELDS.hasCodeBias,
    validityInterval: true,
  }),
  phaseBias: new PhaseBiasDecoder({
    label: 'PBIAS',
    field: FIELDS.hasPhaseBias,
    unit: 'cycle',
    validityInterval: true,
  }),
};
