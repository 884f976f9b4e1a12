import type { CorrectionDecoder } from '../Decoder';
import { AtmosphereDecoder } from './AtmosphereDecoder';
import { ClockDecoder } from './ClockDecoder';
import { cssrCodeBiasDecoder } from './CodeBiasDecoder';
import { GridDecoder } from './GridDecoder';
import { NetworkBiasDecoder } from './NetworkBiasDecoder';
import { NetworkOrbitClockDecoder } from './NetworkOrbitClockDecoder';
import { cssrOrbitDecoder } from './OrbitDecoder';
import { cssrPhaseBiasDecoder } from './PhaseBiasDecoder';
import { ServiceInfoDecoder } from './ServiceInfoDecoder';
import { StecDecoder } from './StecDecoder';
import { UraDecoder } from './UraDecoder';

export { AtmosphereDecoder } from './AtmosphereDecoder';
export { ClockDecoder } from './ClockDecoder';
export { CodeBiasDecoder, cssrCodeBiasDecoder } from './CodeBiasDecoder';
export type { CodeBiasDecoderOptions } from './CodeBiasDecoder';
export { GridDecoder, gridLabel } from './GridDecoder';
export { NetworkBiasDecoder } from './NetworkBiasDecoder';
export { NetworkOrbitClockDecoder } from './NetworkOrbitClockDecoder';
export { OrbitDecoder, cssrOrbitDecoder, formatOrbit } from './OrbitDecoder';
export type { OrbitDecoderOptions } from './OrbitDecoder';
export { PhaseBiasDecoder, cssrPhaseBiasDecoder } from './PhaseBiasDecoder';
export type { PhaseBiasDecoderOptions } from './PhaseBiasDecoder';
export { ServiceInfoDecoder } from './ServiceInfoDecoder';
export { StecDecoder } from './StecDecoder';
export { UraDecoder } from './UraDecoder';

/** Body decoders by CSSR subtype. Subtype 1 is the mask and has no entry. */
export const CSSR_DECODERS: ReadonlyMap<number, CorrectionDecoder> = new Map<number, CorrectionDecoder>([
  [2, cssrOrbitDecoder],
  [3, new ClockDecoder()],
  [4, cssrCodeBiasDecoder],
  [5, cssrPhaseBiasDecoder],
  [6, new NetworkBiasDecoder()],
  [7, new UraDecoder()],
  [8, new StecDecoder()],
  [9, new GridDecoder()],
  [10, new ServiceInfoDecoder()],
  [11, new NetworkOrbitClockDecoder()],
  [12, new AtmosphereDecoder()],
]);
