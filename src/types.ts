/**
 * Satellite system codes as they appear in satellite names ("G01", "E12").
 * G GPS, R GLONASS, E Galileo, C BeiDou, J QZSS, S SBAS, I NavIC.
 */
export type SatSys = 'G' | 'R' | 'E' | 'C' | 'J' | 'S' | 'I';

/** Marker for a field that carried its "not available" sentinel. */
export const INVALID = null;

/** A physical value, or {@link INVALID}. Zero is a valid value. */
export type Scaled = number | typeof INVALID;

// ---------------------------------------------------------------------------
// Correction records
// ---------------------------------------------------------------------------

export interface OrbitCorrection {
  kind: 'orbit';
  satellite: string;
  /** Issue of data the correction refers to (IODE, IODnav). */
  iode: number;
  /** Metres. */
  radial: Scaled;
  along: Scaled;
  cross: Scaled;
  /** Metres per second; RTCM SSR only. */
  dotRadial?: Scaled;
  dotAlong?: Scaled;
  dotCross?: Scaled;
  networkId?: number;
}

export interface ClockCorrection {
  kind: 'clock';
  satellite: string;
  /** Metres. */
  c0: Scaled;
  /** m/s and m/s²; RTCM SSR only. */
  c1?: Scaled;
  c2?: Scaled;
  /** HAS clock multiplier already applied to `c0`. */
  multiplier?: number;
  /** HAS: the satellite shall not be used. */
  doNotUse?: boolean;
  networkId?: number;
}

export interface HighRateClockCorrection {
  kind: 'high-rate-clock';
  satellite: string;
  clock: Scaled;
}

export interface CodeBiasCorrection {
  kind: 'code-bias';
  satellite: string;
  signal: string;
  /** Metres. */
  bias: Scaled;
  networkId?: number;
}

export interface PhaseBiasCorrection {
  kind: 'phase-bias';
  satellite: string;
  signal: string;
  bias: Scaled;
  unit: 'm' | 'cycle';
  discontinuity: number;
  networkId?: number;
}

export interface UraCorrection {
  kind: 'ura';
  satellite: string;
  /** 6-bit class/value index. */
  raw: number;
  meters: Scaled;
}

export interface StecPolynomial {
  /** TECU. */
  c00: Scaled;
  /** TECU/deg. */
  c01?: Scaled;
  c10?: Scaled;
  /** TECU/deg². */
  c11?: Scaled;
  c02?: Scaled;
  c20?: Scaled;
}

export interface StecCorrection {
  kind: 'stec';
  satellite: string;
  networkId: number;
  quality: number;
  correctionType: number;
  polynomial: StecPolynomial;
  /** TECU per grid point; atmosphere messages only. */
  residuals?: Scaled[];
}

export interface TroposphereGridPoint {
  /** Metres. */
  hydrostatic?: Scaled;
  wet?: Scaled;
  /** Troposphere residual, metres. */
  residual?: Scaled;
  /** STEC residual per satellite, TECU. */
  stecResiduals?: Array<{ satellite: string; residual: Scaled }>;
}

/** Metres, m/deg, m/deg². */
export interface TropospherePolynomial {
  t00: Scaled;
  t01?: Scaled;
  t10?: Scaled;
  t11?: Scaled;
}

export interface TroposphereCorrection {
  kind: 'troposphere';
  networkId: number;
  quality?: number;
  correctionType?: number;
  polynomial?: TropospherePolynomial;
  /** Metres. */
  residualOffset?: number;
  grid: TroposphereGridPoint[];
}

export interface AuxInfo {
  kind: 'aux-info';
  counter: number;
  data: Uint8Array;
}

export type CorrectionRecord =
  | OrbitCorrection
  | ClockCorrection
  | HighRateClockCorrection
  | CodeBiasCorrection
  | PhaseBiasCorrection
  | UraCorrection
  | StecCorrection
  | TroposphereCorrection
  | AuxInfo;

/** Bits consumed by a message body, for statistics. */
export interface BitUsage {
  satellite: number;
  signal: number;
  other: number;
}
