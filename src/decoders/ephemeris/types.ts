import type { BitCursor } from '../../BitCursor';
import type { SatSys } from '../../types';

/** Ratio of a circle's circumference to its diameter as the GPS ICD fixes it. */
export const GPS_PI = 3.1415926535898;

/** Keplerian orbit elements shared by the GPS-like systems. Angles in radians. */
export interface KeplerianElements {
  svid: number;
  weekNumber: number;
  /** Reference times, seconds of week. */
  toc: number;
  toe: number;
  m0: number;
  deltaN: number;
  e: number;
  /** √m. */
  sqrtA: number;
  omega0: number;
  i0: number;
  omega: number;
  omegaDot: number;
  idot: number;
  /** Radians. */
  cuc: number;
  cus: number;
  cic: number;
  cis: number;
  /** Metres. */
  crc: number;
  crs: number;
}

export interface GpsEphemeris extends KeplerianElements {
  satsys: 'G';
  accuracy: number;
  /** DF078: 1 P, 2 C/A, 3 L2C. */
  l2Code: number;
  iode: number;
  iodc: number;
  /** Seconds, s/s, s/s². */
  af0: number;
  af1: number;
  af2: number;
  tgd: number;
  health: number;
  l2pDataFlag: number;
  fitInterval: number;
}

export interface QzssEphemeris extends KeplerianElements {
  satsys: 'J';
  ura: number;
  l2Code: number;
  iode: number;
  iodc: number;
  af0: number;
  af1: number;
  af2: number;
  tgd: number;
  /** 6-bit composite health, MSB first: L1, L1C/A, L2C, L5, L1C, L1C/B. */
  health: number;
  fitInterval: number;
}

export type GalileoNavMessage = 'F/NAV' | 'I/NAV';

export interface GalileoEphemeris extends KeplerianElements {
  satsys: 'E';
  navMessage: GalileoNavMessage;
  iodNav: number;
  sisa: number;
  af0: number;
  af1: number;
  af2: number;
  /** Seconds. */
  bgdE5aE1: number;
  bgdE5bE1?: number;
  /** Signal health and data validity; F/NAV carries E5a (OS), I/NAV E5b and E1b. */
  signals: Array<{ signal: 'OS' | 'E5b' | 'E1b'; health: number; dataInvalid: boolean }>;
}

export interface BeidouEphemeris extends KeplerianElements {
  satsys: 'C';
  urai: number;
  aode: number;
  aodc: number;
  a0: number;
  a1: number;
  a2: number;
  /** Seconds. */
  tgd1: number;
  tgd2: number;
  health: number;
}

export interface NavicEphemeris extends KeplerianElements {
  satsys: 'I';
  ura: number;
  iodec: number;
  af0: number;
  af1: number;
  af2: number;
  tgd: number;
  l5Unhealthy: boolean;
  sUnhealthy: boolean;
}

export interface GlonassEphemeris {
  satsys: 'R';
  svid: number;
  /** DF040: frequency channel number + 7. */
  frequencyChannel: number;
  almanacHealth: number;
  almanacHealthAvailable: number;
  p1: number;
  tk: { hours: number; minutes: number; seconds: number };
  bn: number;
  p2: number;
  /** Minutes of day. */
  tb: number;
  /** PZ-90 state vector in metres, m/s and m/s². */
  position: [number, number, number];
  velocity: [number, number, number];
  acceleration: [number, number, number];
  p3: number;
  gammaN: number;
  p: number;
  in3: number;
  /** Seconds. */
  tauN: number;
  deltaTauN: number;
  en: number;
  p4: number;
  ft: number;
  nt: number;
  m: number;
  additionalDataAvailable: number;
  na: number;
  tauC: number;
  n4: number;
  tauGps: number;
  in5: number;
}

export type EphemerisRecord =
  | GpsEphemeris
  | QzssEphemeris
  | GalileoEphemeris
  | BeidouEphemeris
  | NavicEphemeris
  | GlonassEphemeris;

/** Health interpretation, kept apart from the record for the display side. */
export interface HealthStatus {
  healthy: boolean;
  /** E.g. `unhealthy(3f)`, `L1C/B`. */
  annotations: string[];
}

export interface EphemerisResult<T extends EphemerisRecord = EphemerisRecord> {
  record: T;
  health: HealthStatus;
}

/** A fixed-layout broadcast ephemeris body. */
export interface EphemerisDecoder<T extends EphemerisRecord = EphemerisRecord> {
  readonly satsys: SatSys;
  /** Bits the body occupies; checked before the first read. */
  readonly bitLength: number;
  decode(cursor: BitCursor): EphemerisResult<T>;
  /** One-line summary: satellite, week, issue of data, health annotations. */
  summarize(result: EphemerisResult<T>): string;
}
