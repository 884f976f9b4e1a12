export { BitCursor, hexToBytes } from './BitCursor';
export { BitWriter } from './BitWriter';
export { DecodeError, InsufficientDataError, SequencingError, UnknownEnumerationError } from './errors';
export { INVALID } from './types';
export type {
  AuxInfo,
  BitUsage,
  ClockCorrection,
  CodeBiasCorrection,
  CorrectionRecord,
  HighRateClockCorrection,
  OrbitCorrection,
  PhaseBiasCorrection,
  SatSys,
  Scaled,
  StecCorrection,
  StecPolynomial,
  TroposphereCorrection,
  TroposphereGridPoint,
  TropospherePolynomial,
  UraCorrection,
} from './types';
export { parseSessionOptions, sessionOptionsSchema, silentLogger } from './config';
export type { Logger, SessionOptions, SessionOptionsInput } from './config';
export {
  FIELDS,
  gnssIdToSatsys,
  readScaled,
  satelliteName,
  scaleRaw,
  sentinelOf,
  signalName,
  uraMeters,
  validityIntervalSeconds,
} from './fields/FieldCodec';
export type { FieldName, ScaledField } from './fields/FieldCodec';
export { guard, isOk } from './decoders/DecodeResult';
export type {
  CorrectionBody,
  DecodeResult,
  Decoded,
  Failure,
  InsufficientData,
  NullData,
  Ok,
  Outcome,
  SequencingFailure,
  UnknownEnumeration,
} from './decoders/DecodeResult';
export { MaskedDecoder } from './decoders/Decoder';
export type { CorrectionDecoder } from './decoders/Decoder';
export { MaskContext, decodeMask } from './mask/MaskContext';
export type { CellRef, MaskKind, SatelliteRef, SystemMask } from './mask/MaskContext';
export { CSSR_DECODERS } from './decoders/cssr';
export { HAS_BLOCK_ORDER, HAS_DECODERS } from './decoders/has';
export type { HasBlock } from './decoders/has';
export { decodeEphemeris, ephemerisDecoderFor } from './decoders/ephemeris';
export type {
  BeidouEphemeris,
  EphemerisDecoder,
  EphemerisRecord,
  EphemerisResult,
  GalileoEphemeris,
  GlonassEphemeris,
  GpsEphemeris,
  HealthStatus,
  NavicEphemeris,
  QzssEphemeris,
} from './decoders/ephemeris';
export { decodeSsr } from './decoders/ssr/SsrDecoder';
export type { SsrHeader, SsrMessage, SsrMessageKind } from './decoders/ssr/SsrDecoder';
export { BitStatistics, formatStatistics } from './session/BitStatistics';
export type { StatisticsSnapshot } from './session/BitStatistics';
export { SessionState } from './session/SessionState';
export type { PayloadWindow, SessionPhase } from './session/SessionState';
export { CSSR_MESSAGE_NUMBER, createCssrSession, decodeCssrMessage } from './session/CssrSession';
export type { CssrHeader, CssrMessage, CssrSession } from './session/CssrSession';
export { createHasSession, decodeHasMessage } from './session/HasSession';
export type { HasHeader, HasMessage, HasSession } from './session/HasSession';
export { RtcmDecoder, decodeRtcmMessage } from './session/RtcmDecoder';
export type { RtcmMessage, RtcmSessions } from './session/RtcmDecoder';
export { renderOutcome } from './report';
export type { ReportOptions } from './report';
