import type { BitCursor } from '../../BitCursor';
import { UnknownEnumerationError } from '../../errors';
import type { SatSys } from '../../types';
import { type DecodeResult, guard, ok } from '../DecodeResult';
import { BeidouEphemerisDecoder } from './BeidouEphemerisDecoder';
import { GalileoEphemerisDecoder } from './GalileoEphemerisDecoder';
import { GlonassEphemerisDecoder } from './GlonassEphemerisDecoder';
import { GpsEphemerisDecoder } from './GpsEphemerisDecoder';
import { NavicEphemerisDecoder } from './NavicEphemerisDecoder';
import { QzssEphemerisDecoder } from './QzssEphemerisDecoder';
import type { EphemerisDecoder, EphemerisResult } from './types';

export * from './types';
export { qzssHealth } from './QzssEphemerisDecoder';
export {
  BeidouEphemerisDecoder,
  GalileoEphemerisDecoder,
  GlonassEphemerisDecoder,
  GpsEphemerisDecoder,
  NavicEphemerisDecoder,
  QzssEphemerisDecoder,
};

const DECODERS: Partial<Record<SatSys, EphemerisDecoder>> = {
  G: new GpsEphemerisDecoder(),
  R: new GlonassEphemerisDecoder(),
  J: new QzssEphemerisDecoder(),
  C: new BeidouEphemerisDecoder(),
  I: new NavicEphemerisDecoder(),
};

const GALILEO: Record<string, EphemerisDecoder> = {
  'F/NAV': new GalileoEphemerisDecoder('F/NAV'),
  'I/NAV': new GalileoEphemerisDecoder('I/NAV'),
};

/** Pick the body decoder for a system (and, for Galileo, its navigation message). */
export function ephemerisDecoderFor(satsys: SatSys, navMessage?: string): EphemerisDecoder {
  if (satsys === 'E') {
    const decoder = navMessage === undefined ? undefined : GALILEO[navMessage];
    if (decoder === undefined) {
      throw new UnknownEnumerationError('Galileo navigation message', navMessage ?? '(none)');
    }
    return decoder;
  }
  const decoder = DECODERS[satsys];
  if (decoder === undefined) {
    throw new UnknownEnumerationError('ephemeris satellite system', satsys);
  }
  return decoder;
}

/**
 * Decode one broadcast ephemeris body. The whole fixed layout must be
 * present; a short payload is reported before anything is read.
 */
export function decodeEphemeris(
  cursor: BitCursor,
  satsys: SatSys,
  navMessage?: string,
): DecodeResult<EphemerisResult> {
  return guard(() => {
    const decoder = ephemerisDecoderFor(satsys, navMessage);
    const start = cursor.offset;
    cursor.require(decoder.bitLength);
    const result = decoder.decode(cursor);
    return ok({
      message: result,
      summary: decoder.summarize(result),
      trace: '',
      bitLength: cursor.offset - start,
    });
  });
}
