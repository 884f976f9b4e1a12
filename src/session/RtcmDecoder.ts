import { hexToBytes } from '../BitCursor';
import type { SessionOptionsInput } from '../config';
import {
  type DecodeResult,
  type Decoded,
  type Outcome,
  guard,
  ok,
  unknownEnumeration,
} from '../decoders/DecodeResult';
import { type EphemerisResult, decodeEphemeris } from '../decoders/ephemeris';
import { type SsrMessage, type SsrMessageKind, decodeSsr } from '../decoders/ssr/SsrDecoder';
import type { SatSys } from '../types';
import {
  CSSR_MESSAGE_NUMBER,
  type CssrMessage,
  type CssrSession,
  createCssrSession,
  decodeCssrMessage,
} from './CssrSession';
import { type PayloadWindow, cursorFor } from './SessionState';

interface EphemerisRoute {
  satsys: SatSys;
  navMessage?: string;
}

const EPHEMERIS_ROUTES: ReadonlyMap<number, EphemerisRoute> = new Map<number, EphemerisRoute>([
  [1019, { satsys: 'G' }],
  [1020, { satsys: 'R' }],
  [1041, { satsys: 'I' }],
  [1042, { satsys: 'C' }],
  [1044, { satsys: 'J' }],
  [1045, { satsys: 'E', navMessage: 'F/NAV' }],
  [1046, { satsys: 'E', navMessage: 'I/NAV' }],
]);

const SSR_KINDS: readonly SsrMessageKind[] = [
  'orbit',
  'clock',
  'code-bias',
  'orbit-clock',
  'ura',
  'high-rate-clock',
];

/** First message number of each system's six SSR messages. */
const SSR_BLOCKS: ReadonlyArray<[number, SatSys]> = [
  [1057, 'G'],
  [1063, 'R'],
  [1240, 'E'],
  [1246, 'J'],
  [1252, 'S'],
  [1258, 'C'],
];

export function ssrRoute(messageNumber: number): { satsys: SatSys; kind: SsrMessageKind } | undefined {
  for (const [first, satsys] of SSR_BLOCKS) {
    const offset = messageNumber - first;
    if (offset >= 0 && offset < SSR_KINDS.length) return { satsys, kind: SSR_KINDS[offset] };
  }
  return undefined;
}

export type RtcmMessage =
  | { type: 'ephemeris'; messageNumber: number; ephemeris: EphemerisResult }
  | { type: 'ssr'; messageNumber: number; ssr: SsrMessage }
  | { type: 'cssr'; messageNumber: number; cssr: CssrMessage };

export interface RtcmSessions {
  cssr: CssrSession;
}

function wrap<T>(
  messageNumber: number,
  outcome: Outcome<Decoded<T>>,
  into: (value: T) => RtcmMessage,
  headerBits: number,
): DecodeResult<RtcmMessage> {
  if (outcome.status !== 'ok') return outcome;
  const { message, summary, trace, bitLength } = outcome.value;
  return ok({
    message: into(message),
    summary: `RTCM ${messageNumber} ${summary}`,
    trace,
    bitLength: bitLength + headerBits,
  });
}

/**
 * Decode one framed RTCM3 payload: read the message number and hand the
 * body to the ephemeris, SSR or CSSR decoder.
 */
export function decodeRtcmMessage(
  sessions: RtcmSessions,
  payload: Uint8Array,
  window?: PayloadWindow,
): DecodeResult<RtcmMessage> {
  const cursor = cursorFor(payload, window);
  const peeked = guard(() => ok(cursor.clone().readUnsigned(12)));
  if (peeked.status !== 'ok') return sessions.cssr.note<Decoded<RtcmMessage>>(peeked);
  const messageNumber = peeked.value;

  if (messageNumber === CSSR_MESSAGE_NUMBER) {
    // The CSSR session reads the message number and logs its own failures.
    const outcome = decodeCssrMessage(sessions.cssr, payload, window);
    return wrap(messageNumber, outcome, cssr => ({ type: 'cssr', messageNumber, cssr }), 0);
  }

  return sessions.cssr.note(
    guard<Decoded<RtcmMessage>>(() => {
      cursor.skip(12);
      const ephemeris = EPHEMERIS_ROUTES.get(messageNumber);
      if (ephemeris !== undefined) {
        const outcome = decodeEphemeris(cursor, ephemeris.satsys, ephemeris.navMessage);
        return wrap(
          messageNumber,
          outcome,
          result => ({ type: 'ephemeris', messageNumber, ephemeris: result }),
          12,
        );
      }

      const ssr = ssrRoute(messageNumber);
      if (ssr !== undefined) {
        const outcome = decodeSsr(cursor, ssr.satsys, ssr.kind);
        return wrap(messageNumber, outcome, message => ({ type: 'ssr', messageNumber, ssr: message }), 12);
      }

      return unknownEnumeration('RTCM message number', messageNumber);
    }),
  );
}

/**
 * Stateful front end over {@link decodeRtcmMessage}: one instance per RTCM
 * stream, holding the CSSR session between messages.
 */
export class RtcmDecoder {
  readonly sessions: RtcmSessions;

  constructor(options?: SessionOptionsInput) {
    this.sessions = { cssr: createCssrSession(options) };
  }

  decode(payload: Uint8Array, window?: PayloadWindow): DecodeResult<RtcmMessage> {
    return decodeRtcmMessage(this.sessions, payload, window);
  }

  decodeFromHex(hex: string): DecodeResult<RtcmMessage> {
    return this.decode(hexToBytes(hex));
  }
}
