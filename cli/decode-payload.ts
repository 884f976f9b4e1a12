#!/usr/bin/env npx tsx
/**
 * CLI tool to decode a file of hex payloads, one message per line.
 *
 * Lines hold framed RTCM3 payloads (message number first) by default, or
 * Galileo HAS messages with --has. Blank lines and lines starting with '#'
 * are skipped.
 *
 * Usage:
 *   npx tsx cli/decode-payload.ts [--trace] [--has] [--stats] <path-to-hex-lines>
 */

import * as fs from 'fs';
import { hexToBytes } from '../src/BitCursor';
import { renderOutcome } from '../src/report';
import { createHasSession, decodeHasMessage } from '../src/session/HasSession';
import type { HasMessage } from '../src/session/HasSession';
import { RtcmDecoder } from '../src/session/RtcmDecoder';
import type { RtcmMessage } from '../src/session/RtcmDecoder';

function main(): void {
  const args = process.argv.slice(2);
  const flags = new Set(args.filter(arg => arg.startsWith('--')));
  const file = args.find(arg => !arg.startsWith('--'));
  if (file === undefined) {
    console.error('Usage: decode-payload [--trace] [--has] [--stats] <path-to-hex-lines>');
    process.exit(1);
  }
  if (!fs.existsSync(file)) {
    console.error(`Error: file not found: ${file}`);
    process.exit(1);
  }

  const options = { statistics: flags.has('--stats'), logger: console };
  const trace = flags.has('--trace');
  const rtcm = new RtcmDecoder(options);
  const has = createHasSession(options);

  const lines = fs.readFileSync(file, 'utf-8').split(/\r?\n/);
  lines.forEach((line, i) => {
    const hex = line.trim();
    if (hex === '' || hex.startsWith('#')) return;
    let payload: Uint8Array;
    try {
      payload = hexToBytes(hex);
    } catch (err) {
      console.error(`line ${i + 1}: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }
    const outcome = flags.has('--has') ? decodeHasMessage(has, payload) : rtcm.decode(payload);
    for (const text of renderOutcome<HasMessage | RtcmMessage>(outcome, { trace })) console.log(text);
  });
}

main();
