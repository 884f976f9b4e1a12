import type { DecodeResult } from './decoders/DecodeResult';

export interface ReportOptions {
  /** Append the per-satellite trace after the summary line. */
  trace?: boolean;
}

/** Render a decode outcome as console lines, without trailing newlines. */
export function renderOutcome<T>(outcome: DecodeResult<T>, options: ReportOptions = {}): string[] {
  switch (outcome.status) {
    case 'ok': {
      const lines = [outcome.value.summary];
      if (options.trace && outcome.value.trace !== '') {
        lines.push(...outcome.value.trace.replace(/\n$/, '').split('\n'));
      }
      return lines;
    }
    case 'insufficient-data':
      return [
        `insufficient data: need ${outcome.needed} bits at offset ${outcome.bitOffset}, ${outcome.available} available`,
      ];
    case 'sequencing-error':
      return [`sequencing error: ${outcome.message}`];
    case 'unknown-enumeration':
      return [`unknown ${outcome.field}: ${outcome.value}`];
    case 'null-data':
      return outcome.reason === 'zero-padding'
        ? [`null data: ${outcome.bitLength} bits of padding`]
        : [`null data: message number ${outcome.messageNumber}, ${outcome.bitLength} bits`];
  }
}
