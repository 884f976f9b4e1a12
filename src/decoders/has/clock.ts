import type { BitCursor } from '../../BitCursor';
import { FIELDS, scaleRaw } from '../../fields/FieldCodec';
import { formatFixed } from '../../helpers';
import type { ClockCorrection } from '../../types';

/** Raw clock value telling the user not to use the satellite. */
export const DO_NOT_USE = 2 ** (FIELDS.hasClock.width - 1) - 1;

/** Read one 13-bit HAS clock correction and apply its system multiplier. */
export function readHasClock(cursor: BitCursor, satellite: string, multiplier: number): ClockCorrection {
  const raw = cursor.readSigned(FIELDS.hasClock.width);
  const scaled = scaleRaw(raw, FIELDS.hasClock);
  return {
    kind: 'clock',
    satellite,
    c0: scaled === null ? null : scaled * multiplier,
    multiplier,
    doNotUse: raw === DO_NOT_USE,
  };
}

export function formatHasClock(record: ClockCorrection): string {
  return (
    `${record.satellite} d_clock=${formatFixed(record.c0, 7, 3)}m` +
    (record.doNotUse ? ' do_not_use' : '')
  );
}
