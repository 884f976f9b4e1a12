import { z } from 'zod';

/** Sink for diagnostic messages. `console` satisfies it. */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};

function isLogger(value: unknown): value is Logger {
  if (typeof value !== 'object' || value === null) return false;
  return ['debug', 'info', 'warn'].every(
    key => typeof Reflect.get(value, key) === 'function',
  );
}

export const sessionOptionsSchema = z
  .object({
    /** Accumulate bit-usage statistics, reported each time a mask closes a period. */
    statistics: z.boolean().default(false),
    logger: z
      .custom<Logger>(isLogger, { message: 'logger must provide debug, info and warn' })
      .default(silentLogger),
  })
  .strict();

export type SessionOptionsInput = z.input<typeof sessionOptionsSchema>;
export type SessionOptions = z.output<typeof sessionOptionsSchema>;

/** Validate and default session options. Throws `ZodError` on invalid input. */
export function parseSessionOptions(input: SessionOptionsInput = {}): SessionOptions {
  return sessionOptionsSchema.parse(input);
}
