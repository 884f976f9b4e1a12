import { type Logger, parseSessionOptions, sessionOptionsSchema, silentLogger } from '../src/config';

describe('session options', () => {
  it('defaults to no statistics and a silent logger', () => {
    const options = parseSessionOptions();
    expect(options.statistics).toBe(false);
    expect(options.logger).toBe(silentLogger);
  });

  it('accepts any object with debug, info and warn', () => {
    const logger: Logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn() };
    const options = parseSessionOptions({ statistics: true, logger });
    expect(options.statistics).toBe(true);
    expect(options.logger).toBe(logger);
  });

  it('accepts console', () => {
    expect(parseSessionOptions({ logger: console }).logger).toBe(console);
  });

  it('rejects a logger missing a level', () => {
    const result = sessionOptionsSchema.safeParse({ logger: { debug: () => undefined } });
    expect(result.success).toBe(false);
  });

  it('rejects a non-boolean statistics flag', () => {
    expect(sessionOptionsSchema.safeParse({ statistics: 'yes' }).success).toBe(false);
  });

  it('rejects unknown keys', () => {
    expect(sessionOptionsSchema.safeParse({ verbose: true }).success).toBe(false);
  });
});
