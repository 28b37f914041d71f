/**
 * Minimal logging contract for the engine.
 *
 * The engine never writes output on its own. Pass {@link consoleLogger} or an
 * adapter around your application's logger to see what the validator and the
 * roster queries decide.
 *
 * @category Logging
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
};

export const consoleLogger: Logger = {
  debug: (message, meta) => console.debug(message, meta ?? {}),
  info: (message, meta) => console.info(message, meta ?? {}),
  warn: (message, meta) => console.warn(message, meta ?? {}),
};
