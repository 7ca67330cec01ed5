/**
 * Logger Port
 */

export interface SeedLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export const consoleLogger: SeedLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message, error) =>
    error === undefined ? console.error(message) : console.error(message, error),
};

export const silentLogger: SeedLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
