/**
 * Logger port injected into the pagination middleware and the demo app
 * Tests pass vi.fn() doubles in its place
 */

export interface ILogger {
  log(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
