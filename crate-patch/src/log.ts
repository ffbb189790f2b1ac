/**
 * Console logging with the extension prefix.
 */

const PREFIX = "[crate-patch]";

export const log = {
  info(message: string, ...details: unknown[]): void {
    console.log(`${PREFIX} ${message}`, ...details);
  },
  warn(message: string, ...details: unknown[]): void {
    console.warn(`${PREFIX} ${message}`, ...details);
  },
  error(message: string, ...details: unknown[]): void {
    console.error(`${PREFIX} ${message}`, ...details);
  },
};
