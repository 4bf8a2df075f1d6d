/**
 * Console-compatible logger accepted by services
 */
export type Logger = Pick<Console, "info" | "warn" | "error">;

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
