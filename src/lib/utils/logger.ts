// src/lib/utils/logger.ts

/** The slice of `console` the services write to. Tests pass their own. */
export type Logger = Pick<Console, "log" | "warn" | "error">;

export const consoleLogger: Logger = console;
