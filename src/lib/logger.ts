import pino from "pino";

export type Logger = pino.Logger;

export function createLogger(level: string = process.env.LOG_LEVEL || "info"): Logger {
  return pino({ level });
}

export function componentLogger(parent: Logger | undefined, component: string): Logger {
  return (parent ?? createLogger()).child({ component });
}
