import pino, { Logger } from "pino";

export type { Logger };

const defaultLevel = (): string => {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === "test" ? "silent" : "info";
};

export function createLogger(name: string): Logger {
  return pino({ name, level: defaultLevel() });
}
