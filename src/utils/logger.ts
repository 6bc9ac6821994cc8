import pino, { type Logger } from "pino";
import { cfg } from "../config";

export type { Logger };

export function createLogger(name: string): Logger {
  return pino({ name, level: cfg.LOG_LEVEL });
}
