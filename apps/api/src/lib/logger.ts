import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  return pino({
    level,
    redact: {
      paths: ["cookie", "headers.cookie", "headers.Cookie", "req.headers.cookie"],
      censor: "[redacted]"
    }
  });
}

export const silentLogger: Logger = pino({ level: "silent" });
