import pino, { type Logger } from "pino";

import type { AppConfig } from "./config";

export function createLogger(config: Pick<AppConfig, "logLevel" | "prettyLogs">): Logger {
  return pino({
    level: config.logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(config.prettyLogs
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  });
}
