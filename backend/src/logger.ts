import pino from "pino";

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

export const logger = pino({
  level: resolveLevel(),
  base: { service: "ratewarden" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type { Logger } from "pino";

export const serverLog = logger.child({ module: "server" });
export const limiterLog = logger.child({ module: "limiter" });
export const storeLog = logger.child({ module: "store" });
export const abuseLog = logger.child({ module: "abuse" });
export const sinkLog = logger.child({ module: "sink" });
