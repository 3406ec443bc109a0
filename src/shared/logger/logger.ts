import pino from "pino";

export const logger = pino({
  name: "prospectus-insight",
  level:
    process.env.LOG_LEVEL ??
    (process.env.NODE_ENV === "production" ? "info" : "debug"),
});

export type Logger = typeof logger;
