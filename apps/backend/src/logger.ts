import { pino } from "pino";

export const logger = pino({
  name: "structured-cli-bridge",
  level: process.env.LOG_LEVEL ?? "info"
});

export type Logger = typeof logger;
