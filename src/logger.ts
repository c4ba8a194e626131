import pino from "pino";
import { env } from "./config";

export type Logger = pino.Logger;

export const logger: Logger = pino({
  name: "bland-call-client",
  level: env.LOG_LEVEL,
  redact: ["headers.authorization"]
});
