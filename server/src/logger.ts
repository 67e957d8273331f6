import pino, { type Logger } from "pino";
import { config } from "./config";

export type { Logger };

export const logger: Logger = pino({
  level: config.logLevel,
  base: { service: "chess-rooms" },
});

export const silentLogger: Logger = pino({ level: "silent" });
