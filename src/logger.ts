import { createLogger, format, transports, Logger } from "winston";

/**
 * Component logger: `<timestamp> [LEVEL] [COMPONENT] message`.
 * Silent under NODE_ENV=test so jest output stays readable.
 */
export function createEngineLogger(
  component: string,
  level: string = process.env.LOG_LEVEL || "info",
): Logger {
  return createLogger({
    level,
    silent: process.env.NODE_ENV === "test",
    format: format.combine(
      format.timestamp(),
      format.printf(
        ({ timestamp, level, message }) =>
          `${timestamp} [${level.toUpperCase()}] [${component}] ${message}`,
      ),
    ),
    transports: [new transports.Console()],
  });
}
