import pino, { type DestinationStream, type Logger } from "pino";
import { CONFIG_DEFAULTS, loadConfig } from "../config/env";

let rootLogger: Logger | undefined;

/**
 * Builds the package logger from `env`. A log level pino does not know
 * falls back to the default level and is reported once as a warning.
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env, destination?: DestinationStream): Logger {
  try {
    const config = loadConfig(env);
    return pino({ level: config.logLevel, base: { service: config.serviceName } }, destination);
  } catch (err) {
    const fallback = pino(
      { level: CONFIG_DEFAULTS.LOG_LEVEL, base: { service: CONFIG_DEFAULTS.SERVICE_NAME } },
      destination
    );
    fallback.warn({ err }, "invalid_log_config");
    return fallback;
  }
}

export function getLogger(): Logger {
  rootLogger ??= createLogger();
  return rootLogger;
}

export function moduleLogger(module: string): Logger {
  return getLogger().child({ module });
}
