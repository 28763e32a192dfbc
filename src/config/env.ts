import fs from "node:fs";
import dotenv from "dotenv";
import { z } from "zod";

export const CONFIG_DEFAULTS = Object.freeze({
  LOG_LEVEL: "info",
  SERVICE_NAME: "payment-field-core",
});

const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const ConfigSchema = z.object({
  LOG_LEVEL: LogLevel,
  SERVICE_NAME: z.string().min(1, "SERVICE_NAME must not be empty"),
});

export type LogLevel = z.infer<typeof LogLevel>;

export interface CoreConfig {
  logLevel: LogLevel;
  serviceName: string;
}

/**
 * Fills `LOG_LEVEL` and `SERVICE_NAME` where they are unset or blank.
 * Writes into `env` and hands the same object back.
 */
export function applyConfigDefaults(env: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  for (const [key, value] of Object.entries(CONFIG_DEFAULTS)) {
    const current = env[key];
    if (current === undefined || current.trim() === "") {
      env[key] = value;
    }
  }
  return env;
}

/**
 * Merges a `.env` file into `env`. Variables that are already set win over
 * the file. Meant for application entry points; nothing in this package
 * calls it on import.
 */
export function loadEnvFile(path: string, env: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const parsed = dotenv.parse(fs.readFileSync(path, "utf8"));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
  return env;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CoreConfig {
  const withDefaults = applyConfigDefaults({ ...env });
  const parsed = ConfigSchema.safeParse({
    LOG_LEVEL: withDefaults.LOG_LEVEL?.trim().toLowerCase(),
    SERVICE_NAME: withDefaults.SERVICE_NAME?.trim(),
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }
  return {
    logLevel: parsed.data.LOG_LEVEL,
    serviceName: parsed.data.SERVICE_NAME,
  };
}
