import { statSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import * as log from "./log.ts";
import type { LogLevel } from "./log.ts";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const envSchema = z.object({
  FOLIO_VAULT: z.string().min(1).optional(),
  FOLIO_DAILY_NOTES: z.string().min(1).optional(),
  FOLIO_TEMPLATES: z.string().min(1).default("templates"),
  FOLIO_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  PORT: z.coerce.number().int().positive().default(3001),
});

export interface Config {
  vaultPath: string;
  /** Folder holding daily notes, relative to the vault */
  dailyNotesPath?: string;
  /** Folder holding templates, relative to the vault */
  templatesPath: string;
  logLevel: LogLevel;
  port: number;
}

/**
 * Read configuration from the environment. An explicit vault argument wins
 * over FOLIO_VAULT.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  vaultArg?: string
): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${detail}`);
  }

  const vault = vaultArg ?? parsed.data.FOLIO_VAULT;
  if (!vault) {
    throw new ConfigError("Vault path missing: pass it as an argument or set FOLIO_VAULT");
  }

  const vaultPath = resolve(vault);
  let isDirectory = false;
  try {
    isDirectory = statSync(vaultPath).isDirectory();
  } catch {
    throw new ConfigError(`Vault location does not exist: ${vaultPath}`);
  }
  if (!isDirectory) throw new ConfigError(`Vault location is not a directory: ${vaultPath}`);

  return {
    vaultPath,
    dailyNotesPath: parsed.data.FOLIO_DAILY_NOTES,
    templatesPath: parsed.data.FOLIO_TEMPLATES,
    logLevel: parsed.data.FOLIO_LOG_LEVEL,
    port: parsed.data.PORT,
  };
}

/** Load configuration for an entry point, exiting with usage help when it is invalid. */
export function loadConfigOrExit(usage: string, vaultArg?: string): Config {
  try {
    const config = loadConfig(process.env, vaultArg);
    log.setLogLevel(config.logLevel);
    return config;
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    log.error(err.message);
    log.error(usage);
    return process.exit(1);
  }
}
