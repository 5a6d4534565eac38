import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { expandPath } from "./paths.js";
import type { Config } from "./schema.js";

/**
 * Environment overrides for the server. Empty values count as unset.
 */
const envSchema = z.object({
  VIDGRAB_HOST: z.string().min(1).optional(),
  VIDGRAB_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  VIDGRAB_DOWNLOAD_DIR: z.string().min(1).optional(),
});

export interface ServerSettings {
  host: string;
  port: number;
  /** Absolute download directory */
  outputDir: string;
}

/**
 * Loads a .env file from the working directory into process.env, if present.
 */
export function loadEnvFile(): void {
  loadDotenv();
}

/**
 * Combines stored config with environment overrides. Environment wins.
 * @throws ZodError when an override is malformed, e.g. a non-numeric port
 */
export function resolveServerSettings(config: Config, env: NodeJS.ProcessEnv = process.env): ServerSettings {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""));
  const overrides = envSchema.parse(present);

  return {
    host: overrides.VIDGRAB_HOST ?? config.serverHost,
    port: overrides.VIDGRAB_PORT ?? config.serverPort,
    outputDir: expandPath(overrides.VIDGRAB_DOWNLOAD_DIR ?? config.outputDir),
  };
}
