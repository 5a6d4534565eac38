import { z } from "zod";
import { DEFAULT_OUTPUT_DIR } from "./paths.js";

/**
 * Quality presets selectable by name.
 */
export const QUALITY_PRESET_NAMES = ["best", "1080p", "720p", "480p", "audio"] as const;

/**
 * Global application configuration schema.
 */
export const configSchema = z.object({
  outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  defaultQuality: z.enum(QUALITY_PRESET_NAMES).default("best"),
  maxVideos: z.number().int().min(1).max(500).default(10),
  batchConcurrency: z.number().int().min(1).max(5).default(1),
  progressIntervalMs: z.number().int().min(0).max(5000).default(200),
  ytDlpPath: z.string().min(1).default("yt-dlp"),
  ffmpegLocation: z.string().min(1).optional(),
  serverHost: z.string().min(1).default("127.0.0.1"),
  serverPort: z.number().int().min(1).max(65535).default(5000),
});

export type Config = z.infer<typeof configSchema>;

export type ConfigKey = keyof Config;

export const CONFIG_KEYS = Object.keys(configSchema.shape).filter(isConfigKey);

export function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(configSchema.shape, key);
}

/**
 * Applies a value given as text (e.g. from the command line) to a config.
 * Numeric keys are converted before validation.
 * @throws ZodError when the result is not a valid config
 */
export function applyConfigEntry(current: Config, key: ConfigKey, raw: string): Config {
  const defaults = configSchema.parse({});
  const value: unknown = typeof defaults[key] === "number" ? Number(raw.trim()) : raw.trim();
  return configSchema.parse({ ...current, [key]: value });
}
