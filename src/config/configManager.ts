import Conf from "conf";
import { APP_DIR } from "./paths.js";
import { applyConfigEntry, type Config, type ConfigKey, configSchema } from "./schema.js";

const store = new Conf<Config>({
  projectName: "vidgrab",
  cwd: APP_DIR,
  configName: "config",
  defaults: configSchema.parse({}),
});

/**
 * Reads the stored settings. Values written by older versions or by hand
 * are validated again, with defaults filling the gaps.
 */
export function loadConfig(): Config {
  return configSchema.parse(store.store);
}

/**
 * Sets one value given as text, validating the resulting config before it is written.
 * @throws ZodError when the value is out of range or of the wrong type
 */
export function setConfigValue(key: ConfigKey, raw: string): Config {
  const updated = applyConfigEntry(loadConfig(), key, raw);
  store.store = updated;
  return updated;
}

export function getConfigValue<K extends ConfigKey>(key: K): Config[K] {
  return loadConfig()[key];
}

export function getConfigPath(): string {
  return store.path;
}
