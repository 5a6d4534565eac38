import { homedir } from "node:os";
import { join } from "node:path";
import untildify from "untildify";

/** Holds config.json */
export const APP_DIR = join(homedir(), ".vidgrab");

/** Stored unexpanded so the config file stays portable */
export const DEFAULT_OUTPUT_DIR = "~/Downloads/vidgrab";

/**
 * Expand ~ to home directory in paths.
 */
export function expandPath(path: string): string {
  return untildify(path);
}
