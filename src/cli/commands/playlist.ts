import chalk from "chalk";
import ora from "ora";
import { loadConfig } from "../../config/configManager.js";
import type { PlaylistEntry } from "../../downloader/types.js";
import { formatDuration, truncate } from "../../shared/format.js";
import { createOrchestrator } from "../runtime.js";

export interface PlaylistOptions {
  max?: number | undefined;
}

/**
 * Fetches a channel or playlist listing with a spinner.
 */
export async function fetchEntries(url: string, maxEntries: number): Promise<PlaylistEntry[]> {
  const orchestrator = createOrchestrator(loadConfig());
  const spinner = ora("Fetching playlist...").start();

  try {
    const entries = await orchestrator.listPlaylistEntries(url, maxEntries);
    spinner.succeed(`Found ${entries.length} videos`);
    return entries;
  } catch (error) {
    spinner.fail("Could not fetch playlist");
    throw error;
  }
}

export function printEntries(entries: PlaylistEntry[]): void {
  const width = String(entries.length).length;
  entries.forEach((entry, index) => {
    const duration = entry.durationSeconds > 0 ? formatDuration(entry.durationSeconds) : "--:--";
    console.log(
      `   ${chalk.gray(String(index + 1).padStart(width))}. ${chalk.white(truncate(entry.title, 60))} ${chalk.gray(`(${duration})`)}`
    );
    console.log(chalk.gray(`      ${entry.url}`));
  });
}

/**
 * Lists the videos of a channel or playlist.
 */
export async function playlistCommand(url: string, options: PlaylistOptions): Promise<void> {
  const maxEntries = options.max ?? loadConfig().maxVideos;
  const entries = await fetchEntries(url, maxEntries);

  if (entries.length === 0) {
    console.log(chalk.yellow("\n   No videos found.\n"));
    return;
  }

  console.log(chalk.cyan("\n📋 Videos:\n"));
  printEntries(entries);
  console.log();
}
