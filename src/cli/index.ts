#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { batchCommand, type BatchOptions } from "./commands/batch.js";
import { configGetCommand, configSetCommand, configShowCommand } from "./commands/config.js";
import { downloadCommand, type DownloadOptions } from "./commands/download.js";
import { infoCommand } from "./commands/info.js";
import { playlistCommand, type PlaylistOptions } from "./commands/playlist.js";
import { serveCommand, type ServeOptions } from "./commands/serve.js";

// Global error handler to ensure clean exit
process.on("unhandledRejection", (reason) => {
  console.error(chalk.red("\n❌ Unhandled error"));
  if (reason instanceof Error) {
    console.error(chalk.gray(`   ${reason.message}`));
  }
  process.exit(1);
});

// Helper to wrap async actions and handle errors
function wrapAction<T extends unknown[]>(fn: (...args: T) => Promise<void>): (...args: T) => void {
  return (...args: T) => {
    fn(...args).catch((error: unknown) => {
      console.error(chalk.red("\n❌ Command failed"));
      if (error instanceof Error) {
        console.error(chalk.gray(`   ${error.message}`));
      }
      process.exit(1);
    });
  };
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive whole number.");
  }
  return parsed;
}

const program = new Command();

program
  .name("vidgrab")
  .description("Download online videos and playlists with live progress")
  .version("0.1.0");

program
  .command("info <url>")
  .description("Show title, uploader, duration and available qualities")
  .action(wrapAction(infoCommand));

program
  .command("download <url>")
  .description("Download a single video")
  .option("-q, --quality <quality>", "Quality preset (best, 1080p, 720p, 480p, audio) or a raw selector")
  .option("-o, --output <dir>", "Download directory (default: configured outputDir)")
  .option("-t, --title <title>", "Title to show instead of looking it up")
  .option("-p, --pick <n>", "Quality by its number in the list `vidgrab info` prints", parsePositiveInt)
  .action(wrapAction((url: string, options: DownloadOptions) => downloadCommand(url, options)));

program
  .command("playlist <url>")
  .description("List the videos of a channel or playlist")
  .option("--max <n>", "Maximum number of videos to list", parsePositiveInt)
  .action(wrapAction((url: string, options: PlaylistOptions) => playlistCommand(url, options)));

program
  .command("batch <url>")
  .description("Download every video of a channel or playlist")
  .option("--max <n>", "Maximum number of videos to download", parsePositiveInt)
  .option("-q, --quality <quality>", "Quality preset or raw selector")
  .option("-o, --output <dir>", "Download directory (default: configured outputDir)")
  .option("--dry-run", "List the videos without downloading")
  .action(wrapAction((url: string, options: BatchOptions) => batchCommand(url, options)));

program
  .command("serve")
  .description("Start the HTTP API with live progress events")
  .option("--host <host>", "Interface to bind (default: configured serverHost)")
  .option("--port <port>", "Port to listen on (default: configured serverPort)", parsePositiveInt)
  .action(wrapAction((options: ServeOptions) => serveCommand(options)));

// Config commands
const configCmd = program.command("config").description("Manage configuration");

configCmd.command("show").description("Show all configuration values").action(configShowCommand);

configCmd.command("get <key>").description("Get a configuration value").action(configGetCommand);

configCmd
  .command("set <key> <value>")
  .description("Set a configuration value")
  .action(configSetCommand);

// Parse and run
program.parse();
