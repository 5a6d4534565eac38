import chalk from "chalk";
import ora from "ora";
import { loadConfig } from "../../config/configManager.js";
import { buildQualityOptions } from "../../downloader/quality.js";
import type { VideoInfo } from "../../downloader/types.js";
import { formatBytes, formatDuration } from "../../shared/format.js";
import { numberedQualities } from "../qualityPick.js";
import { createOrchestrator } from "../runtime.js";

/**
 * Shows metadata and the available qualities for one video.
 */
export async function infoCommand(url: string): Promise<void> {
  const orchestrator = createOrchestrator(loadConfig());
  const spinner = ora("Fetching video info...").start();

  let info: VideoInfo;
  try {
    info = await orchestrator.fetchInfo(url);
    spinner.succeed("Video found");
  } catch (error) {
    spinner.fail("Could not fetch video info");
    throw error;
  }

  console.log(chalk.cyan("\n📄 Video Info:\n"));
  console.log(`   Title:    ${chalk.white(info.title)}`);
  console.log(`   Uploader: ${chalk.white(info.uploaderName)}`);
  console.log(`   Duration: ${chalk.white(formatDuration(info.durationSeconds))}`);
  if (info.thumbnailUrl) {
    console.log(chalk.gray(`   Thumbnail: ${info.thumbnailUrl}`));
  }

  const qualities = buildQualityOptions(info.availableFormats);
  if (qualities.length === 0) {
    console.log(chalk.yellow("\n   No downloadable formats found.\n"));
    return;
  }

  console.log(chalk.cyan(`\n🎞️  Qualities (${info.availableFormats.length} formats):\n`));
  numberedQualities(qualities).forEach((line, index) => {
    console.log(`   ${chalk.white(line.padEnd(34))} ${chalk.gray(qualities[index]?.selector ?? "")}`);
  });
  console.log(chalk.gray("\n   Download one with: vidgrab download <url> --pick <n>"));

  const largest = Math.max(0, ...info.availableFormats.map((format) => format.fileSizeBytes ?? 0));
  if (largest > 0) {
    console.log(chalk.gray(`\n   Largest single format: ${formatBytes(largest)}`));
  }
  console.log();
}
