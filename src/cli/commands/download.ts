import chalk from "chalk";
import cliProgress from "cli-progress";
import ora from "ora";
import { loadConfig } from "../../config/configManager.js";
import { buildQualityOptions } from "../../downloader/quality.js";
import type { VideoInfo } from "../../downloader/types.js";
import { formatBytes } from "../../shared/format.js";
import { getFileSize } from "../../shared/fs.js";
import { createShutdownManager } from "../../shared/shutdown.js";
import { BAR_STYLE, barLabel, progressFields } from "../progressView.js";
import { pickQuality } from "../qualityPick.js";
import { createOrchestrator } from "../runtime.js";

export interface DownloadOptions {
  quality?: string | undefined;
  output?: string | undefined;
  title?: string | undefined;
  /** 1-based entry of the quality list `info` prints */
  pick?: number | undefined;
}

/**
 * Downloads one video with a live progress bar.
 */
export async function downloadCommand(url: string, options: DownloadOptions): Promise<void> {
  const config = loadConfig();
  const orchestrator = createOrchestrator(config, { outputDir: options.output });

  const shutdown = createShutdownManager();
  shutdown.setup();
  shutdown.registerCleanup(() => orchestrator.shutdown());

  let title = options.title;
  let quality = options.quality;
  if (!title || options.pick !== undefined) {
    const spinner = ora("Looking up video...").start();
    let info: VideoInfo;
    try {
      info = await orchestrator.fetchInfo(url);
      spinner.succeed(`Found: ${info.title}`);
    } catch (error) {
      spinner.fail("Could not fetch video info");
      throw error;
    }
    title = title || info.title;

    if (options.pick !== undefined) {
      const qualities = buildQualityOptions(info.availableFormats);
      quality = pickQuality(qualities, options.pick);
      console.log(chalk.gray(`   Quality: ${qualities[options.pick - 1]?.label ?? quality}`));
    }
  }

  const progressBar = new cliProgress.SingleBar(
    {
      ...BAR_STYLE,
      format: "   {bar} {percentage}% | {speed} | ETA {eta} | {size}",
      barsize: 30,
    },
    cliProgress.Presets.shades_grey
  );

  const handle = orchestrator.startDownload({ url, quality, title });
  let barStarted = false;

  const unsubscribe = orchestrator.events.subscribe(handle.job.id, (event) => {
    if (event.type !== "job-progress") return;
    const fields = progressFields(event.progress);
    if (!barStarted) {
      console.log(chalk.blue(`\n⬇️  ${barLabel(title ?? url).trimEnd()}\n`));
      progressBar.start(100, 0, fields);
      barStarted = true;
    }
    progressBar.update(Math.round(event.progress.percent), fields);
  });

  const result = await handle.done;
  await orchestrator.events.idle();
  unsubscribe();
  if (barStarted) progressBar.stop();

  if (result.state !== "completed" || !result.resultPath) {
    console.log(chalk.red(`\n❌ Download failed: ${result.errorMessage ?? "unknown error"}\n`));
    process.exitCode = 1;
    return;
  }

  const size = await getFileSize(result.resultPath);
  console.log(chalk.green(`\n✅ Saved to ${result.resultPath}`));
  if (size !== null) {
    console.log(chalk.gray(`   ${formatBytes(size)}`));
  }
  console.log();
}
