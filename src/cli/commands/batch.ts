import chalk from "chalk";
import cliProgress from "cli-progress";
import { loadConfig } from "../../config/configManager.js";
import { createShutdownManager } from "../../shared/shutdown.js";
import { BAR_STYLE, barLabel, progressFields, summarizeBatch } from "../progressView.js";
import { createOrchestrator } from "../runtime.js";
import { fetchEntries, printEntries } from "./playlist.js";

export interface BatchOptions {
  max?: number | undefined;
  quality?: string | undefined;
  output?: string | undefined;
  dryRun?: boolean | undefined;
}

/**
 * Downloads every video of a channel or playlist, one after another.
 */
export async function batchCommand(url: string, options: BatchOptions): Promise<void> {
  const config = loadConfig();
  const entries = await fetchEntries(url, options.max ?? config.maxVideos);

  if (entries.length === 0) {
    console.log(chalk.yellow("\n   No videos found.\n"));
    return;
  }

  if (options.dryRun) {
    console.log(chalk.cyan("\n📋 Would download:\n"));
    printEntries(entries);
    console.log(chalk.gray("\n   Dry run, nothing downloaded.\n"));
    return;
  }

  const orchestrator = createOrchestrator(config, { outputDir: options.output });
  const shutdown = createShutdownManager();
  shutdown.setup();
  shutdown.registerCleanup(() => orchestrator.shutdown());

  const total = entries.length;
  console.log(chalk.blue(`\n🎬 Downloading ${total} videos...\n`));

  const multibar = new cliProgress.MultiBar(
    {
      ...BAR_STYLE,
      clearOnComplete: true,
      format: "   {label} {bar} {percentage}% | {speed} | {size}",
      barsize: 25,
      autopadding: true,
    },
    cliProgress.Presets.shades_grey
  );

  const overallBar = multibar.create(total, 0, {
    label: barLabel("[TOTAL]"),
    speed: `0/${total} done`,
    size: "",
  });

  const handle = orchestrator.startBatch({
    videos: entries.map((entry) => ({ url: entry.url, title: entry.title })),
    quality: options.quality,
  });
  const titles = new Map(handle.jobs.map((job) => [job.id, job.title ?? job.url]));
  const activeBars = new Map<string, cliProgress.SingleBar>();
  let finished = 0;

  const unsubscribe = orchestrator.events.subscribe(handle.batch.id, (event) => {
    switch (event.type) {
      case "job-started":
        activeBars.set(
          event.jobId,
          multibar.create(100, 0, {
            label: barLabel(titles.get(event.jobId) ?? event.jobId),
            speed: "--",
            size: "",
          })
        );
        break;

      case "job-progress":
        activeBars.get(event.jobId)?.update(Math.round(event.progress.percent), progressFields(event.progress));
        break;

      case "video-complete": {
        const bar = activeBars.get(event.jobId);
        if (bar) {
          multibar.remove(bar);
          activeBars.delete(event.jobId);
        }
        finished++;
        overallBar.update(finished, { speed: `${finished}/${total} done` });
        break;
      }

      default:
        break;
    }
  });

  const summary = await handle.done;
  await orchestrator.events.idle();
  unsubscribe();
  multibar.stop();

  if (summary.failed === 0) {
    console.log(chalk.green(`\n${summarizeBatch(summary.succeeded, summary.failed)}\n`));
    return;
  }

  console.log(chalk.yellow(`\n${summarizeBatch(summary.succeeded, summary.failed)}`));
  console.log(chalk.red("\nFailed downloads:"));
  for (const failure of summary.failures) {
    console.log(chalk.red(`   - ${failure.title}: ${failure.errorMessage}`));
  }
  console.log();
  process.exitCode = 1;
}
