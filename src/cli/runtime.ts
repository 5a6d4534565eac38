import type { Config } from "../config/schema.js";
import { expandPath } from "../config/paths.js";
import { DownloadAdapter } from "../downloader/adapter.js";
import { YtDlpEngine } from "../engine/ytDlpEngine.js";
import { Orchestrator, type OrchestratorLogger } from "../orchestrator.js";

export interface RuntimeOverrides {
  outputDir?: string | undefined;
  logger?: OrchestratorLogger | undefined;
}

/**
 * Wires engine, adapter and orchestrator from the stored configuration.
 */
export function createOrchestrator(config: Config, overrides: RuntimeOverrides = {}): Orchestrator {
  const engine = new YtDlpEngine({
    binaryPath: expandPath(config.ytDlpPath),
    ffmpegLocation: config.ffmpegLocation ? expandPath(config.ffmpegLocation) : undefined,
  });

  return new Orchestrator({
    adapter: new DownloadAdapter(engine),
    outputDir: expandPath(overrides.outputDir ?? config.outputDir),
    defaultQuality: config.defaultQuality,
    progressIntervalMs: config.progressIntervalMs,
    batchConcurrency: config.batchConcurrency,
    logger: overrides.logger,
  });
}
