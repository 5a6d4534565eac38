/**
 * DownloadEngine backed by the yt-dlp binary (with ffmpeg for merging).
 */
import { execa, ExecaError } from "execa";
import { engineInfoSchema } from "./schemas.js";
import {
  EngineError,
  type DownloadEngine,
  type DownloadRequest,
  type EngineInfo,
  type MetadataOptions,
  type ProgressHook,
} from "./types.js";
import {
  buildDownloadArgs,
  buildMetadataArgs,
  extractEngineMessage,
  parseFinalPathLine,
  parseProgressLine,
} from "./ytDlpArgs.js";

export interface YtDlpEngineOptions {
  /** Path or command name of the yt-dlp binary */
  binaryPath: string;
  /** Directory (or binary path) handed to --ffmpeg-location */
  ffmpegLocation?: string | undefined;
}

/**
 * Converts whatever execa threw into an EngineError.
 */
function toEngineError(error: unknown): EngineError {
  if (error instanceof EngineError) return error;

  if (error instanceof ExecaError) {
    const stderr = typeof error.stderr === "string" ? error.stderr : "";
    if (error.isCanceled) {
      return new EngineError("cancelled", "Engine run was cancelled", { stderr, cause: error });
    }
    if (error.code === "ENOENT") {
      return new EngineError("spawn-failed", `Engine binary not found: ${error.command}`, {
        cause: error,
      });
    }
    return new EngineError("exited", extractEngineMessage(stderr, error.shortMessage), {
      stderr,
      exitCode: error.exitCode,
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new EngineError("spawn-failed", message, { cause: error });
}

export class YtDlpEngine implements DownloadEngine {
  private readonly binaryPath: string;
  private readonly ffmpegLocation: string | undefined;

  constructor(options: YtDlpEngineOptions) {
    this.binaryPath = options.binaryPath;
    this.ffmpegLocation = options.ffmpegLocation;
  }

  async fetchMetadata(url: string, options: MetadataOptions): Promise<EngineInfo | null> {
    const args = buildMetadataArgs(url, { flat: options.flat, maxEntries: options.maxEntries });

    let stdout: string;
    try {
      const result = await execa(this.binaryPath, args, {
        ...(options.signal ? { cancelSignal: options.signal } : {}),
      });
      stdout = result.stdout;
    } catch (error) {
      throw toEngineError(error);
    }

    const text = stdout.trim();
    if (!text || text === "null") return null;

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new EngineError("invalid-output", "Engine returned malformed JSON", { cause: error });
    }

    const parsed = engineInfoSchema.safeParse(json);
    if (!parsed.success) {
      throw new EngineError("invalid-output", `Unexpected metadata shape: ${parsed.error.message}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async runDownload(request: DownloadRequest, onProgress: ProgressHook): Promise<string> {
    const args = buildDownloadArgs(request, { ffmpegLocation: this.ffmpegLocation });
    const subprocess = execa(this.binaryPath, args, {
      ...(request.signal ? { cancelSignal: request.signal } : {}),
    });

    const consumeOutput = async (): Promise<string | null> => {
      let finalPath: string | null = null;
      for await (const line of subprocess) {
        const progress = parseProgressLine(line);
        if (progress) {
          onProgress(progress);
          continue;
        }
        finalPath = parseFinalPathLine(line) ?? finalPath;
      }
      return finalPath;
    };

    let finalPath: string | null;
    try {
      [finalPath] = await Promise.all([consumeOutput(), subprocess]);
    } catch (error) {
      throw toEngineError(error);
    }

    if (!finalPath) {
      throw new EngineError("invalid-output", "Engine finished without reporting an output file");
    }
    return finalPath;
  }
}
