/**
 * Adapter between the job core and the external download engine.
 * Every engine failure leaves this module as a FetchError or DownloadError.
 */
import { dirname } from "node:path";
import { ensureDir } from "../shared/fs.js";
import type {
  DownloadEngine,
  EngineEntry,
  EngineFormat,
  EngineInfo,
  PostProcessOptions,
  RawProgress,
} from "../engine/types.js";
import { classifyDownloadError, classifyFetchError, FetchError } from "./errors.js";
import { buildQualityOptions } from "./quality.js";
import type { FormatDescriptor, PlaylistEntry, QualityOption, VideoInfo } from "./types.js";

/**
 * Post-processing applied to every download: one mp4 container,
 * AAC audio for player compatibility, no thumbnails, no leftover streams.
 */
export const DEFAULT_POST_PROCESS: PostProcessOptions = {
  container: "mp4",
  audioCodec: "aac",
  audioBitrate: "192k",
  embedThumbnail: false,
  keepIntermediateFiles: false,
};

const UNKNOWN = "Unknown";

function toWholeSeconds(value: number | null | undefined): number {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

function toFormatDescriptor(format: EngineFormat): FormatDescriptor {
  return {
    formatId: format.format_id ?? "",
    container: format.ext ?? "",
    resolutionLabel: format.resolution ?? "audio only",
    fileSizeBytes: format.filesize ?? format.filesize_approx ?? undefined,
    videoCodec: format.vcodec ?? "none",
    audioCodec: format.acodec ?? "none",
    height: format.height ?? 0,
    frameRate: format.fps ?? 0,
  };
}

function toPlaylistEntry(entry: EngineEntry): PlaylistEntry {
  return {
    url: entry.url ?? entry.webpage_url ?? "",
    title: entry.title ?? UNKNOWN,
    durationSeconds: toWholeSeconds(entry.duration),
    thumbnailUrl: entry.thumbnail ?? "",
  };
}

export class DownloadAdapter {
  constructor(
    private readonly engine: DownloadEngine,
    private readonly postProcess: PostProcessOptions = DEFAULT_POST_PROCESS
  ) {}

  /**
   * Fetches metadata for a single video without downloading it.
   */
  async fetchInfo(url: string): Promise<VideoInfo> {
    let info: EngineInfo | null;
    try {
      info = await this.engine.fetchMetadata(url, { flat: false });
    } catch (error) {
      throw classifyFetchError(error);
    }

    if (!info) {
      throw new FetchError("not-found", `No video found at ${url}`);
    }

    const availableFormats = (info.formats ?? [])
      .filter((format) => format.vcodec !== "none" || format.acodec !== "none")
      .map(toFormatDescriptor);

    return Object.freeze({
      url,
      title: info.title ?? UNKNOWN,
      uploaderName: info.uploader ?? UNKNOWN,
      durationSeconds: toWholeSeconds(info.duration),
      thumbnailUrl: info.thumbnail ?? "",
      availableFormats: Object.freeze(availableFormats),
    });
  }

  /**
   * Lists the selectable qualities for a video.
   */
  async listQualityOptions(url: string): Promise<QualityOption[]> {
    const info = await this.fetchInfo(url);
    return buildQualityOptions(info.availableFormats);
  }

  /**
   * Lists the entries of a playlist or channel without resolving them.
   * An empty listing is a valid result.
   */
  async listPlaylistEntries(url: string, maxEntries?: number): Promise<PlaylistEntry[]> {
    const limit = maxEntries !== undefined && maxEntries > 0 ? Math.floor(maxEntries) : undefined;

    let info: EngineInfo | null;
    try {
      info = await this.engine.fetchMetadata(url, { flat: true, maxEntries: limit });
    } catch (error) {
      throw classifyFetchError(error);
    }

    const entries = (info?.entries ?? [])
      .filter((entry): entry is EngineEntry => entry !== null)
      .map(toPlaylistEntry);

    return limit === undefined ? entries : entries.slice(0, limit);
  }

  /**
   * Downloads one video and resolves with the final file path.
   */
  async download(
    url: string,
    qualitySelector: string,
    outputTemplate: string,
    onProgress: (progress: RawProgress) => void,
    signal?: AbortSignal
  ): Promise<string> {
    try {
      await ensureDir(dirname(outputTemplate));
      return await this.engine.runDownload(
        { url, formatSelector: qualitySelector, outputTemplate, postProcess: this.postProcess, signal },
        onProgress
      );
    } catch (error) {
      throw classifyDownloadError(error);
    }
  }
}
