import { describe, expect, it } from "vitest";
import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { EngineError, type RawProgress } from "../engine/types.js";
import { FakeEngine, videoMetadata } from "../testing/fakeEngine.js";
import { DownloadAdapter } from "./adapter.js";
import { DownloadError, FetchError } from "./errors.js";

const URL_1 = "https://video.example.com/watch/1";
const LIST_URL = "https://video.example.com/list/abc";

describe("DownloadAdapter.fetchInfo", () => {
  it("maps engine metadata into VideoInfo", async () => {
    const engine = new FakeEngine().setMetadata(URL_1, videoMetadata());
    const info = await new DownloadAdapter(engine).fetchInfo(URL_1);

    expect(info.title).toBe("Test Video");
    expect(info.uploaderName).toBe("Test Channel");
    expect(info.durationSeconds).toBe(125);
    expect(info.availableFormats.map((f) => f.formatId)).toEqual(["140", "136", "137"]);
    expect(info.availableFormats[0]?.height).toBe(0);
    expect(Object.isFrozen(info)).toBe(true);
  });

  it("queries without expanding playlists", async () => {
    const engine = new FakeEngine().setMetadata(URL_1, videoMetadata());
    await new DownloadAdapter(engine).fetchInfo(URL_1);
    expect(engine.calls[0]).toEqual({ kind: "metadata", url: URL_1, flat: false, maxEntries: undefined });
  });

  it("fills defaults for missing fields", async () => {
    const engine = new FakeEngine().setMetadata(URL_1, {});
    const info = await new DownloadAdapter(engine).fetchInfo(URL_1);

    expect(info).toEqual({
      url: URL_1,
      title: "Unknown",
      uploaderName: "Unknown",
      durationSeconds: 0,
      thumbnailUrl: "",
      availableFormats: [],
    });
  });

  it("drops formats with neither video nor audio", async () => {
    const engine = new FakeEngine().setMetadata(
      URL_1,
      videoMetadata({
        formats: [
          { format_id: "sb0", ext: "mhtml", vcodec: "none", acodec: "none" },
          { format_id: "18", ext: "mp4", vcodec: "avc1", acodec: "mp4a", height: 360 },
        ],
      })
    );
    const info = await new DownloadAdapter(engine).fetchInfo(URL_1);
    expect(info.availableFormats.map((f) => f.formatId)).toEqual(["18"]);
  });

  it("fails with not-found on an empty result", async () => {
    const engine = new FakeEngine().setMetadata(URL_1, null);
    const error = await new DownloadAdapter(engine).fetchInfo(URL_1).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect((error as FetchError).reason).toBe("not-found");
  });

  it("classifies engine failures", async () => {
    const engine = new FakeEngine()
      .setMetadata(URL_1, new EngineError("exited", "[generic] Unable to download webpage: HTTP Error 503"))
      .setMetadata(LIST_URL, new EngineError("invalid-output", "Engine returned malformed JSON"));
    const adapter = new DownloadAdapter(engine);

    await expect(adapter.fetchInfo(URL_1)).rejects.toMatchObject({ reason: "network-failure" });
    await expect(adapter.fetchInfo(LIST_URL)).rejects.toMatchObject({ reason: "parse-failure" });
    await expect(adapter.fetchInfo("https://nowhere.example.com")).rejects.toMatchObject({
      reason: "not-found",
    });
  });
});

describe("DownloadAdapter.listQualityOptions", () => {
  it("builds the ladder from fetched formats", async () => {
    const engine = new FakeEngine().setMetadata(URL_1, videoMetadata());
    const options = await new DownloadAdapter(engine).listQualityOptions(URL_1);

    expect(options.map((o) => o.label)).toEqual([
      "Best Quality (Video + Audio)",
      "1080p (Video + Audio)",
      "720p (Video + Audio)",
      "Audio Only (Best Quality)",
      "Audio Only (M4A)",
    ]);
  });

  it("returns an empty list when there are no formats", async () => {
    const engine = new FakeEngine().setMetadata(URL_1, videoMetadata({ formats: [] }));
    await expect(new DownloadAdapter(engine).listQualityOptions(URL_1)).resolves.toEqual([]);
  });
});

describe("DownloadAdapter.listPlaylistEntries", () => {
  const entries = [1, 2, 3, 4, 5].map((n) => ({
    url: `https://video.example.com/watch/${n}`,
    title: `Episode ${n}`,
    duration: n * 60,
    thumbnail: null,
  }));

  it("returns exactly maxEntries entries in source order", async () => {
    const engine = new FakeEngine().setMetadata(LIST_URL, { _type: "playlist", entries });
    const result = await new DownloadAdapter(engine).listPlaylistEntries(LIST_URL, 2);

    expect(result).toEqual([
      { url: "https://video.example.com/watch/1", title: "Episode 1", durationSeconds: 60, thumbnailUrl: "" },
      { url: "https://video.example.com/watch/2", title: "Episode 2", durationSeconds: 120, thumbnailUrl: "" },
    ]);
    expect(engine.calls[0]).toEqual({ kind: "metadata", url: LIST_URL, flat: true, maxEntries: 2 });
  });

  it("returns everything without a cap", async () => {
    const engine = new FakeEngine().setMetadata(LIST_URL, { entries });
    await expect(new DownloadAdapter(engine).listPlaylistEntries(LIST_URL)).resolves.toHaveLength(5);
  });

  it("skips unresolved entries and falls back to the page URL", async () => {
    const engine = new FakeEngine().setMetadata(LIST_URL, {
      entries: [null, { webpage_url: "https://video.example.com/watch/9", title: null }],
    });
    const result = await new DownloadAdapter(engine).listPlaylistEntries(LIST_URL);

    expect(result).toEqual([
      { url: "https://video.example.com/watch/9", title: "Unknown", durationSeconds: 0, thumbnailUrl: "" },
    ]);
  });

  it("treats a missing listing as empty", async () => {
    const engine = new FakeEngine().setMetadata(LIST_URL, null);
    await expect(new DownloadAdapter(engine).listPlaylistEntries(LIST_URL, 3)).resolves.toEqual([]);
  });
});

describe("DownloadAdapter.download", () => {
  it("forwards progress and resolves with the final path", async () => {
    const dir = await mkdtemp(join(tmpdir(), "vidgrab-adapter-"));
    const template = join(dir, "nested", "%(title)s.%(ext)s");
    const engine = new FakeEngine().setDownload(URL_1, {
      progress: [{ status: "downloading", downloadedBytes: 10, totalBytes: 20 }],
      result: join(dir, "nested", "Test Video.mp4"),
    });

    const seen: RawProgress[] = [];
    const path = await new DownloadAdapter(engine).download(URL_1, "best", template, (p) => seen.push(p));

    expect(path).toBe(join(dir, "nested", "Test Video.mp4"));
    expect(seen).toEqual([{ status: "downloading", downloadedBytes: 10, totalBytes: 20 }]);
    expect(engine.calls[0]).toMatchObject({ formatSelector: "best", outputTemplate: template });
  });

  it("classifies engine failures", async () => {
    const dir = await mkdtemp(join(tmpdir(), "vidgrab-adapter-"));
    const template = join(dir, "%(title)s.%(ext)s");
    const engine = new FakeEngine()
      .setDownload(URL_1, { result: new EngineError("exited", "Requested format is not available") })
      .setDownload(LIST_URL, { result: new EngineError("exited", "[Errno 28] No space left on device") });
    const adapter = new DownloadAdapter(engine);

    const unsupported = await adapter.download(URL_1, "best", template, () => {}).catch((e: unknown) => e);
    expect(unsupported).toBeInstanceOf(DownloadError);
    expect((unsupported as DownloadError).reason).toBe("unsupported-format");

    await expect(adapter.download(LIST_URL, "best", template, () => {})).rejects.toMatchObject({
      reason: "disk-failure",
    });
    await expect(
      adapter.download("https://video.example.com/unknown", "best", template, () => {})
    ).rejects.toMatchObject({ reason: "network-failure" });
  });

  it("reports cancellation", async () => {
    const dir = await mkdtemp(join(tmpdir(), "vidgrab-adapter-"));
    const controller = new AbortController();
    controller.abort();
    const engine = new FakeEngine().setDownload(URL_1, { result: "/never.mp4" });

    await expect(
      new DownloadAdapter(engine).download(URL_1, "best", join(dir, "%(title)s.%(ext)s"), () => {}, controller.signal)
    ).rejects.toMatchObject({ reason: "cancelled", message: "Download cancelled" });
  });
});
