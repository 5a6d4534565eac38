import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { FastifyInstance } from "fastify";
import { DownloadAdapter } from "../downloader/adapter.js";
import { Orchestrator } from "../orchestrator.js";
import { FakeEngine, progressSteps, videoMetadata } from "../testing/fakeEngine.js";
import { createApiServer } from "./server.js";

const videoUrl = (n: number) => `https://video.example.com/watch/${n}`;
const LIST_URL = "https://video.example.com/list/abc";
const NEVER = new Promise<void>(() => {});

interface ChunkReader {
  read(): Promise<{ done: boolean; value?: Uint8Array | undefined }>;
}

interface StreamedEvent {
  event: string;
  data: unknown;
}

/**
 * Reads text/event-stream frames from a fetch body. Comment frames are skipped.
 */
class EventStreamReader {
  readonly events: StreamedEvent[] = [];
  private buffered = "";
  private readonly decoder = new TextDecoder();

  constructor(private readonly reader: ChunkReader) {}

  async readUntil(event: string): Promise<StreamedEvent[]> {
    while (!this.events.some((streamed) => streamed.event === event)) {
      const { done, value } = await this.reader.read();
      if (done) throw new Error(`Stream ended before ${event}`);
      this.buffered += this.decoder.decode(value, { stream: true });
      this.takeFrames();
    }
    return this.events;
  }

  private takeFrames(): void {
    let end = this.buffered.indexOf("\n\n");
    while (end >= 0) {
      const frame = this.buffered.slice(0, end);
      this.buffered = this.buffered.slice(end + 2);
      end = this.buffered.indexOf("\n\n");
      if (frame.startsWith(":")) continue;

      const [eventLine = "", dataLine = ""] = frame.split("\n");
      const data: unknown = JSON.parse(dataLine.slice("data: ".length));
      this.events.push({ event: eventLine.slice("event: ".length), data });
    }
  }
}

async function openEventStream(baseUrl: string, path: string, signal: AbortSignal) {
  const response = await fetch(`${baseUrl}${path}`, { signal });
  if (!response.body) throw new Error(`No body for ${path}`);
  return { response, stream: new EventStreamReader(response.body.getReader()) };
}

describe("API server", () => {
  let engine: FakeEngine;
  let outputDir: string;
  let orchestrator: Orchestrator | undefined;
  let app: FastifyInstance;
  let closed: boolean;

  beforeEach(async () => {
    closed = false;
    engine = new FakeEngine();
    outputDir = await mkdtemp(join(tmpdir(), "vidgrab-server-"));
    app = await createApiServer({
      logger: false,
      defaultMaxVideos: 3,
      createOrchestrator: (logger) => {
        orchestrator = new Orchestrator({ adapter: new DownloadAdapter(engine), outputDir, logger });
        return orchestrator;
      },
    });
  });

  afterEach(async () => {
    if (!closed) await app.close();
  });

  it("reports health", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ ok: true, running_jobs: 0, running_batches: 0 });
  });

  describe("POST /api/info", () => {
    it("returns the video summary with its qualities", async () => {
      engine.setMetadata(videoUrl(1), videoMetadata());

      const response = await app.inject({ method: "POST", url: "/api/info", payload: { url: videoUrl(1) } });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        title: "Test Video",
        uploader: "Test Channel",
        duration: "2:05",
        thumbnail: "https://example.com/thumb.jpg",
        qualities: [
          { id: "bestvideo+bestaudio/best", label: "Best Quality (Video + Audio)" },
          { id: "bestvideo[height<=1080]+bestaudio/best[height<=1080]", label: "1080p (Video + Audio)" },
          { id: "bestvideo[height<=720]+bestaudio/best[height<=720]", label: "720p (Video + Audio)" },
          { id: "bestaudio/best", label: "Audio Only (Best Quality)" },
          { id: "bestaudio[ext=m4a]/bestaudio", label: "Audio Only (M4A)" },
        ],
      });
      expect(engine.calls).toHaveLength(1);
    });

    it("requires a URL", async () => {
      const response = await app.inject({ method: "POST", url: "/api/info", payload: { url: "  " } });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: "URL is required" });
    });

    it("reports a failed lookup", async () => {
      const response = await app.inject({ method: "POST", url: "/api/info", payload: { url: videoUrl(404) } });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: "Could not fetch video info", reason: "not-found" });
    });
  });

  describe("POST /api/channel", () => {
    const entries = [1, 2, 3, 4, 5].map((n) => ({ url: videoUrl(n), title: `Episode ${n}`, duration: n * 60 }));

    it("lists at most max_videos entries", async () => {
      engine.setMetadata(LIST_URL, { entries });

      const response = await app.inject({
        method: "POST",
        url: "/api/channel",
        payload: { url: LIST_URL, max_videos: 2 },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        videos: [
          { url: videoUrl(1), title: "Episode 1", duration: "1:00", thumbnail: "" },
          { url: videoUrl(2), title: "Episode 2", duration: "2:00", thumbnail: "" },
        ],
        count: 2,
      });
    });

    it("falls back to the configured cap", async () => {
      engine.setMetadata(LIST_URL, { entries });
      const response = await app.inject({ method: "POST", url: "/api/channel", payload: { url: LIST_URL } });
      expect(response.json()).toMatchObject({ count: 3 });
    });

    it("shows unknown durations as placeholders", async () => {
      engine.setMetadata(LIST_URL, { entries: [{ url: videoUrl(1), title: "Live" }] });
      const response = await app.inject({ method: "POST", url: "/api/channel", payload: { url: LIST_URL } });
      expect(response.json()).toMatchObject({ videos: [{ duration: "--:--" }] });
    });

    it("rejects an empty listing", async () => {
      engine.setMetadata(LIST_URL, { entries: [] });
      const response = await app.inject({ method: "POST", url: "/api/channel", payload: { url: LIST_URL } });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: "Could not fetch videos" });
    });
  });

  describe("POST /api/download", () => {
    it("accepts the job and runs it", async () => {
      engine.setDownload(videoUrl(1), { result: join(outputDir, "Test Video.mp4") });

      const response = await app.inject({ method: "POST", url: "/api/download", payload: { url: videoUrl(1) } });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toEqual({ id: videoUrl(1) });
      await vi.waitFor(() => expect(orchestrator?.getJob(videoUrl(1))?.state).toBe("completed"));

      const job = await app.inject({ method: "GET", url: `/api/jobs/${encodeURIComponent(videoUrl(1))}` });
      expect(job.json()).toMatchObject({
        id: videoUrl(1),
        state: "completed",
        result_path: join(outputDir, "Test Video.mp4"),
      });
    });

    it("requires a URL", async () => {
      const response = await app.inject({ method: "POST", url: "/api/download", payload: {} });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: "URL is required" });
    });

    it("rejects an id that is still running", async () => {
      engine.setDownload(videoUrl(1), { gate: NEVER, result: "/never.mp4" });
      const payload = { url: videoUrl(1), id: "dup" };

      const first = await app.inject({ method: "POST", url: "/api/download", payload });
      const second = await app.inject({ method: "POST", url: "/api/download", payload });

      expect(first.statusCode).toBe(202);
      expect(second.statusCode).toBe(409);
      expect(second.json()).toEqual({ error: "Job dup is already running" });
    });
  });

  describe("POST /api/batch", () => {
    it("accepts the batch and names its jobs", async () => {
      engine.setDownload(videoUrl(1), { result: join(outputDir, "one.mp4") });

      const response = await app.inject({
        method: "POST",
        url: "/api/batch",
        payload: { batch_id: "b", videos: [{ url: videoUrl(1), title: "One" }, { url: videoUrl(2) }] },
      });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toEqual({ batch_id: "b", job_ids: ["b_0", "b_1"] });
      await vi.waitFor(() => expect(orchestrator?.getBatch("b")?.state).toBe("completed"));

      const batch = await app.inject({ method: "GET", url: "/api/batches/b" });
      expect(batch.json()).toEqual({
        batch_id: "b",
        job_ids: ["b_0", "b_1"],
        current: 2,
        total: 2,
        succeeded: 1,
        failed: 1,
        state: "completed",
      });
    });

    it("requires at least one video", async () => {
      const response = await app.inject({ method: "POST", url: "/api/batch", payload: { videos: [] } });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: "At least one video is required" });
    });
  });

  describe("jobs", () => {
    it("cancels a running job", async () => {
      engine.setDownload(videoUrl(1), { gate: NEVER, result: "/never.mp4" });
      await app.inject({ method: "POST", url: "/api/download", payload: { url: videoUrl(1), id: "slow" } });

      const response = await app.inject({ method: "POST", url: "/api/jobs/slow/cancel" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ id: "slow", cancelled: true });
      await vi.waitFor(() =>
        expect(orchestrator?.getJob("slow")).toMatchObject({ state: "failed", errorMessage: "Download cancelled" })
      );
    });

    it("answers 404 for unknown ids", async () => {
      const lookup = await app.inject({ method: "GET", url: "/api/jobs/nope" });
      const cancel = await app.inject({ method: "POST", url: "/api/jobs/nope/cancel" });

      expect(lookup.statusCode).toBe(404);
      expect(lookup.json()).toEqual({ error: "Unknown job: nope" });
      expect(cancel.statusCode).toBe(404);
    });
  });

  describe("event streams", () => {
    let baseUrl: string;
    let disconnect: AbortController;

    beforeEach(async () => {
      baseUrl = await app.listen({ port: 0, host: "127.0.0.1" });
      disconnect = new AbortController();
    });

    afterEach(() => {
      disconnect.abort();
    });

    it("streams one job from start to completion", async () => {
      engine.setDownload(videoUrl(1), { progress: progressSteps(1000, 1), result: join(outputDir, "Clip.mp4") });

      const { response, stream } = await openEventStream(baseUrl, "/api/events/jobs/clip", disconnect.signal);
      expect(response.status).toBe(200);
      expect(response.headers.get("content-type")).toBe("text/event-stream");
      expect(response.headers.get("cache-control")).toBe("no-cache");
      await stream.readUntil("download_started");

      await app.inject({ method: "POST", url: "/api/download", payload: { url: videoUrl(1), id: "clip" } });
      const events = await stream.readUntil("download_complete");

      expect(events.map((streamed) => streamed.event)).toEqual([
        "download_started",
        "download_progress",
        "download_progress",
        "download_complete",
      ]);
      expect(events[0]?.data).toEqual({ id: "clip" });
      expect(events[1]?.data).toMatchObject({ id: "clip", status: "downloading", percent: 100 });
      expect(events[2]?.data).toMatchObject({ id: "clip", status: "finished" });
      expect(events[3]?.data).toEqual({ id: "clip", filename: "Clip.mp4" });
    });

    it("unsubscribes when the client disconnects", async () => {
      const { stream } = await openEventStream(baseUrl, "/api/events/batches/b", disconnect.signal);
      await vi.waitFor(() => expect(orchestrator?.events.subscriberCount("b")).toBe(1));

      disconnect.abort();

      await vi.waitFor(() => expect(orchestrator?.events.subscriberCount("b")).toBe(0));
      expect(stream.events).toEqual([]);
    });

    it("closes while a stream is open and cancels running jobs", async () => {
      engine.setDownload(videoUrl(1), { gate: NEVER, result: "/never.mp4" });
      await app.inject({ method: "POST", url: "/api/download", payload: { url: videoUrl(1), id: "slow" } });
      const { stream } = await openEventStream(baseUrl, "/api/events/jobs/slow", disconnect.signal);
      await stream.readUntil("download_started");

      await app.close();
      closed = true;

      expect(orchestrator?.getJob("slow")).toMatchObject({ state: "failed", errorMessage: "Download cancelled" });
      expect(orchestrator?.events.subscriberCount("slow")).toBe(0);
    });
  });
});
