import type { ServerResponse } from "node:http";
import cors from "@fastify/cors";
import Fastify, { type FastifyError, type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { z } from "zod";
import { FetchError, InvalidStateError } from "../downloader/errors.js";
import { buildQualityOptions } from "../downloader/quality.js";
import type { PlaylistEntry } from "../downloader/types.js";
import type { BatchSnapshot, JobSnapshot } from "../jobs/job.js";
import type { Orchestrator, OrchestratorLogger } from "../orchestrator.js";
import { formatDuration } from "../shared/format.js";
import { SseHub, type StreamOptions } from "./sse.js";

export interface ApiServerOptions {
  /** Builds the orchestrator once the server's logger exists */
  createOrchestrator: (logger: OrchestratorLogger) => Orchestrator;
  /** Passed to fastify. Defaults to pino at info level. */
  logger?: boolean | undefined;
  /** Playlist cap when a request names none */
  defaultMaxVideos?: number | undefined;
  heartbeatIntervalMs?: number | undefined;
}

// ============================================================================
// Request bodies
// ============================================================================

const urlField = z.string().trim().default("");

const infoBodySchema = z.object({ url: urlField });

const channelBodySchema = z.object({
  url: urlField,
  max_videos: z.coerce.number().int().min(1).max(500).optional(),
});

const downloadBodySchema = z.object({
  url: urlField,
  quality: z.string().trim().default("best"),
  id: z.string().trim().optional(),
  title: z.string().optional(),
});

const batchBodySchema = z.object({
  videos: z.array(z.object({ url: urlField, title: z.string().optional() })).default([]),
  quality: z.string().trim().default("best"),
  batch_id: z.string().trim().optional(),
});

type IdParams = { Params: { id: string } };

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

function parseBody<S extends z.ZodType>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new BadRequestError(result.error.issues[0]?.message ?? "Invalid request body");
  }
  return result.data;
}

function requireUrl(url: string): string {
  if (!url) {
    throw new BadRequestError("URL is required");
  }
  return url;
}

// ============================================================================
// Responses
// ============================================================================

function toJobResource(job: JobSnapshot) {
  return {
    id: job.id,
    url: job.url,
    quality: job.qualitySelector,
    state: job.state,
    title: job.title,
    batch_id: job.batchId,
    result_path: job.resultPath,
    error: job.errorMessage,
    created_at: job.createdAt.toISOString(),
    started_at: job.startedAt?.toISOString(),
    finished_at: job.finishedAt?.toISOString(),
  };
}

function toBatchResource(batch: BatchSnapshot) {
  return {
    batch_id: batch.id,
    job_ids: batch.jobIds,
    current: batch.currentIndex,
    total: batch.jobIds.length,
    succeeded: batch.succeeded,
    failed: batch.failed,
    state: batch.state,
  };
}

// ============================================================================
// Server
// ============================================================================

export const createApiServer = async (options: ApiServerOptions): Promise<FastifyInstance> => {
  const fastify = Fastify({
    logger: options.logger ?? true,
    disableRequestLogging: true,
    // Event streams are hijacked and never end on their own
    forceCloseConnections: true,
  });

  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  const orchestrator = options.createOrchestrator(fastify.log);
  const sseHub = new SseHub(orchestrator.events, options.heartbeatIntervalMs);
  const defaultMaxVideos = options.defaultMaxVideos ?? 10;

  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof BadRequestError) {
      return reply.code(400).send({ error: error.message });
    }
    if (error instanceof InvalidStateError) {
      return reply.code(409).send({ error: error.message });
    }
    request.log.error(error);
    return reply.code(error.statusCode ?? 500).send({ error: error.message });
  });

  fastify.get("/health", async () => {
    const { runningJobs, runningBatches } = orchestrator.activity();
    return { ok: true, running_jobs: runningJobs, running_batches: runningBatches };
  });

  fastify.post("/api/info", async (request, reply) => {
    const url = requireUrl(parseBody(infoBodySchema, request.body).url);

    try {
      const info = await orchestrator.fetchInfo(url);
      return {
        title: info.title,
        uploader: info.uploaderName,
        duration: formatDuration(info.durationSeconds),
        thumbnail: info.thumbnailUrl,
        qualities: buildQualityOptions(info.availableFormats).map((option) => ({
          id: option.selector,
          label: option.label,
        })),
      };
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;
      request.log.warn(`Info lookup failed for ${url}: ${error.message}`);
      return reply.code(400).send({ error: "Could not fetch video info", reason: error.reason });
    }
  });

  fastify.post("/api/channel", async (request, reply) => {
    const body = parseBody(channelBodySchema, request.body);
    const url = requireUrl(body.url);

    let videos: PlaylistEntry[];
    try {
      videos = await orchestrator.listPlaylistEntries(url, body.max_videos ?? defaultMaxVideos);
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;
      request.log.warn(`Listing failed for ${url}: ${error.message}`);
      return reply.code(400).send({ error: "Could not fetch videos", reason: error.reason });
    }

    if (videos.length === 0) {
      return reply.code(400).send({ error: "Could not fetch videos" });
    }

    return {
      videos: videos.map((video) => ({
        url: video.url,
        title: video.title,
        duration: video.durationSeconds > 0 ? formatDuration(video.durationSeconds) : "--:--",
        thumbnail: video.thumbnailUrl,
      })),
      count: videos.length,
    };
  });

  fastify.post("/api/download", async (request, reply) => {
    const body = parseBody(downloadBodySchema, request.body);
    const handle = orchestrator.startDownload({
      url: requireUrl(body.url),
      quality: body.quality,
      id: body.id,
      title: body.title,
    });
    return reply.code(202).send({ id: handle.job.id });
  });

  fastify.post("/api/batch", async (request, reply) => {
    const body = parseBody(batchBodySchema, request.body);
    const videos = body.videos.filter((video) => video.url);
    if (videos.length === 0) {
      throw new BadRequestError("At least one video is required");
    }

    const handle = orchestrator.startBatch({ videos, quality: body.quality, batchId: body.batch_id });
    return reply.code(202).send({ batch_id: handle.batch.id, job_ids: handle.batch.jobIds });
  });

  fastify.get<IdParams>("/api/jobs/:id", async (request, reply) => {
    const job = orchestrator.getJob(request.params.id);
    if (!job) {
      return reply.code(404).send({ error: `Unknown job: ${request.params.id}` });
    }
    return toJobResource(job);
  });

  fastify.post<IdParams>("/api/jobs/:id/cancel", async (request, reply) => {
    if (!orchestrator.cancel(request.params.id)) {
      return reply.code(404).send({ error: `No running job or batch: ${request.params.id}` });
    }
    return { id: request.params.id, cancelled: true };
  });

  fastify.get<IdParams>("/api/batches/:id", async (request, reply) => {
    const batch = orchestrator.getBatch(request.params.id);
    if (!batch) {
      return reply.code(404).send({ error: `Unknown batch: ${request.params.id}` });
    }
    return toBatchResource(batch);
  });

  const openStream = (request: FastifyRequest, reply: FastifyReply, scope: string, stream: StreamOptions) => {
    const requestOrigin = request.headers.origin?.trim();
    const responseHeaders: Record<string, string> = {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
      "Access-Control-Allow-Origin": requestOrigin || "*",
    };

    if (requestOrigin) {
      responseHeaders.Vary = "Origin";
    }

    reply.hijack();
    reply.raw.writeHead(200, responseHeaders);
    reply.raw.flushHeaders();

    const response: ServerResponse = reply.raw;
    sseHub.open(response, scope, stream);

    response.on("close", () => {
      sseHub.removeClient(response);
    });
  };

  // The job stream announces the job itself, so the core's own start event is skipped
  fastify.get<IdParams>("/api/events/jobs/:id", async (request, reply) => {
    const { id } = request.params;
    openStream(request, reply, id, {
      initial: [{ event: "download_started", data: { id } }],
      filter: (event) => event.type !== "job-started",
    });
  });

  fastify.get<IdParams>("/api/events/batches/:id", async (request, reply) => {
    openStream(request, reply, request.params.id, {});
  });

  fastify.addHook("preClose", async () => {
    sseHub.closeAll();
  });

  fastify.addHook("onClose", async () => {
    await orchestrator.shutdown();
  });

  return fastify;
};
