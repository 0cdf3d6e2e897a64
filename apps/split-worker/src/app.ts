import { promises as fs } from "node:fs";
import cors from "cors";
import express, { type Request } from "express";
import { z } from "zod";
import { TRAILING_POLICIES } from "@vidkit/shared";
import { sourceLabel, type SplitSource } from "./assets.js";
import type { SplitJob, SplitJobQueue } from "./jobs.js";

export const SERVICE_NAME = "@vidkit/split-worker";

export interface WorkerDependencies {
  queue: SplitJobQueue;
  /** Resolves the first line of `ffmpeg -version`. */
  ffmpegVersion: () => Promise<string>;
  logRequest?: (line: string) => void;
}

const assetPayloadSchema = z.object({
  assetId: z.string().min(1),
  filename: z.string().min(1).optional(),
  mimeType: z.string().min(1).optional(),
  base64Data: z.string().min(1),
});

const createJobSchema = z
  .object({
    sourceUrl: z.string().url().optional(),
    assetPayload: assetPayloadSchema.optional(),
    durationSec: z.number().positive().optional(),
    clipLengthSec: z.number().positive(),
    policy: z.enum(TRAILING_POLICIES).default("keep_short"),
    includeOriginal: z.boolean().default(false),
    idempotencyKey: z.string().min(1).optional(),
  })
  .refine((body) => Boolean(body.sourceUrl) !== Boolean(body.assetPayload), {
    message: "Provide exactly one of sourceUrl or assetPayload.",
    path: ["sourceUrl"],
  });

const retrySchema = z.object({
  jobId: z.string().min(1),
});

function getBaseUrl(req: Request) {
  return `${req.protocol}://${req.get("host") ?? "localhost"}`;
}

function serializeJob(job: SplitJob, baseUrl: string) {
  const source = sourceLabel(job.request.source);
  return {
    jobId: job.id,
    status: job.status,
    progress: job.progress,
    attempts: job.attempts,
    clipLengthSec: job.request.clipLengthSec,
    policy: job.request.policy,
    includeOriginal: job.request.includeOriginal,
    sourceDurationSec: job.sourceDurationSec,
    plannedClips: job.plannedClips,
    clips: job.clips.map((clip) => ({
      index: clip.index,
      startTime: clip.startTime,
      endTime: clip.endTime,
      duration: clip.duration,
      source,
      outputUrl: `${baseUrl}/api/split/jobs/${job.id}/clips/${clip.index}/output`,
    })),
    error: job.error,
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
  };
}

export function createApp({ queue, ffmpegVersion, logRequest = console.log }: WorkerDependencies) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "250mb" }));
  app.use((req, _res, next) => {
    logRequest(`[${req.method}] ${req.originalUrl}`);
    next();
  });

  app.get("/health", async (_req, res) => {
    let ffmpeg: string;
    try {
      ffmpeg = await ffmpegVersion();
    } catch (error) {
      logRequest(`ffmpeg unavailable: ${error instanceof Error ? error.message : String(error)}`);
      ffmpeg = "unavailable";
    }

    res.json({
      status: "ok",
      service: SERVICE_NAME,
      now: new Date().toISOString(),
      policy: "ffmpeg-lgpl-only",
      ffmpeg,
    });
  });

  app.post("/api/split/jobs", (req, res) => {
    const parsed = createJobSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }

    const { sourceUrl, assetPayload, ...options } = parsed.data;
    const source: SplitSource | null = assetPayload ? { payload: assetPayload } : sourceUrl ? { url: sourceUrl } : null;
    if (!source) {
      return res.status(400).json({ error: "Provide exactly one of sourceUrl or assetPayload." });
    }

    const { job } = queue.submit({ ...options, source });
    return res.status(202).json(serializeJob(job, getBaseUrl(req)));
  });

  app.get("/api/split/jobs/:jobId", (req, res) => {
    const job = queue.get(req.params.jobId);
    if (!job) {
      return res.status(404).json({ error: "job_not_found" });
    }
    return res.json(serializeJob(job, getBaseUrl(req)));
  });

  app.get("/api/split/jobs/:jobId/clips/:index/output", async (req, res) => {
    const job = queue.get(req.params.jobId);
    if (!job) {
      return res.status(404).json({ error: "job_not_found" });
    }

    const index = Number(req.params.index);
    const clip = job.clips.find((entry) => entry.index === index);
    if (!clip) {
      return res.status(job.status === "completed" ? 404 : 409).json({
        error: job.status === "completed" ? "clip_not_found" : "clip_not_ready",
      });
    }

    try {
      await fs.access(clip.outputPath);
    } catch {
      return res.status(410).json({ error: "output_missing" });
    }

    res.setHeader("Content-Type", "video/mp4");
    res.setHeader("Content-Disposition", `attachment; filename="${job.id}-${clip.index}.mp4"`);
    return res.sendFile(clip.outputPath);
  });

  app.post("/api/split/jobs/:jobId/cancel", (req, res) => {
    const job = queue.get(req.params.jobId);
    if (!job) {
      return res.status(404).json({ error: "job_not_found" });
    }
    return res.json(serializeJob(queue.cancel(job), getBaseUrl(req)));
  });

  app.post("/api/split/jobs/retry", (req, res) => {
    const parsed = retrySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }

    const job = queue.get(parsed.data.jobId);
    if (!job) {
      return res.status(404).json({ error: "job_not_found" });
    }
    if (job.status === "running") {
      return res.status(409).json({ error: "job_already_running" });
    }

    return res.status(202).json(serializeJob(queue.retry(job), getBaseUrl(req)));
  });

  return app;
}
