import cors from "cors";
import express, { type Response } from "express";
import { z } from "zod";
import { InvalidInputError, planClips, planClipsRequestSchema } from "@vidkit/shared";
import type { PollingConfig } from "./config.js";
import type { VideoEmbeddingIndexer } from "./embeddings/video-indexer.js";
import { RemoteFailureError, TimeoutError, VideoApiError } from "./errors.js";
import type { VideoApiClient } from "./video-api-client.js";
import { waitForIndexTask } from "./wait-for-done.js";

export const SERVICE_NAME = "@vidkit/api";

export interface AppDependencies {
  client: VideoApiClient;
  indexer: VideoEmbeddingIndexer;
  polling: PollingConfig;
  searchTopK: number;
  sleep?: (ms: number) => Promise<void>;
  /** Per-request log line; pass a no-op to silence. */
  logRequest?: (line: string) => void;
}

function sendError(res: Response, error: unknown) {
  if (error instanceof InvalidInputError) {
    return res.status(400).json({ error: error.message, field: error.field });
  }
  if (error instanceof TimeoutError) {
    return res.status(504).json({ error: error.message });
  }
  if (error instanceof RemoteFailureError) {
    return res.status(502).json({ error: error.message, status: error.status });
  }
  if (error instanceof VideoApiError) {
    return res.status(502).json({ error: error.message, upstreamStatus: error.status });
  }
  return res.status(500).json({ error: String(error) });
}

const createIndexSchema = z.object({
  name: z.string().min(1),
  modelName: z.string().min(1).optional(),
  modelOptions: z.array(z.enum(["visual", "audio"])).min(1).optional()
});

const createIndexTaskSchema = z.object({
  videoUrl: z.string().url()
});

const searchSchema = z.object({
  indexId: z.string().min(1),
  query: z.string().min(1),
  searchOptions: z.array(z.enum(["visual", "audio"])).min(1).optional(),
  pageLimit: z.number().int().positive().max(50).optional()
});

const analyzeSchema = z.object({
  videoId: z.string().min(1),
  prompt: z.string().min(1).max(2000),
  temperature: z.number().min(0).max(1).optional()
});

const embedVideoSchema = z.object({
  videoUrl: z.string().url()
});

const embeddingQuerySchema = z.object({
  queries: z.array(z.string().min(1)).min(1),
  topK: z.number().int().positive().max(100).optional()
});

export function createApp({ client, indexer, polling, searchTopK, sleep, logRequest = console.log }: AppDependencies) {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use((req, _res, next) => {
    logRequest(`[${req.method}] ${req.originalUrl}`);
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      service: SERVICE_NAME,
      now: new Date().toISOString(),
      mode: client.config.apiKey ? "live" : "offline"
    });
  });

  app.post("/api/clips/plan", (req, res) => {
    const payload = planClipsRequestSchema.safeParse(req.body);
    if (!payload.success) {
      return res.status(400).json({ error: payload.error.flatten() });
    }

    try {
      return res.json({ clips: planClips(payload.data) });
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.post("/api/indexes", async (req, res) => {
    const payload = createIndexSchema.safeParse(req.body);
    if (!payload.success) {
      return res.status(400).json({ error: payload.error.flatten() });
    }

    try {
      const { name, ...options } = payload.data;
      const result = await client.createIndex(name, options);
      return res.status(201).json(result);
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.get("/api/indexes/:indexId", async (req, res) => {
    try {
      return res.json(await client.getIndex(req.params.indexId));
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.post("/api/indexes/:indexId/videos", async (req, res) => {
    const payload = createIndexTaskSchema.safeParse(req.body);
    if (!payload.success) {
      return res.status(400).json({ error: payload.error.flatten() });
    }

    try {
      const task = await client.createIndexTask(req.params.indexId, payload.data.videoUrl);
      return res.status(202).json(task);
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.get("/api/tasks/:taskId", async (req, res) => {
    try {
      const task =
        req.query.wait === "true"
          ? await waitForIndexTask(client, req.params.taskId, { ...polling, sleep })
          : await client.getIndexTask(req.params.taskId);
      return res.json(task);
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.post("/api/search", async (req, res) => {
    const payload = searchSchema.safeParse(req.body);
    if (!payload.success) {
      return res.status(400).json({ error: payload.error.flatten() });
    }

    try {
      const { indexId, query, ...options } = payload.data;
      return res.json({ data: await client.search(indexId, query, options) });
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.post("/api/analyze", async (req, res) => {
    const payload = analyzeSchema.safeParse(req.body);
    if (!payload.success) {
      return res.status(400).json({ error: payload.error.flatten() });
    }

    try {
      const { videoId, prompt, temperature } = payload.data;
      return res.json(await client.analyze(videoId, prompt, temperature));
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.post("/api/embeddings/videos", async (req, res) => {
    const payload = embedVideoSchema.safeParse(req.body);
    if (!payload.success) {
      return res.status(400).json({ error: payload.error.flatten() });
    }

    try {
      return res.status(202).json(await indexer.processVideo(payload.data.videoUrl));
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.post("/api/embeddings/query", async (req, res) => {
    const payload = embeddingQuerySchema.safeParse(req.body);
    if (!payload.success) {
      return res.status(400).json({ error: payload.error.flatten() });
    }

    try {
      const results = await indexer.query(payload.data.queries, payload.data.topK ?? searchTopK);
      return res.json({ results: Object.fromEntries(results) });
    } catch (error) {
      return sendError(res, error);
    }
  });

  return app;
}
