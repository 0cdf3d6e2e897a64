import { z } from "zod";
import type { VideoApiConfig } from "./config.js";
import { VideoApiError } from "./errors.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type IndexModelOption = "visual" | "audio";

export interface CreateIndexOptions {
  modelName?: string;
  modelOptions?: IndexModelOption[];
}

export type SearchOption = "visual" | "audio";

export interface SearchOptions {
  searchOptions?: SearchOption[];
  pageLimit?: number;
}

export type VideoSource = { url: string } | { data: Blob; filename: string };

export interface CompletedChunk {
  chunkIndex: number;
  proof: string;
  proofType: "etag";
  chunkSize: number;
}

const idResponseSchema = z.object({ _id: z.string() }).transform((raw) => ({ id: raw._id }));

const indexSchema = z
  .object({
    _id: z.string(),
    index_name: z.string(),
    models: z
      .array(z.object({ model_name: z.string(), model_options: z.array(z.string()).default([]) }))
      .default([]),
    video_count: z.number().default(0),
    created_at: z.string().optional()
  })
  .transform((raw) => ({
    id: raw._id,
    name: raw.index_name,
    models: raw.models.map((model) => ({ name: model.model_name, options: model.model_options })),
    videoCount: raw.video_count,
    createdAt: raw.created_at
  }));

export type VideoIndex = z.infer<typeof indexSchema>;

const createIndexTaskSchema = z
  .object({ _id: z.string(), video_id: z.string().optional() })
  .transform((raw) => ({ id: raw._id, videoId: raw.video_id }));

const indexTaskSchema = z
  .object({
    _id: z.string(),
    index_id: z.string().optional(),
    video_id: z.string().optional(),
    status: z.string()
  })
  .transform((raw) => ({ id: raw._id, indexId: raw.index_id, videoId: raw.video_id, status: raw.status }));

export type IndexTask = z.infer<typeof indexTaskSchema>;

const segmentSchema = z
  .object({
    float: z.array(z.number()),
    start_offset_sec: z.number().default(0),
    end_offset_sec: z.number().default(0),
    embedding_scope: z.string().optional()
  })
  .transform((raw) => ({
    startOffsetSec: raw.start_offset_sec,
    endOffsetSec: raw.end_offset_sec,
    embeddingScope: raw.embedding_scope,
    vector: raw.float
  }));

export type EmbeddingSegment = z.infer<typeof segmentSchema>;

const embeddingTaskStatusSchema = z
  .object({ _id: z.string(), model_name: z.string().optional(), status: z.string() })
  .transform((raw) => ({ id: raw._id, modelName: raw.model_name, status: raw.status }));

export type EmbeddingTaskStatus = z.infer<typeof embeddingTaskStatusSchema>;

const embeddingTaskSchema = z
  .object({
    _id: z.string(),
    model_name: z.string().optional(),
    status: z.string(),
    video_embedding: z.object({ segments: z.array(segmentSchema).default([]) }).nullish()
  })
  .transform((raw) => ({
    id: raw._id,
    modelName: raw.model_name,
    status: raw.status,
    segments: raw.video_embedding?.segments ?? []
  }));

export type EmbeddingTask = z.infer<typeof embeddingTaskSchema>;

const textEmbeddingSchema = z
  .object({ text_embedding: z.object({ segments: z.array(segmentSchema) }) })
  .transform((raw) => raw.text_embedding.segments);

const searchSchema = z
  .object({
    data: z.array(
      z.object({
        video_id: z.string(),
        start: z.number(),
        end: z.number(),
        score: z.number().optional(),
        rank: z.number().optional(),
        confidence: z.string().optional()
      })
    )
  })
  .transform((raw) =>
    raw.data.map((hit) => ({
      videoId: hit.video_id,
      start: hit.start,
      end: hit.end,
      score: hit.score,
      rank: hit.rank,
      confidence: hit.confidence
    }))
  );

export type SearchHit = z.infer<typeof searchSchema>[number];

const analysisSchema = z
  .object({ id: z.string(), data: z.string(), finish_reason: z.string().optional() })
  .transform((raw) => ({ id: raw.id, text: raw.data, finishReason: raw.finish_reason }));

export type AnalysisResult = z.infer<typeof analysisSchema>;

const presignedUrlsSchema = z
  .array(z.object({ chunk_index: z.number().int(), url: z.string() }))
  .transform((urls) => urls.map((entry) => ({ chunkIndex: entry.chunk_index, url: entry.url })));

export type PresignedUrl = z.infer<typeof presignedUrlsSchema>[number];

const uploadSessionSchema = z
  .object({
    upload_id: z.string(),
    asset_id: z.string(),
    total_chunks: z.number().int(),
    chunk_size: z.number().int().positive(),
    upload_urls: presignedUrlsSchema.default([])
  })
  .transform((raw) => ({
    uploadId: raw.upload_id,
    assetId: raw.asset_id,
    totalChunks: raw.total_chunks,
    chunkSize: raw.chunk_size,
    uploadUrls: raw.upload_urls
  }));

export type MultipartUploadSession = z.infer<typeof uploadSessionSchema>;

const additionalUrlsSchema = z
  .object({ upload_urls: presignedUrlsSchema.default([]) })
  .transform((raw) => raw.upload_urls);

const chunkReportSchema = z
  .object({
    processed_chunks: z.number().int().default(0),
    duplicate_chunks: z.number().int().default(0),
    total_completed: z.number().int().default(0),
    url: z.string().nullish()
  })
  .transform((raw) => ({
    processedChunks: raw.processed_chunks,
    duplicateChunks: raw.duplicate_chunks,
    totalCompleted: raw.total_completed,
    url: raw.url ?? undefined
  }));

export type ChunkReport = z.infer<typeof chunkReportSchema>;

const uploadStatusSchema = z
  .object({
    status: z.string(),
    chunks_completed: z.number().int().default(0),
    total_chunks: z.number().int().default(0)
  })
  .transform((raw) => ({
    status: raw.status,
    chunksCompleted: raw.chunks_completed,
    totalChunks: raw.total_chunks
  }));

export type MultipartUploadStatus = z.infer<typeof uploadStatusSchema>;

const assetSchema = z
  .object({ _id: z.string().optional(), url: z.string().default(""), status: z.string().optional() })
  .transform((raw) => ({ id: raw._id, url: raw.url, status: raw.status }));

type Body = { json: object } | { form: FormData } | undefined;

interface RequestOptions<TSchema extends z.ZodTypeAny> {
  method: "GET" | "POST";
  path: string;
  body?: Body;
  query?: Record<string, string | number>;
  schema: TSchema;
}

export function createVideoApiClient(apiConfig: VideoApiConfig, fetchImpl: FetchLike = fetch) {
  async function request<TSchema extends z.ZodTypeAny>({
    method,
    path,
    body,
    query,
    schema
  }: RequestOptions<TSchema>): Promise<z.output<TSchema>> {
    if (!apiConfig.apiKey) {
      throw new VideoApiError(401, "VIDEO_API_KEY is not set.");
    }

    const url = new URL(`${apiConfig.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const headers: Record<string, string> = { "x-api-key": apiConfig.apiKey };
    let payload: string | FormData | undefined;
    if (body && "json" in body) {
      headers["Content-Type"] = "application/json";
      payload = JSON.stringify(body.json);
    } else if (body) {
      // fetch sets the multipart boundary itself.
      payload = body.form;
    }

    const response = await fetchImpl(url.toString(), { method, headers, body: payload });
    if (!response.ok) {
      const details = await response.text();
      throw new VideoApiError(response.status, details);
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new VideoApiError(response.status, `Unexpected response for ${method} ${path}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  const form = (fields: Record<string, string | number | string[]>) => {
    const data = new FormData();
    for (const [key, value] of Object.entries(fields)) {
      if (Array.isArray(value)) {
        for (const entry of value) data.append(key, entry);
      } else {
        data.append(key, String(value));
      }
    }
    return { form: data };
  };

  return {
    config: apiConfig,

    createIndex: (name: string, options: CreateIndexOptions = {}) =>
      request({
        method: "POST",
        path: "/indexes",
        body: {
          json: {
            index_name: name,
            models: [
              {
                model_name: options.modelName ?? apiConfig.generateModel,
                model_options: options.modelOptions ?? ["visual", "audio"]
              }
            ]
          }
        },
        schema: idResponseSchema
      }),

    getIndex: (indexId: string) =>
      request({ method: "GET", path: `/indexes/${encodeURIComponent(indexId)}`, schema: indexSchema }),

    createIndexTask: (indexId: string, videoUrl: string) =>
      request({
        method: "POST",
        path: "/tasks",
        body: form({ index_id: indexId, video_url: videoUrl }),
        schema: createIndexTaskSchema
      }),

    getIndexTask: (taskId: string) =>
      request({ method: "GET", path: `/tasks/${encodeURIComponent(taskId)}`, schema: indexTaskSchema }),

    createEmbeddingTask: (video: VideoSource, clipLengthSec: number) => {
      const body = form({ model_name: apiConfig.embeddingModel, video_clip_length: clipLengthSec });
      if ("url" in video) {
        body.form.append("video_url", video.url);
      } else {
        body.form.append("video_file", video.data, video.filename);
      }
      return request({ method: "POST", path: "/embed/tasks", body, schema: idResponseSchema });
    },

    getEmbeddingTaskStatus: (taskId: string) =>
      request({
        method: "GET",
        path: `/embed/tasks/${encodeURIComponent(taskId)}/status`,
        schema: embeddingTaskStatusSchema
      }),

    getEmbeddingTask: (taskId: string) =>
      request({
        method: "GET",
        path: `/embed/tasks/${encodeURIComponent(taskId)}`,
        query: { embedding_option: "visual-text" },
        schema: embeddingTaskSchema
      }),

    embedText: (text: string) =>
      request({
        method: "POST",
        path: "/embed",
        body: form({ model_name: apiConfig.embeddingModel, text, text_truncate: "start" }),
        schema: textEmbeddingSchema
      }),

    search: (indexId: string, queryText: string, options: SearchOptions = {}) =>
      request({
        method: "POST",
        path: "/search",
        body: form({
          index_id: indexId,
          query_text: queryText,
          search_options: options.searchOptions ?? ["visual", "audio"],
          page_limit: options.pageLimit ?? 10
        }),
        schema: searchSchema
      }),

    analyze: (videoId: string, prompt: string, temperature = apiConfig.temperature) =>
      request({
        method: "POST",
        path: "/analyze",
        body: { json: { video_id: videoId, prompt, temperature, stream: false } },
        schema: analysisSchema
      }),

    createMultipartUpload: (filename: string, type: string, totalSize: number) =>
      request({
        method: "POST",
        path: "/assets/multipart-uploads",
        body: { json: { filename, type, total_size: totalSize } },
        schema: uploadSessionSchema
      }),

    getPresignedUrls: (uploadId: string, page: number, limit = 10) =>
      request({
        method: "POST",
        path: `/assets/multipart-uploads/${encodeURIComponent(uploadId)}/presigned-urls`,
        body: { json: { page, limit } },
        schema: additionalUrlsSchema
      }),

    reportCompletedChunks: (uploadId: string, chunks: CompletedChunk[]) =>
      request({
        method: "POST",
        path: `/assets/multipart-uploads/${encodeURIComponent(uploadId)}`,
        body: {
          json: {
            completed_chunks: chunks.map((chunk) => ({
              chunk_index: chunk.chunkIndex,
              proof: chunk.proof,
              proof_type: chunk.proofType,
              chunk_size: chunk.chunkSize
            }))
          }
        },
        schema: chunkReportSchema
      }),

    getMultipartUploadStatus: (uploadId: string) =>
      request({
        method: "GET",
        path: `/assets/multipart-uploads/${encodeURIComponent(uploadId)}`,
        query: { page: 1, limit: 50 },
        schema: uploadStatusSchema
      }),

    getAsset: (assetId: string) =>
      request({ method: "GET", path: `/assets/${encodeURIComponent(assetId)}`, schema: assetSchema }),

    /** PUT one chunk to its presigned storage URL and return the ETag. */
    async uploadChunk(presignedUrl: string, bytes: Uint8Array): Promise<string> {
      const response = await fetchImpl(presignedUrl, {
        method: "PUT",
        headers: { "Content-Type": "application/octet-stream" },
        body: bytes
      });
      if (!response.ok) {
        throw new VideoApiError(response.status, `Chunk upload failed: ${await response.text()}`);
      }
      return (response.headers.get("etag") ?? "").replace(/^"+|"+$/g, "");
    }
  };
}

export type VideoApiClient = ReturnType<typeof createVideoApiClient>;
