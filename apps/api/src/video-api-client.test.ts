import { describe, it, expect } from "vitest";
import { VideoApiError } from "./errors.js";
import { createFakeFetch, testApiConfig } from "./test/fake-fetch.js";
import { createVideoApiClient } from "./video-api-client.js";

describe("createVideoApiClient", () => {
  it("creates an index with the generate model by default", async () => {
    const fake = createFakeFetch({ "POST /indexes": () => ({ json: { _id: "idx_1" } }) });
    const client = createVideoApiClient(testApiConfig, fake.fetch);

    await expect(client.createIndex("sports")).resolves.toEqual({ id: "idx_1" });

    const [request] = fake.requests;
    expect(request?.headers.get("x-api-key")).toBe("test-key");
    expect(request?.headers.get("content-type")).toBe("application/json");
    expect(request?.json).toEqual({
      index_name: "sports",
      models: [{ model_name: "generate-test", model_options: ["visual", "audio"] }]
    });
  });

  it("maps index fields to camelCase", async () => {
    const fake = createFakeFetch({
      "GET /indexes/idx_1": () => ({
        json: {
          _id: "idx_1",
          index_name: "sports",
          models: [{ model_name: "generate-test", model_options: ["visual"] }],
          video_count: 4,
          created_at: "2026-01-02T03:04:05Z"
        }
      })
    });
    const client = createVideoApiClient(testApiConfig, fake.fetch);

    await expect(client.getIndex("idx_1")).resolves.toEqual({
      id: "idx_1",
      name: "sports",
      models: [{ name: "generate-test", options: ["visual"] }],
      videoCount: 4,
      createdAt: "2026-01-02T03:04:05Z"
    });
  });

  it("sends indexing tasks as form data", async () => {
    const fake = createFakeFetch({ "POST /tasks": () => ({ json: { _id: "task_1", video_id: "vid_1" } }) });
    const client = createVideoApiClient(testApiConfig, fake.fetch);

    await expect(client.createIndexTask("idx_1", "https://cdn.test/a.mp4")).resolves.toEqual({
      id: "task_1",
      videoId: "vid_1"
    });
    const form = fake.requests[0]?.form;
    expect(form?.get("index_id")).toBe("idx_1");
    expect(form?.get("video_url")).toBe("https://cdn.test/a.mp4");
  });

  it("creates an embedding task from a URL or from file bytes", async () => {
    const fake = createFakeFetch({ "POST /embed/tasks": () => ({ json: { _id: "emb_1" } }) });
    const client = createVideoApiClient(testApiConfig, fake.fetch);

    await client.createEmbeddingTask({ url: "https://cdn.test/a.mp4" }, 6);
    await client.createEmbeddingTask({ data: new Blob(["abc"]), filename: "a.mp4" }, 10);

    const [byUrl, byFile] = fake.requests;
    expect(byUrl?.form?.get("model_name")).toBe("embed-test");
    expect(byUrl?.form?.get("video_clip_length")).toBe("6");
    expect(byUrl?.form?.get("video_url")).toBe("https://cdn.test/a.mp4");
    expect(byFile?.form?.get("video_url")).toBeNull();
    const file = byFile?.form?.get("video_file");
    expect(file).toBeInstanceOf(Blob);
    expect(file).toHaveProperty("name", "a.mp4");
  });

  it("returns embedding segments with their offsets", async () => {
    const fake = createFakeFetch({
      "GET /embed/tasks/emb_1": () => ({
        json: {
          _id: "emb_1",
          status: "ready",
          video_embedding: {
            segments: [
              { float: [0.1, 0.2], start_offset_sec: 0, end_offset_sec: 6, embedding_scope: "clip" },
              { float: [0.3, 0.4], start_offset_sec: 6, end_offset_sec: 12, embedding_scope: "clip" }
            ]
          }
        }
      })
    });
    const client = createVideoApiClient(testApiConfig, fake.fetch);

    const task = await client.getEmbeddingTask("emb_1");
    expect(fake.requests[0]?.url.searchParams.get("embedding_option")).toBe("visual-text");
    expect(task.segments).toEqual([
      { startOffsetSec: 0, endOffsetSec: 6, embeddingScope: "clip", vector: [0.1, 0.2] },
      { startOffsetSec: 6, endOffsetSec: 12, embeddingScope: "clip", vector: [0.3, 0.4] }
    ]);
  });

  it("treats a task without embeddings as empty", async () => {
    const fake = createFakeFetch({
      "GET /embed/tasks/emb_2": () => ({ json: { _id: "emb_2", status: "processing", video_embedding: null } })
    });
    const client = createVideoApiClient(testApiConfig, fake.fetch);
    await expect(client.getEmbeddingTask("emb_2")).resolves.toMatchObject({ status: "processing", segments: [] });
  });

  it("searches with every search option as a separate form field", async () => {
    const fake = createFakeFetch({
      "POST /search": () => ({
        json: { data: [{ video_id: "vid_1", start: 12.5, end: 18, score: 83.2, rank: 1, confidence: "high" }] }
      })
    });
    const client = createVideoApiClient(testApiConfig, fake.fetch);

    const hits = await client.search("idx_1", "goal celebration", { searchOptions: ["visual"], pageLimit: 3 });
    expect(hits).toEqual([{ videoId: "vid_1", start: 12.5, end: 18, score: 83.2, rank: 1, confidence: "high" }]);
    const form = fake.requests[0]?.form;
    expect(form?.getAll("search_options")).toEqual(["visual"]);
    expect(form?.get("page_limit")).toBe("3");
  });

  it("analyzes with the configured temperature unless given one", async () => {
    const fake = createFakeFetch({ "POST /analyze": () => ({ json: { id: "gen_1", data: "A goal is scored." } }) });
    const client = createVideoApiClient(testApiConfig, fake.fetch);

    await expect(client.analyze("vid_1", "Summarize")).resolves.toEqual({
      id: "gen_1",
      text: "A goal is scored.",
      finishReason: undefined
    });
    await client.analyze("vid_1", "Summarize", 0.9);

    expect(fake.requests.map((request) => request.json)).toEqual([
      { video_id: "vid_1", prompt: "Summarize", temperature: 0.2, stream: false },
      { video_id: "vid_1", prompt: "Summarize", temperature: 0.9, stream: false }
    ]);
  });

  it("throws VideoApiError with the upstream status and body", async () => {
    const fake = createFakeFetch({ "GET /tasks/task_9": () => ({ status: 404, text: "task not found" }) });
    const client = createVideoApiClient(testApiConfig, fake.fetch);

    const error = await client.getIndexTask("task_9").catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(VideoApiError);
    expect(error).toMatchObject({ status: 404, details: "task not found" });
  });

  it("rejects responses that do not match the expected shape", async () => {
    const fake = createFakeFetch({ "GET /tasks/task_1": () => ({ json: { id: "task_1" } }) });
    const client = createVideoApiClient(testApiConfig, fake.fetch);
    await expect(client.getIndexTask("task_1")).rejects.toBeInstanceOf(VideoApiError);
  });

  it("fails before calling out when no API key is configured", async () => {
    const fake = createFakeFetch({});
    const client = createVideoApiClient({ ...testApiConfig, apiKey: "" }, fake.fetch);

    await expect(client.getIndex("idx_1")).rejects.toMatchObject({ status: 401 });
    expect(fake.requests).toHaveLength(0);
  });

  it("strips quotes from chunk ETags and sends no API key to storage", async () => {
    const fake = createFakeFetch({
      "PUT /bucket/chunk-1": () => ({ headers: { ETag: '"abc123"' } })
    });
    const client = createVideoApiClient(testApiConfig, fake.fetch);

    await expect(client.uploadChunk("https://storage.test/bucket/chunk-1", new Uint8Array([1, 2, 3]))).resolves.toBe(
      "abc123"
    );
    expect(fake.requests[0]?.headers.get("x-api-key")).toBeNull();
    expect(fake.requests[0]?.bytes).toEqual(new Uint8Array([1, 2, 3]));
  });
});
