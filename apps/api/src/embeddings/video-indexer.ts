import { readFile } from "node:fs/promises";
import path from "node:path";
import type { PollingConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import type { VideoApiClient, VideoSource } from "../video-api-client.js";
import { waitForEmbeddingTask } from "../wait-for-done.js";
import type { EmbeddingStore, SegmentMatch } from "./embedding-store.js";
import type { TaskIdCache } from "./task-id-cache.js";

export const QUERY_BATCH_SIZE = 1000;

export const isVideoUrl = (video: string) => /^https?:\/\//i.test(video);

async function videoSource(video: string): Promise<VideoSource> {
  if (isVideoUrl(video)) return { url: video };
  return { data: new Blob([await readFile(video)]), filename: path.basename(video) };
}

export interface VideoEmbeddingIndexerOptions {
  client: VideoApiClient;
  store: EmbeddingStore;
  taskCache: TaskIdCache;
  clipLengthSec: number;
  polling?: Partial<PollingConfig>;
  sleep?: (ms: number) => Promise<void>;
  log?: (line: string) => void;
}

export interface ProcessedVideo {
  videoFile: string;
  taskId: string;
  /** True when the embedding task came from the cache instead of a new request. */
  reused: boolean;
  stored: number;
}

export interface FailedVideo {
  videoFile: string;
  error: string;
}

export class VideoEmbeddingIndexer {
  private readonly log: (line: string) => void;

  constructor(private readonly options: VideoEmbeddingIndexerOptions) {
    this.log = options.log ?? console.log;
  }

  async processVideo(videoFile: string): Promise<ProcessedVideo> {
    const { client, taskCache } = this.options;

    const cached = await taskCache.get(videoFile);
    if (cached) {
      this.log(`Video previously processed with task ${cached}; storing its embeddings again`);
      return { videoFile, taskId: cached, reused: true, stored: await this.storeTask(cached, videoFile) };
    }

    const { id: taskId } = await client.createEmbeddingTask(await videoSource(videoFile), this.options.clipLengthSec);
    this.log(`Created embedding task ${taskId} for ${videoFile}`);

    await waitForEmbeddingTask(client, taskId, {
      ...this.options.polling,
      sleep: this.options.sleep,
      onUpdate: (task) => this.log(`  status=${task.status}`)
    });
    await taskCache.set(videoFile, taskId);

    return { videoFile, taskId, reused: false, stored: await this.storeTask(taskId, videoFile) };
  }

  /** Processes each video in turn; a failing video is reported and skipped. */
  async processVideos(videoFiles: string[]): Promise<{ processed: ProcessedVideo[]; failed: FailedVideo[] }> {
    const processed: ProcessedVideo[] = [];
    const failed: FailedVideo[] = [];

    for (const videoFile of videoFiles) {
      this.log(`\nProcessing video: ${videoFile}`);
      try {
        processed.push(await this.processVideo(videoFile));
      } catch (error) {
        failed.push({ videoFile, error: errorMessage(error) });
        console.error(`Error processing video ${videoFile}: ${errorMessage(error)}`);
      }
    }

    return { processed, failed };
  }

  async query(texts: string[], topK: number): Promise<Map<string, SegmentMatch[]>> {
    const results = new Map<string, SegmentMatch[]>();

    for (let start = 0; start < texts.length; start += QUERY_BATCH_SIZE) {
      const batch = texts.slice(start, start + QUERY_BATCH_SIZE);
      const vectors: number[][] = [];
      for (const text of batch) {
        vectors.push(await this.embedQuery(text));
      }
      for (const [position, text] of batch.entries()) {
        results.set(text, await this.options.store.search(vectors[position], topK));
      }
    }

    return results;
  }

  private async embedQuery(text: string) {
    const segments = await this.options.client.embedText(text);
    const [first] = segments;
    if (!first) {
      throw new Error(`No embedding returned for query "${text}".`);
    }
    if (segments.length > 1) {
      console.warn(`Query "${text}" produced ${segments.length} segments; using the first.`);
    }
    return first.vector;
  }

  private async storeTask(taskId: string, videoFile: string) {
    const task = await this.options.client.getEmbeddingTask(taskId);
    if (task.segments.length === 0) {
      this.log(`No embeddings found for task ${taskId}`);
      return 0;
    }

    const stored = await this.options.store.storeSegments(
      taskId,
      videoFile,
      task.segments.map((segment) => ({
        startTime: segment.startOffsetSec,
        endTime: segment.endOffsetSec,
        vector: segment.vector
      }))
    );
    this.log(`Stored ${stored} embeddings for ${videoFile}`);
    return stored;
  }
}
