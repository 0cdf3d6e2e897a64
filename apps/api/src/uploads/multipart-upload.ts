import { open, stat, type FileHandle } from "node:fs/promises";
import path from "node:path";
import { UploadError } from "../errors.js";
import type { CompletedChunk, VideoApiClient } from "../video-api-client.js";

export interface MultipartUploadOptions {
  /** Asset name; defaults to the file's basename. */
  filename?: string;
  type?: string;
  /** Chunks uploaded and reported together. */
  batchSize?: number;
}

/** Presigned URLs are handed out in pages of this size. */
export const PRESIGNED_URL_PAGE_SIZE = 10;
export const MAX_PARALLEL_CHUNKS = 5;

type Log = (line: string) => void;

async function mapWithConcurrency<T, R>(items: T[], limit: number, worker: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;

  const lanes = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (next < items.length) {
      const position = next;
      next += 1;
      results[position] = await worker(items[position]);
    }
  });

  await Promise.all(lanes);
  return results;
}

async function readChunk(handle: FileHandle, chunkIndex: number, chunkSize: number, totalSize: number) {
  const offset = (chunkIndex - 1) * chunkSize;
  const length = Math.min(chunkSize, totalSize - offset);
  const { bytesRead, buffer } = await handle.read(Buffer.alloc(length), 0, length, offset);
  return buffer.subarray(0, bytesRead);
}

const chunkRange = (first: number, last: number) => Array.from({ length: last - first + 1 }, (_, i) => first + i);

export class MultipartUploader {
  constructor(
    private readonly client: VideoApiClient,
    private readonly log: Log = console.log
  ) {}

  /** Uploads the file and resolves with the asset URL. */
  async upload(filePath: string, { filename, type = "video", batchSize = 10 }: MultipartUploadOptions = {}) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new UploadError(`batchSize must be a positive integer (got ${batchSize}).`);
    }

    const { size } = await stat(filePath);
    const assetName = filename ?? path.basename(filePath);
    this.log(`Creating upload session for ${assetName} (${size} bytes)`);

    const session = await this.client.createMultipartUpload(assetName, type, size);
    const totalChunks = Math.ceil(size / session.chunkSize);
    const urls = new Map(session.uploadUrls.map((entry) => [entry.chunkIndex, entry.url]));
    this.log(`Upload ${session.uploadId}: ${totalChunks} chunks of ${session.chunkSize} bytes`);

    const handle = await open(filePath, "r");
    try {
      for (let first = 1; first <= totalChunks; first += batchSize) {
        const indices = chunkRange(first, Math.min(first + batchSize - 1, totalChunks));
        await this.ensureUrls(session.uploadId, indices, urls);

        const completed = await mapWithConcurrency(indices, MAX_PARALLEL_CHUNKS, async (chunkIndex) => {
          const url = urls.get(chunkIndex);
          if (!url) throw new UploadError(`No presigned URL available for chunk ${chunkIndex}.`);
          const bytes = await readChunk(handle, chunkIndex, session.chunkSize, size);
          const etag = await this.client.uploadChunk(url, bytes);
          const chunk: CompletedChunk = { chunkIndex, proof: etag, proofType: "etag", chunkSize: bytes.byteLength };
          return chunk;
        });

        const report = await this.client.reportCompletedChunks(session.uploadId, completed);
        this.log(
          `Reported chunks ${indices[0]}-${indices[indices.length - 1]}: ` +
            `${report.processedChunks} processed, ${report.duplicateChunks} duplicates, ${report.totalCompleted} total`
        );
        if (report.url) return report.url;
      }
    } finally {
      await handle.close();
    }

    const status = await this.client.getMultipartUploadStatus(session.uploadId);
    this.log(`Final status: ${status.status} (${status.chunksCompleted}/${status.totalChunks})`);
    if (status.status !== "completed") {
      throw new UploadError(`Upload not completed. Status: ${status.status}`);
    }

    const asset = await this.client.getAsset(session.assetId);
    return asset.url;
  }

  private async ensureUrls(uploadId: string, indices: number[], urls: Map<number, string>) {
    const missing = indices.filter((chunkIndex) => !urls.has(chunkIndex));
    const pages = new Set(missing.map((chunkIndex) => Math.floor((chunkIndex - 1) / PRESIGNED_URL_PAGE_SIZE) + 1));

    for (const page of pages) {
      const additional = await this.client.getPresignedUrls(uploadId, page, PRESIGNED_URL_PAGE_SIZE);
      for (const entry of additional) urls.set(entry.chunkIndex, entry.url);
    }

    const stillMissing = indices.filter((chunkIndex) => !urls.has(chunkIndex));
    if (stillMissing.length > 0) {
      throw new UploadError(`No presigned URL available for chunk ${stillMissing.join(", ")}.`);
    }
  }
}
