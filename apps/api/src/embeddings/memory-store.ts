import type { EmbeddingStore, SegmentMatch, StoredSegment } from "./embedding-store.js";
import { segmentRowId } from "./embedding-store.js";

type Row = SegmentMatch & { vector: number[] };

export function cosineDistance(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimensions differ (${a.length} vs ${b.length}).`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class InMemoryEmbeddingStore implements EmbeddingStore {
  private readonly rows = new Map<string, Row>();

  async createSchema() {
    this.rows.clear();
  }

  async storeSegments(taskId: string, videoFile: string, segments: StoredSegment[]) {
    segments.forEach((segment, position) => {
      this.rows.set(segmentRowId(taskId, position), {
        videoFile,
        startTime: segment.startTime,
        endTime: segment.endTime,
        vector: segment.vector
      });
    });
    return segments.length;
  }

  async search(vector: number[], topK: number): Promise<SegmentMatch[]> {
    return [...this.rows.values()]
      .map((row) => ({ row, distance: cosineDistance(row.vector, vector) }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, topK)
      .map(({ row }) => ({ videoFile: row.videoFile, startTime: row.startTime, endTime: row.endTime }));
  }

  get size() {
    return this.rows.size;
  }

  async close() {
    this.rows.clear();
  }
}
