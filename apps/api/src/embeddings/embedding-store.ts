export interface StoredSegment {
  startTime: number;
  endTime: number;
  vector: number[];
}

export interface SegmentMatch {
  videoFile: string;
  startTime: number;
  endTime: number;
}

export interface EmbeddingStore {
  /** Drops and recreates the segment table and its vector index. */
  createSchema(): Promise<void>;
  /** Returns the number of segments written. */
  storeSegments(taskId: string, videoFile: string, segments: StoredSegment[]): Promise<number>;
  /** Closest segments first, by cosine distance. */
  search(vector: number[], topK: number): Promise<SegmentMatch[]>;
  close(): Promise<void>;
}

export const STORE_BATCH_SIZE = 1000;

export const segmentRowId = (taskId: string, position: number) => `${taskId}_${position}`;
