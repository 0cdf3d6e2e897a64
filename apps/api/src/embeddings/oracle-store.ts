import oracledb, { type Connection } from "oracledb";
import type { OracleConfig } from "../config.js";
import { STORE_BATCH_SIZE, segmentRowId, type EmbeddingStore, type SegmentMatch, type StoredSegment } from "./embedding-store.js";

/** Vector columns and VECTOR_DISTANCE need 23.7 or later. */
export const MIN_ORACLE_VERSION: readonly [number, number] = [23, 7];

const ORA_TABLE_OR_VIEW_MISSING = 942;

export const CREATE_TABLE_SQL = `
  CREATE TABLE video_embeddings (
    id VARCHAR2(100) PRIMARY KEY,
    video_file VARCHAR2(1000),
    start_time NUMBER,
    end_time NUMBER,
    embedding_vector VECTOR(1024, FLOAT64)
  )`;

export const CREATE_INDEX_SQL = `
  CREATE VECTOR INDEX video_embeddings_idx
  ON video_embeddings(embedding_vector)
  ORGANIZATION NEIGHBOR PARTITIONS
  DISTANCE COSINE
  WITH TARGET ACCURACY 95`;

export const INSERT_SQL = `
  INSERT INTO video_embeddings (id, video_file, start_time, end_time, embedding_vector)
  VALUES (:id, :videoFile, :startTime, :endTime, TO_VECTOR(:vector))`;

const SEARCH_SQL = `
  SELECT video_file, start_time, end_time
  FROM video_embeddings
  ORDER BY vector_distance(embedding_vector, :queryVector, COSINE)
  FETCH FIRST :topK ROWS ONLY`;

export function parseOracleVersion(versionString: string): [number, number] {
  const [major = Number.NaN, minor = 0] = versionString.split(".").map((part) => Number(part));
  if (!Number.isFinite(major)) {
    throw new Error(`Unrecognised Oracle version "${versionString}".`);
  }
  return [major, Number.isFinite(minor) ? minor : 0];
}

export function isSupportedOracleVersion(versionString: string): boolean {
  const [major, minor] = parseOracleVersion(versionString);
  const [minMajor, minMinor] = MIN_ORACLE_VERSION;
  return major > minMajor || (major === minMajor && minor >= minMinor);
}

export const isMissingTableError = (error: unknown) =>
  typeof error === "object" && error !== null && "errorNum" in error && error.errorNum === ORA_TABLE_OR_VIEW_MISSING;

export type OracleConnection = Pick<Connection, "execute" | "executeMany" | "commit" | "close">;

export class OracleEmbeddingStore implements EmbeddingStore {
  constructor(private readonly connection: OracleConnection) {}

  static async connect(oracle: OracleConfig): Promise<OracleEmbeddingStore> {
    const connection = await oracledb.getConnection({
      user: oracle.user,
      password: oracle.password,
      connectString: oracle.connectString,
      configDir: oracle.walletPath,
      walletLocation: oracle.walletPath,
      walletPassword: oracle.walletPath ? oracle.password : undefined
    });

    if (!isSupportedOracleVersion(connection.oracleServerVersionString)) {
      await connection.close();
      throw new Error(
        `Oracle Database ${MIN_ORACLE_VERSION.join(".")} or later is required (got ${connection.oracleServerVersionString}).`
      );
    }

    console.log(`Connected to Oracle Database ${connection.oracleServerVersionString}`);
    return new OracleEmbeddingStore(connection);
  }

  async createSchema() {
    try {
      await this.connection.execute("DROP TABLE video_embeddings");
    } catch (error) {
      if (!isMissingTableError(error)) throw error;
    }
    await this.connection.execute(CREATE_TABLE_SQL);
    await this.connection.execute(CREATE_INDEX_SQL);
  }

  /** One `executeMany` and commit per batch of rows. */
  async storeSegments(taskId: string, videoFile: string, segments: StoredSegment[]) {
    const rows = segments.map((segment, position) => ({
      id: segmentRowId(taskId, position),
      videoFile,
      startTime: segment.startTime,
      endTime: segment.endTime,
      vector: JSON.stringify(segment.vector)
    }));

    for (let offset = 0; offset < rows.length; offset += STORE_BATCH_SIZE) {
      await this.connection.executeMany(INSERT_SQL, rows.slice(offset, offset + STORE_BATCH_SIZE));
      await this.connection.commit();
    }
    return segments.length;
  }

  async search(vector: number[], topK: number): Promise<SegmentMatch[]> {
    const result = await this.connection.execute<[string, number, number]>(
      SEARCH_SQL,
      { queryVector: { val: new Float64Array(vector) }, topK },
      { outFormat: oracledb.OUT_FORMAT_ARRAY }
    );
    return (result.rows ?? []).map(([videoFile, startTime, endTime]) => ({ videoFile, startTime, endTime }));
  }

  async close() {
    await this.connection.close();
  }
}
