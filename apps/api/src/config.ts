import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

dotenv.config();

export const DEFAULT_VIDEO_API_BASE_URL = "https://api.twelvelabs.io/v1.3";

export type EmbeddingStoreKind = "memory" | "oracle";

export interface VideoApiConfig {
  baseUrl: string;
  apiKey: string;
  embeddingModel: string;
  generateModel: string;
  /** Sampling temperature for analysis, within [0, 1]. */
  temperature: number;
}

export interface PollingConfig {
  intervalMs: number;
  timeoutMs: number;
}

export interface OracleConfig {
  user: string;
  password: string;
  connectString: string;
  walletPath?: string;
}

export interface EmbeddingsConfig {
  store: EmbeddingStoreKind;
  clipLengthSec: number;
  topK: number;
  /** JSON file remembering which embedding task belongs to which video. */
  taskCachePath: string;
  oracle: OracleConfig | null;
}

export interface AppConfig {
  port: number;
  videoApi: VideoApiConfig;
  polling: PollingConfig;
  embeddings: EmbeddingsConfig;
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8787),
  VIDEO_API_BASE_URL: z.string().url().default(DEFAULT_VIDEO_API_BASE_URL),
  VIDEO_API_KEY: z.string().default(""),
  VIDEO_API_EMBEDDING_MODEL: z.string().min(1).default("Marengo-retrieval-2.7"),
  VIDEO_API_GENERATE_MODEL: z.string().min(1).default("pegasus1.2"),
  VIDEO_API_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.2),
  EMBEDDING_CLIP_LENGTH_SEC: z.coerce.number().positive().default(6),
  SEARCH_TOP_K: z.coerce.number().int().positive().default(5),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
  POLL_TIMEOUT_MS: z.coerce.number().int().positive().default(1_800_000),
  EMBEDDING_STORE: z.enum(["memory", "oracle"]).default("memory"),
  EMBEDDING_TASK_CACHE: z.string().min(1).default("video_task_ids.json"),
  ORACLE_DB_USERNAME: z.string().optional(),
  ORACLE_DB_PASSWORD: z.string().optional(),
  ORACLE_DB_CONNECT_STRING: z.string().optional(),
  ORACLE_DB_WALLET_PATH: z.string().optional()
});

type Env = Record<string, string | undefined>;

// `FOO=` in a .env file means "unset", not "empty".
function withoutBlanks(env: Env): Env {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""));
}

function oracleConfig(env: z.infer<typeof envSchema>): OracleConfig | null {
  const { ORACLE_DB_USERNAME: user, ORACLE_DB_PASSWORD: password, ORACLE_DB_CONNECT_STRING: connectString } = env;
  if (!user || !password || !connectString) {
    if (env.EMBEDDING_STORE === "oracle") {
      throw new ConfigError([
        "EMBEDDING_STORE=oracle needs ORACLE_DB_USERNAME, ORACLE_DB_PASSWORD and ORACLE_DB_CONNECT_STRING"
      ]);
    }
    return null;
  }
  return { user, password, connectString, walletPath: env.ORACLE_DB_WALLET_PATH };
}

export function loadConfig(source: Env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(source));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const env = parsed.data;

  return {
    port: env.PORT,
    videoApi: {
      baseUrl: env.VIDEO_API_BASE_URL.replace(/\/+$/, ""),
      apiKey: env.VIDEO_API_KEY,
      embeddingModel: env.VIDEO_API_EMBEDDING_MODEL,
      generateModel: env.VIDEO_API_GENERATE_MODEL,
      temperature: env.VIDEO_API_TEMPERATURE
    },
    polling: {
      intervalMs: env.POLL_INTERVAL_MS,
      timeoutMs: env.POLL_TIMEOUT_MS
    },
    embeddings: {
      store: env.EMBEDDING_STORE,
      clipLengthSec: env.EMBEDDING_CLIP_LENGTH_SEC,
      topK: env.SEARCH_TOP_K,
      taskCachePath: env.EMBEDDING_TASK_CACHE,
      oracle: oracleConfig(env)
    }
  };
}

export const config = loadConfig(process.env);
