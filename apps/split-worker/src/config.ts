import os from "node:os";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

export interface WorkerConfig {
  port: number;
  ffmpegBin: string;
  ffprobeBin: string;
  /** Sources and clip outputs live under `<tmpRoot>/<jobId>`. */
  tmpRoot: string;
  downloadTimeoutMs: number;
}

const envSchema = z.object({
  SPLIT_WORKER_PORT: z.coerce.number().int().positive().default(8790),
  SPLIT_WORKER_FFMPEG_BIN: z.string().min(1).default("ffmpeg"),
  SPLIT_WORKER_FFPROBE_BIN: z.string().min(1).default("ffprobe"),
  SPLIT_WORKER_TMP_ROOT: z.string().min(1).default(path.join(os.tmpdir(), "vidkit-split-worker")),
  SPLIT_WORKER_DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
});

type Env = Record<string, string | undefined>;

export function loadConfig(source: Env): WorkerConfig {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  return {
    port: parsed.data.SPLIT_WORKER_PORT,
    ffmpegBin: parsed.data.SPLIT_WORKER_FFMPEG_BIN,
    ffprobeBin: parsed.data.SPLIT_WORKER_FFPROBE_BIN,
    tmpRoot: parsed.data.SPLIT_WORKER_TMP_ROOT,
    downloadTimeoutMs: parsed.data.SPLIT_WORKER_DOWNLOAD_TIMEOUT_MS,
  };
}
