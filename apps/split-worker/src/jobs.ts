import { promises as fs } from "node:fs";
import path from "node:path";
import { clipDuration, isOriginalClip, planClips, type ClipSpec, type TrailingPolicy } from "@vidkit/shared";
import { materializeSource, sourceLabel, type FetchLike, type SplitSource } from "./assets.js";
import type { MediaTools } from "./ffmpeg.js";

/** Upper bound on the clips one job may cut. */
export const MAX_CLIPS_PER_JOB = 10_000;

export type JobStatus = "queued" | "running" | "completed" | "failed" | "canceled";

export type SplitJobRequest = {
  source: SplitSource;
  /** Skips the ffprobe call when the caller already knows the length. */
  durationSec?: number;
  clipLengthSec: number;
  policy: TrailingPolicy;
  includeOriginal: boolean;
  idempotencyKey?: string;
};

export type FinishedClip = ClipSpec & {
  duration: number;
  outputPath: string;
};

export type SplitJob = {
  id: string;
  status: JobStatus;
  progress: number;
  attempts: number;
  createdAt: string;
  updatedAt: string;
  request: SplitJobRequest;
  sourceDurationSec?: number;
  plannedClips?: number;
  clips: FinishedClip[];
  error?: string;
  abort?: AbortController;
};

export type SplitJobQueueOptions = {
  tools: MediaTools;
  tmpRoot: string;
  downloadTimeoutMs: number;
  fetchImpl?: FetchLike;
  log?: (line: string) => void;
};

function nowIso() {
  return new Date().toISOString();
}

function nextJobId() {
  return `split_${Math.random().toString(36).slice(2, 10)}`;
}

function clamp(value: number, min: number, max: number) {
  return Math.min(max, Math.max(min, value));
}

export const clipFileName = (clip: ClipSpec) =>
  isOriginalClip(clip) ? "original.mp4" : `clip-${String(clip.index).padStart(3, "0")}.mp4`;

export class SplitJobQueue {
  private readonly jobs = new Map<string, SplitJob>();
  private readonly jobsByIdempotencyKey = new Map<string, string>();
  private readonly queue: string[] = [];
  private draining: Promise<void> | undefined;
  private readonly log: (line: string) => void;

  constructor(private readonly options: SplitJobQueueOptions) {
    this.log = options.log ?? console.log;
  }

  /** Queues a job, or returns the existing one for a repeated idempotency key. */
  submit(request: SplitJobRequest): { job: SplitJob; created: boolean } {
    const existingId = request.idempotencyKey ? this.jobsByIdempotencyKey.get(request.idempotencyKey) : undefined;
    const existing = existingId ? this.jobs.get(existingId) : undefined;
    if (existing) return { job: existing, created: false };

    const job: SplitJob = {
      id: nextJobId(),
      status: "queued",
      progress: 0,
      attempts: 1,
      createdAt: nowIso(),
      updatedAt: nowIso(),
      request,
      clips: [],
    };

    if (request.idempotencyKey) {
      this.jobsByIdempotencyKey.set(request.idempotencyKey, job.id);
    }
    this.jobs.set(job.id, job);
    this.enqueue(job.id);
    return { job, created: true };
  }

  get(jobId: string) {
    return this.jobs.get(jobId);
  }

  cancel(job: SplitJob) {
    if (job.status === "completed" || job.status === "failed" || job.status === "canceled") return job;

    job.status = "canceled";
    job.updatedAt = nowIso();
    job.abort?.abort();
    this.log(`[${job.id}] canceled`);
    return job;
  }

  /**
   * Requeues a job that is not running. A canceled run that is still stopping
   * leaves the job alone once it settles, and the retry runs after it.
   */
  retry(job: SplitJob) {
    if (job.status === "running") {
      throw new Error(`Job ${job.id} is already running.`);
    }

    job.progress = 0;
    job.error = undefined;
    job.clips = [];
    job.attempts += 1;
    job.status = "queued";
    job.updatedAt = nowIso();
    this.enqueue(job.id);
    return job;
  }

  /** Resolves once every queued job has settled. */
  async idle() {
    while (this.draining) {
      await this.draining;
    }
  }

  jobDir(jobId: string) {
    return path.resolve(this.options.tmpRoot, jobId);
  }

  private enqueue(jobId: string) {
    if (!this.queue.includes(jobId)) {
      this.queue.push(jobId);
    }
    if (this.draining) return;

    this.draining = this.drain()
      .catch((error: unknown) => this.log(`Split queue stopped: ${String(error)}`))
      .finally(() => {
        this.draining = undefined;
      });
  }

  private async drain() {
    while (this.queue.length > 0) {
      const jobId = this.queue.shift();
      if (!jobId) continue;
      await this.execute(jobId);
    }
  }

  private async execute(jobId: string) {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== "queued") return;

    const { tools, downloadTimeoutMs, fetchImpl } = this.options;
    const abort = new AbortController();
    job.status = "running";
    job.abort = abort;
    job.progress = 0;
    job.updatedAt = nowIso();

    // Set when this run is canceled, even if the job is retried meanwhile.
    const stopped = () => abort.signal.aborted;
    const workDir = this.jobDir(job.id);
    const sourceDir = path.join(workDir, "source");
    this.log(`[${job.id}] started (attempt ${job.attempts}) for ${sourceLabel(job.request.source)}`);

    try {
      await fs.rm(workDir, { recursive: true, force: true });
      const inputPath = await materializeSource(sourceDir, job.request.source, {
        fetchImpl,
        timeoutMs: downloadTimeoutMs,
        signal: abort.signal,
      });

      const duration = job.request.durationSec ?? (await tools.probeDuration(inputPath, abort.signal));
      if (stopped()) return;

      const expectedClips = Math.ceil(duration / job.request.clipLengthSec) + (job.request.includeOriginal ? 1 : 0);
      if (expectedClips > MAX_CLIPS_PER_JOB) {
        throw new Error(
          `Splitting ${duration}s into ${job.request.clipLengthSec}s clips needs about ${expectedClips} clips; a job may cut at most ${MAX_CLIPS_PER_JOB}.`
        );
      }

      const plan = planClips({
        duration,
        clipLength: job.request.clipLengthSec,
        policy: job.request.policy,
        includeOriginal: job.request.includeOriginal,
      });
      job.sourceDurationSec = duration;
      job.plannedClips = plan.length;

      const totalSec = plan.reduce((sum, clip) => sum + clipDuration(clip), 0);
      let doneSec = 0;
      for (const clip of plan) {
        if (stopped()) return;

        const outputPath = path.join(workDir, clipFileName(clip));
        await tools.extractClip(
          inputPath,
          outputPath,
          clip,
          (encodedSec) => {
            if (!stopped()) this.setProgress(job, doneSec + encodedSec, totalSec);
          },
          abort.signal
        );
        if (stopped()) return;

        doneSec += clipDuration(clip);
        job.clips.push({ ...clip, duration: clipDuration(clip), outputPath });
        this.setProgress(job, doneSec, totalSec);
      }

      job.status = "completed";
      job.progress = 100;
      job.updatedAt = nowIso();
      this.log(`[${job.id}] completed with ${job.clips.length} clips`);
    } catch (error) {
      if (!stopped()) {
        job.status = "failed";
        job.error = error instanceof Error ? error.message : String(error);
        job.updatedAt = nowIso();
        this.log(`[${job.id}] failed: ${job.error}`);
      }
    } finally {
      if (job.abort === abort) job.abort = undefined;
      await fs
        .rm(sourceDir, { recursive: true, force: true })
        .catch((error: unknown) => this.log(`[${job.id}] could not remove ${sourceDir}: ${String(error)}`));
    }
  }

  private setProgress(job: SplitJob, doneSec: number, totalSec: number) {
    if (totalSec <= 0) return;
    job.progress = clamp(Math.round((doneSec / totalSec) * 100), 0, 99);
    job.updatedAt = nowIso();
  }
}
