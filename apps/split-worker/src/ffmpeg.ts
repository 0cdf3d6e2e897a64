import { spawn } from "node:child_process";
import { clipDuration, type ClipSpec } from "@vidkit/shared";

const STDERR_TAIL_CHARS = 12_000;

export interface MediaTools {
  probeDuration(inputPath: string, signal: AbortSignal): Promise<number>;
  /** Cuts one clip; `onProgress` receives seconds encoded so far. */
  extractClip(
    inputPath: string,
    outputPath: string,
    clip: ClipSpec,
    onProgress: (encodedSec: number) => void,
    signal: AbortSignal
  ): Promise<void>;
}

export function buildClipArgs(inputPath: string, outputPath: string, clip: ClipSpec) {
  return [
    "-y",
    "-ss",
    clip.startTime.toFixed(3),
    "-t",
    clipDuration(clip).toFixed(3),
    "-i",
    inputPath,
    "-c:v",
    "mpeg4",
    "-q:v",
    "3",
    "-c:a",
    "aac",
    "-b:a",
    "128k",
    "-movflags",
    "+faststart",
    "-progress",
    "pipe:1",
    "-nostats",
    outputPath,
  ];
}

export const buildProbeArgs = (inputPath: string) => [
  "-v",
  "error",
  "-show_entries",
  "format=duration",
  "-of",
  "default=noprint_wrappers=1:nokey=1",
  inputPath,
];

/**
 * Reads one `-progress` line. Returns encoded seconds, "end", or undefined
 * for lines that carry no position.
 */
export function parseProgressLine(line: string, expectedSec: number): number | "end" | undefined {
  if (line === "progress=end") return "end";

  if (line.startsWith("out_time_us=")) {
    const us = Number(line.slice("out_time_us=".length));
    return Number.isFinite(us) ? us / 1_000_000 : undefined;
  }

  if (line.startsWith("out_time_ms=")) {
    // Older builds report microseconds under this key too.
    const raw = Number(line.slice("out_time_ms=".length));
    if (!Number.isFinite(raw)) return undefined;
    const ms = raw > expectedSec * 1000 * 10 ? raw / 1000 : raw;
    return ms / 1000;
  }

  return undefined;
}

export function parseProbeDuration(output: string) {
  const duration = Number(output.trim().split(/\r?\n/)[0]);
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new Error(`ffprobe reported no usable duration (${JSON.stringify(output.trim())}).`);
  }
  return duration;
}

type RunOptions = {
  signal?: AbortSignal;
  onStdoutLine?: (line: string) => void;
};

async function run(bin: string, args: string[], { signal, onStdoutLine }: RunOptions = {}) {
  const child = spawn(bin, args, { stdio: ["ignore", "pipe", "pipe"] });
  const kill = () => child.kill("SIGTERM");
  signal?.addEventListener("abort", kill, { once: true });

  let stdout = "";
  let stderrTail = "";

  child.stdout.setEncoding("utf8");
  child.stdout.on("data", (chunk: string) => {
    stdout += chunk;
    if (!onStdoutLine) return;
    for (const line of chunk.split(/\r?\n/)) {
      if (line) onStdoutLine(line);
    }
  });

  child.stderr.setEncoding("utf8");
  child.stderr.on("data", (chunk: string) => {
    stderrTail = `${stderrTail}${chunk}`;
    if (stderrTail.length > STDERR_TAIL_CHARS) {
      stderrTail = stderrTail.slice(stderrTail.length - STDERR_TAIL_CHARS);
    }
  });

  try {
    const exitCode = await new Promise<number>((resolve, reject) => {
      child.once("error", reject);
      child.once("close", (code) => resolve(code ?? 1));
    });

    if (signal?.aborted) {
      throw new Error(`${bin} was stopped.`);
    }
    if (exitCode !== 0) {
      const compact = stderrTail.trim().split(/\r?\n/).slice(-8).join(" | ");
      throw new Error(`${bin} failed (exit=${exitCode}): ${compact || "no stderr"}`);
    }
    return stdout;
  } finally {
    signal?.removeEventListener("abort", kill);
  }
}

export function createFfmpegTools(ffmpegBin: string, ffprobeBin: string): MediaTools {
  return {
    async probeDuration(inputPath, signal) {
      return parseProbeDuration(await run(ffprobeBin, buildProbeArgs(inputPath), { signal }));
    },

    async extractClip(inputPath, outputPath, clip, onProgress, signal) {
      const expectedSec = clipDuration(clip);
      await run(ffmpegBin, buildClipArgs(inputPath, outputPath, clip), {
        signal,
        onStdoutLine: (line) => {
          const position = parseProgressLine(line, expectedSec);
          if (position === "end") onProgress(expectedSec);
          else if (position !== undefined) onProgress(Math.min(position, expectedSec));
        },
      });
    },
  };
}

export async function ffmpegVersion(ffmpegBin: string) {
  const output = await run(ffmpegBin, ["-version"]);
  return output.split(/\r?\n/)[0] ?? "unknown";
}
