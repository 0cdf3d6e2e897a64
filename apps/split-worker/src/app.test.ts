import type { Server } from "node:http";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { z } from "zod";
import { createApp } from "./app.js";
import type { MediaTools } from "./ffmpeg.js";
import { SplitJobQueue } from "./jobs.js";

const tools: MediaTools = {
  probeDuration: async () => 65,
  async extractClip(_inputPath, outputPath, clip) {
    await writeFile(outputPath, `clip ${clip.index}`);
  },
};

const base64Video = Buffer.from("video").toString("base64");

const jobIdOf = (body: unknown) => z.object({ jobId: z.string() }).parse(body).jobId;

let tmpRoot: string;
let server: Server | undefined;

beforeEach(async () => {
  tmpRoot = await mkdtemp(path.join(os.tmpdir(), "vidkit-worker-"));
});

afterEach(async () => {
  const open = server;
  server = undefined;
  if (open) await new Promise<void>((resolve, reject) => open.close((error) => (error ? reject(error) : resolve())));
  await rm(tmpRoot, { recursive: true, force: true });
});

async function start(ffmpegVersion: () => Promise<string> = async () => "ffmpeg version 6.1") {
  const queue = new SplitJobQueue({ tools, tmpRoot, downloadTimeoutMs: 1000, log: () => {} });
  const app = createApp({ queue, ffmpegVersion, logRequest: () => {} });
  const listening = await new Promise<Server>((resolve) => {
    const created = app.listen(0, () => resolve(created));
  });
  server = listening;
  const address = listening.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  const baseUrl = `http://127.0.0.1:${address.port}`;

  const call = async (method: string, route: string, body?: unknown) => {
    const response = await fetch(`${baseUrl}${route}`, {
      method,
      headers: body === undefined ? undefined : { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: response.status, body: await response.json() };
  };

  return { call, queue, baseUrl };
}

describe("split worker routes", () => {
  it("reports the ffmpeg version on /health", async () => {
    const { call } = await start();
    await expect(call("GET", "/health")).resolves.toMatchObject({
      status: 200,
      body: { status: "ok", service: "@vidkit/split-worker", ffmpeg: "ffmpeg version 6.1" },
    });
  });

  it("still answers /health without ffmpeg", async () => {
    const { call } = await start(async () => {
      throw new Error("spawn ffmpeg ENOENT");
    });
    const { body } = await call("GET", "/health");
    expect(body).toMatchObject({ ffmpeg: "unavailable" });
  });

  it("splits an uploaded payload and serves each clip", async () => {
    const { call, queue, baseUrl } = await start();

    const created = await call("POST", "/api/split/jobs", {
      assetPayload: { assetId: "asset_1", filename: "match.mp4", base64Data: base64Video },
      clipLengthSec: 30,
    });
    expect(created.status).toBe(202);
    const jobId = jobIdOf(created.body);
    await queue.idle();

    const { body } = await call("GET", `/api/split/jobs/${jobId}`);
    expect(body).toMatchObject({ status: "completed", progress: 100, sourceDurationSec: 65, policy: "keep_short" });
    expect(body).toHaveProperty("clips", [
      {
        index: 0,
        startTime: 0,
        endTime: 30,
        duration: 30,
        source: "match.mp4",
        outputUrl: `${baseUrl}/api/split/jobs/${jobId}/clips/0/output`,
      },
      {
        index: 1,
        startTime: 30,
        endTime: 60,
        duration: 30,
        source: "match.mp4",
        outputUrl: `${baseUrl}/api/split/jobs/${jobId}/clips/1/output`,
      },
      {
        index: 2,
        startTime: 60,
        endTime: 65,
        duration: 5,
        source: "match.mp4",
        outputUrl: `${baseUrl}/api/split/jobs/${jobId}/clips/2/output`,
      },
    ]);

    const output = await fetch(`${baseUrl}/api/split/jobs/${jobId}/clips/2/output`);
    expect(output.status).toBe(200);
    expect(output.headers.get("content-type")).toBe("video/mp4");
    await expect(output.text()).resolves.toBe("clip 2");

    await expect(call("GET", `/api/split/jobs/${jobId}/clips/9/output`)).resolves.toEqual({
      status: 404,
      body: { error: "clip_not_found" },
    });
  });

  it("requires exactly one source", async () => {
    const { call } = await start();
    const neither = await call("POST", "/api/split/jobs", { clipLengthSec: 30 });
    const both = await call("POST", "/api/split/jobs", {
      sourceUrl: "https://cdn.test/a.mp4",
      assetPayload: { assetId: "asset_1", base64Data: base64Video },
      clipLengthSec: 30,
    });

    expect(neither.status).toBe(400);
    expect(both.status).toBe(400);
  });

  it("rejects a non-positive clip length before queueing", async () => {
    const { call } = await start();
    const { status } = await call("POST", "/api/split/jobs", {
      sourceUrl: "https://cdn.test/a.mp4",
      clipLengthSec: 0,
    });
    expect(status).toBe(400);
  });

  it("answers 404 for unknown jobs", async () => {
    const { call } = await start();
    await expect(call("GET", "/api/split/jobs/split_missing")).resolves.toEqual({
      status: 404,
      body: { error: "job_not_found" },
    });
    await expect(call("POST", "/api/split/jobs/retry", { jobId: "split_missing" })).resolves.toMatchObject({
      status: 404,
    });
  });

  it("retries and cancels through the API", async () => {
    const { call, queue } = await start();
    const created = await call("POST", "/api/split/jobs", {
      assetPayload: { assetId: "asset_1", base64Data: base64Video },
      clipLengthSec: 30,
      idempotencyKey: "match-1",
    });
    const jobId = jobIdOf(created.body);
    await queue.idle();

    const repeated = await call("POST", "/api/split/jobs", {
      assetPayload: { assetId: "asset_1", base64Data: base64Video },
      clipLengthSec: 30,
      idempotencyKey: "match-1",
    });
    expect(jobIdOf(repeated.body)).toBe(jobId);

    const retried = await call("POST", "/api/split/jobs/retry", { jobId });
    expect(retried.status).toBe(202);
    expect(retried.body).toMatchObject({ attempts: 2 });
    await queue.idle();

    const canceled = await call("POST", `/api/split/jobs/${jobId}/cancel`);
    expect(canceled.body).toMatchObject({ status: "completed", attempts: 2 });
  });
});
