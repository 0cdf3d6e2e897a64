import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  fileExtensionForPayload,
  fileExtensionForUrl,
  materializeSource,
  normalizeBase64Data,
  sourceLabel,
  type FetchLike,
} from "./assets.js";

describe("asset helpers", () => {
  it("strips a data URL prefix from base64 payloads", () => {
    expect(normalizeBase64Data("data:video/mp4;base64,AAAA ")).toBe("AAAA");
    expect(normalizeBase64Data(" BBBB")).toBe("BBBB");
  });

  it("derives extensions from the filename, then the MIME type", () => {
    expect(fileExtensionForPayload({ assetId: "a", filename: "clip.MOV", base64Data: "x" })).toBe(".MOV");
    expect(fileExtensionForPayload({ assetId: "a", mimeType: "video/webm", base64Data: "x" })).toBe(".webm");
    expect(fileExtensionForPayload({ assetId: "a", mimeType: "video/quicktime", base64Data: "x" })).toBe(".mov");
    expect(fileExtensionForPayload({ assetId: "a", base64Data: "x" })).toBe(".bin");
  });

  it("derives extensions from URL paths", () => {
    expect(fileExtensionForUrl("https://cdn.test/videos/match.mkv?sig=1")).toBe(".mkv");
    expect(fileExtensionForUrl("https://cdn.test/stream")).toBe(".mp4");
    expect(fileExtensionForUrl("not a url")).toBe(".mp4");
  });

  it("labels sources by URL or filename", () => {
    expect(sourceLabel({ url: "https://cdn.test/a.mp4" })).toBe("https://cdn.test/a.mp4");
    expect(sourceLabel({ payload: { assetId: "asset_1", base64Data: "x" } })).toBe("asset_1");
    expect(sourceLabel({ payload: { assetId: "asset_1", filename: "a.mp4", base64Data: "x" } })).toBe("a.mp4");
  });
});

describe("materializeSource", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "vidkit-assets-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes decoded payloads", async () => {
    const filePath = await materializeSource(
      path.join(dir, "source"),
      { payload: { assetId: "asset_1", filename: "a.mp4", base64Data: Buffer.from("video").toString("base64") } },
      { timeoutMs: 1000 }
    );

    expect(filePath).toBe(path.join(dir, "source", "source.mp4"));
    await expect(readFile(filePath, "utf8")).resolves.toBe("video");
  });

  it("rejects an empty payload", async () => {
    await expect(
      materializeSource(dir, { payload: { assetId: "asset_1", base64Data: "====" } }, { timeoutMs: 1000 })
    ).rejects.toThrow("Asset payload for asset_1 is empty.");
  });

  it("downloads URL sources", async () => {
    const fetchImpl: FetchLike = async () => new Response("remote video");
    const filePath = await materializeSource(dir, { url: "https://cdn.test/match.webm" }, { fetchImpl, timeoutMs: 1000 });

    expect(path.basename(filePath)).toBe("source.webm");
    await expect(readFile(filePath, "utf8")).resolves.toBe("remote video");
  });

  it("fails on a non-2xx download", async () => {
    const fetchImpl: FetchLike = async () => new Response("gone", { status: 404 });
    await expect(
      materializeSource(dir, { url: "https://cdn.test/match.mp4" }, { fetchImpl, timeoutMs: 1000 })
    ).rejects.toThrow("Source download failed (404) for https://cdn.test/match.mp4.");
  });
});
