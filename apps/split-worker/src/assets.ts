import { promises as fs } from "node:fs";
import path from "node:path";

export type AssetPayload = {
  assetId: string;
  filename?: string;
  mimeType?: string;
  base64Data: string;
};

export type SplitSource = { url: string } | { payload: AssetPayload };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type MaterializeOptions = {
  fetchImpl?: FetchLike;
  timeoutMs: number;
  signal?: AbortSignal;
};

export function sourceLabel(source: SplitSource) {
  return "url" in source ? source.url : (source.payload.filename ?? source.payload.assetId);
}

export function normalizeBase64Data(value: string) {
  const marker = "base64,";
  const index = value.indexOf(marker);
  if (index === -1) return value.trim();
  return value.slice(index + marker.length).trim();
}

export function fileExtensionForPayload(payload: AssetPayload) {
  const fromName = payload.filename?.trim();
  if (fromName) {
    const ext = path.extname(fromName);
    if (ext) return ext;
  }

  const mime = payload.mimeType?.toLowerCase() ?? "";
  if (mime.includes("mp4")) return ".mp4";
  if (mime.includes("webm")) return ".webm";
  if (mime.includes("quicktime") || mime.includes("mov")) return ".mov";
  if (mime.includes("mpeg")) return ".mpg";
  return ".bin";
}

export function fileExtensionForUrl(assetUrl: string) {
  let pathname: string;
  try {
    pathname = new URL(assetUrl).pathname;
  } catch {
    return ".mp4";
  }
  return path.extname(pathname) || ".mp4";
}

async function writePayload(dir: string, payload: AssetPayload) {
  const filePath = path.join(dir, `source${fileExtensionForPayload(payload)}`);
  const buffer = Buffer.from(normalizeBase64Data(payload.base64Data), "base64");
  if (buffer.byteLength === 0) {
    throw new Error(`Asset payload for ${payload.assetId} is empty.`);
  }
  await fs.writeFile(filePath, buffer);
  return filePath;
}

async function download(dir: string, assetUrl: string, { fetchImpl = fetch, timeoutMs, signal }: MaterializeOptions) {
  const filePath = path.join(dir, `source${fileExtensionForUrl(assetUrl)}`);
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const forwardAbort = () => controller.abort();
  signal?.addEventListener("abort", forwardAbort, { once: true });

  try {
    const response = await fetchImpl(assetUrl, { signal: controller.signal });
    if (!response.ok) {
      throw new Error(`Source download failed (${response.status}) for ${assetUrl}.`);
    }

    const buffer = Buffer.from(await response.arrayBuffer());
    if (buffer.byteLength === 0) {
      throw new Error(`Downloaded source ${assetUrl} is empty.`);
    }
    await fs.writeFile(filePath, buffer);
    return filePath;
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener("abort", forwardAbort);
  }
}

/** Writes the job's source into `dir` and returns its path. */
export async function materializeSource(dir: string, source: SplitSource, options: MaterializeOptions) {
  await fs.mkdir(dir, { recursive: true });
  if ("payload" in source) return writePayload(dir, source.payload);
  return download(dir, source.url, options);
}
