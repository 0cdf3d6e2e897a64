import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";
import { config } from "../config.js";
import { createEmbeddingStore } from "../embeddings/create-store.js";
import type { EmbeddingStore } from "../embeddings/embedding-store.js";
import { JsonTaskIdCache } from "../embeddings/task-id-cache.js";
import { VideoEmbeddingIndexer, isVideoUrl } from "../embeddings/video-indexer.js";
import { errorMessage } from "../errors.js";
import { createVideoApiClient } from "../video-api-client.js";
import { parseTopK } from "./options.js";

const USAGE = `Usage:
  npm run embeddings -- schema
  npm run embeddings -- store <video file | folder | url>...
  npm run embeddings -- query [--top-k 5] <text>...`;

const VIDEO_EXTENSIONS = new Set([".mp4", ".avi", ".mov", ".mkv", ".webm"]);

async function expandVideos(inputs: string[]) {
  const videos: string[] = [];
  for (const input of inputs) {
    if (isVideoUrl(input) || !(await stat(input)).isDirectory()) {
      videos.push(input);
      continue;
    }
    const entries = await readdir(input);
    for (const entry of entries.sort()) {
      if (VIDEO_EXTENSIONS.has(path.extname(entry).toLowerCase())) {
        videos.push(path.join(input, entry));
      }
    }
  }
  return videos;
}

async function run(store: EmbeddingStore, command: string | undefined, args: string[]) {
  const indexer = new VideoEmbeddingIndexer({
    client: createVideoApiClient(config.videoApi),
    store,
    taskCache: new JsonTaskIdCache(config.embeddings.taskCachePath),
    clipLengthSec: config.embeddings.clipLengthSec,
    polling: config.polling
  });

  switch (command) {
    case "schema":
      await store.createSchema();
      console.log("Created video_embeddings table and vector index");
      return 0;

    case "store": {
      const videos = await expandVideos(args);
      const { failed } = await indexer.processVideos(videos);
      if (failed.length > 0) {
        console.error(`\n${failed.length} of ${videos.length} videos failed.`);
        return 1;
      }
      return 0;
    }

    case "query": {
      const { values, positionals } = parseArgs({
        args,
        allowPositionals: true,
        options: { "top-k": { type: "string" } }
      });
      const topK = parseTopK(values["top-k"], config.embeddings.topK);
      const results = await indexer.query(positionals, topK);
      for (const [query, matches] of results) {
        console.log(`\nQuery: '${query}'`);
        console.log("-".repeat(query.length + 9));
        for (const match of matches) {
          console.log(`Video: ${match.videoFile}`);
          console.log(`Segment: ${match.startTime.toFixed(1)}s to ${match.endTime.toFixed(1)}s\n`);
        }
      }
      return 0;
    }

    default:
      console.error(USAGE);
      return 1;
  }
}

async function main(argv: string[]) {
  const [command, ...args] = argv;
  if (command !== "schema" && args.length === 0) {
    console.error(USAGE);
    return 1;
  }

  if (config.embeddings.store === "memory") {
    console.warn("EMBEDDING_STORE=memory: results are not kept after this command exits.");
  }

  let store: EmbeddingStore | undefined;
  try {
    store = await createEmbeddingStore(config.embeddings);
    return await run(store, command, args);
  } catch (error) {
    console.error(`\n❌ Error: ${errorMessage(error)}`);
    return 1;
  } finally {
    await store?.close();
  }
}

process.exitCode = await main(process.argv.slice(2));
