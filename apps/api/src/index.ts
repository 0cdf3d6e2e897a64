import { createApp, SERVICE_NAME } from "./app.js";
import { config } from "./config.js";
import { createEmbeddingStore } from "./embeddings/create-store.js";
import { JsonTaskIdCache } from "./embeddings/task-id-cache.js";
import { VideoEmbeddingIndexer } from "./embeddings/video-indexer.js";
import { createVideoApiClient } from "./video-api-client.js";

const client = createVideoApiClient(config.videoApi);
const store = await createEmbeddingStore(config.embeddings);
const indexer = new VideoEmbeddingIndexer({
  client,
  store,
  taskCache: new JsonTaskIdCache(config.embeddings.taskCachePath),
  clipLengthSec: config.embeddings.clipLengthSec,
  polling: config.polling
});

const app = createApp({ client, indexer, polling: config.polling, searchTopK: config.embeddings.topK });

const server = app.listen(config.port, () => {
  console.log(`${SERVICE_NAME} listening on http://localhost:${config.port}`);
  if (!config.videoApi.apiKey) {
    console.log("VIDEO_API_KEY is not set; calls to the video API will fail with 401.");
  }
});

process.once("SIGTERM", () => {
  server.close();
  store.close().catch((error: unknown) => console.error("Failed to close embedding store:", error));
});
