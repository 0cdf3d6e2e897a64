import { createApp, SERVICE_NAME } from "./app.js";
import { loadConfig } from "./config.js";
import { createFfmpegTools, ffmpegVersion } from "./ffmpeg.js";
import { SplitJobQueue } from "./jobs.js";

const config = loadConfig(process.env);

const queue = new SplitJobQueue({
  tools: createFfmpegTools(config.ffmpegBin, config.ffprobeBin),
  tmpRoot: config.tmpRoot,
  downloadTimeoutMs: config.downloadTimeoutMs,
});

const app = createApp({ queue, ffmpegVersion: () => ffmpegVersion(config.ffmpegBin) });

const server = app.listen(config.port, () => {
  console.log(`${SERVICE_NAME} listening on http://localhost:${config.port} (outputs in ${config.tmpRoot})`);
});

process.once("SIGTERM", () => {
  server.close();
});
