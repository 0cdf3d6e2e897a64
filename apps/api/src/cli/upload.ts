import { parseArgs } from "node:util";
import { config } from "../config.js";
import { errorMessage } from "../errors.js";
import { MultipartUploader } from "../uploads/multipart-upload.js";
import { createVideoApiClient } from "../video-api-client.js";

const USAGE = "Usage: npm run upload -- --file <path> [--filename <name>] [--type video] [--batch-size 10] [--api-key <key>] [--base-url <url>]";

async function main(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    options: {
      file: { type: "string" },
      filename: { type: "string" },
      type: { type: "string", default: "video" },
      "batch-size": { type: "string", default: "10" },
      "api-key": { type: "string" },
      "base-url": { type: "string" }
    }
  });

  if (!values.file) {
    console.error(USAGE);
    return 1;
  }

  const client = createVideoApiClient({
    ...config.videoApi,
    apiKey: values["api-key"] ?? config.videoApi.apiKey,
    baseUrl: (values["base-url"] ?? config.videoApi.baseUrl).replace(/\/+$/, "")
  });
  const uploader = new MultipartUploader(client);

  console.log(`Starting multipart upload of ${values.file}`);
  const startedAt = Date.now();
  try {
    const assetUrl = await uploader.upload(values.file, {
      filename: values.filename,
      type: values.type,
      batchSize: Number(values["batch-size"])
    });
    console.log(`\n🎉 Upload completed in ${((Date.now() - startedAt) / 1000).toFixed(1)} seconds!`);
    console.log(`🔗 Asset URL: ${assetUrl}`);
    return 0;
  } catch (error) {
    console.error(`\n❌ Error: ${errorMessage(error)}`);
    return 1;
  }
}

process.exitCode = await main(process.argv.slice(2));
