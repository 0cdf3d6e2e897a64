import { describe, it, expect } from "vitest";
import { DEFAULT_VIDEO_API_BASE_URL, loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig", () => {
  it("fills every field with its default", () => {
    const config = loadConfig({});
    expect(config).toEqual({
      port: 8787,
      videoApi: {
        baseUrl: DEFAULT_VIDEO_API_BASE_URL,
        apiKey: "",
        embeddingModel: "Marengo-retrieval-2.7",
        generateModel: "pegasus1.2",
        temperature: 0.2
      },
      polling: { intervalMs: 5000, timeoutMs: 1_800_000 },
      embeddings: {
        store: "memory",
        clipLengthSec: 6,
        topK: 5,
        taskCachePath: "video_task_ids.json",
        oracle: null
      }
    });
  });

  it("reads and coerces environment values", () => {
    const config = loadConfig({
      PORT: "9000",
      VIDEO_API_BASE_URL: "https://video.test/v2/",
      VIDEO_API_KEY: "test-key",
      VIDEO_API_TEMPERATURE: "0.7",
      SEARCH_TOP_K: "3",
      POLL_INTERVAL_MS: "250"
    });
    expect(config.port).toBe(9000);
    expect(config.videoApi.baseUrl).toBe("https://video.test/v2");
    expect(config.videoApi.apiKey).toBe("test-key");
    expect(config.videoApi.temperature).toBe(0.7);
    expect(config.embeddings.topK).toBe(3);
    expect(config.polling.intervalMs).toBe(250);
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ PORT: "", VIDEO_API_TEMPERATURE: "  " }).port).toBe(8787);
  });

  it("rejects a temperature outside [0, 1]", () => {
    expect(() => loadConfig({ VIDEO_API_TEMPERATURE: "1.5" })).toThrow(ConfigError);
  });

  it("lists every invalid field", () => {
    try {
      loadConfig({ PORT: "abc", EMBEDDING_STORE: "chroma" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const issues = error instanceof ConfigError ? error.issues : [];
      expect(issues.map((issue) => issue.split(":")[0])).toEqual(["PORT", "EMBEDDING_STORE"]);
    }
  });

  it("requires the Oracle settings for the oracle store", () => {
    expect(() => loadConfig({ EMBEDDING_STORE: "oracle" })).toThrow(ConfigError);

    const config = loadConfig({
      EMBEDDING_STORE: "oracle",
      ORACLE_DB_USERNAME: "vidkit",
      ORACLE_DB_PASSWORD: "test-secret",
      ORACLE_DB_CONNECT_STRING: "localhost/FREEPDB1"
    });
    expect(config.embeddings.oracle).toEqual({
      user: "vidkit",
      password: "test-secret",
      connectString: "localhost/FREEPDB1",
      walletPath: undefined
    });
  });
});
