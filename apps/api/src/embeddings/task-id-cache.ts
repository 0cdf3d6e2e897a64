import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";

export interface TaskIdCache {
  get(videoFile: string): Promise<string | undefined>;
  set(videoFile: string, taskId: string): Promise<void>;
}

const cacheFileSchema = z.record(z.string());

const isMissingFile = (error: unknown) =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

/** Video → embedding task id, persisted as a JSON object. */
export class JsonTaskIdCache implements TaskIdCache {
  constructor(private readonly filePath: string) {}

  async get(videoFile: string) {
    const entries = await this.load();
    return entries[videoFile];
  }

  async set(videoFile: string, taskId: string) {
    const entries = await this.load();
    entries[videoFile] = taskId;
    await writeFile(this.filePath, `${JSON.stringify(entries, null, 2)}\n`, "utf8");
  }

  private async load(): Promise<Record<string, string>> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return {};
      throw error;
    }

    const parsed = cacheFileSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error(`Task id cache ${this.filePath} is not a JSON object of strings.`);
    }
    return parsed.data;
  }
}
