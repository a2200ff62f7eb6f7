import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { silentLogger, type Logger } from "../logger.js";
import type { TranscriptResult } from "../types.js";

const ResultSchema = z.object({
  title: z.string(),
  url: z.string(),
  takeaways: z.string(),
  transcript: z.string(),
  markdown: z.string(),
  filename: z.string(),
});

/**
 * Video id → finished result, persisted as one JSON file that is read fully
 * on load and rewritten fully on every put. Writes go through a single
 * promise chain, so two flushes never interleave on disk.
 */
export class ResultCache {
  private readonly entries = new Map<string, TranscriptResult>();
  private writeChain: Promise<void> = Promise.resolve();
  private readonly log: Logger;

  constructor(
    readonly filePath: string,
    logger: Logger = silentLogger()
  ) {
    this.log = logger.child({ component: "result-cache" });
  }

  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (err: unknown) {
      if (isMissingFile(err)) return;
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err: unknown) {
      this.log.warn({ err, file: this.filePath }, "cache file is not valid JSON, starting empty");
      return;
    }
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      this.log.warn({ file: this.filePath }, "cache file is not an object, starting empty");
      return;
    }

    for (const [videoId, value] of Object.entries(data)) {
      const parsed = ResultSchema.safeParse(value);
      if (parsed.success) {
        this.entries.set(videoId, Object.freeze(parsed.data));
      } else {
        this.log.warn({ videoId }, "dropping malformed cache entry");
      }
    }
    this.log.info({ entries: this.entries.size, file: this.filePath }, "cache loaded");
  }

  get(videoId: string): TranscriptResult | undefined {
    return this.entries.get(videoId);
  }

  has(videoId: string): boolean {
    return this.entries.has(videoId);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Store a result and wait until it is on disk. On a failed write the entry is rolled back. */
  async put(videoId: string, result: TranscriptResult): Promise<void> {
    const previous = this.entries.get(videoId);
    this.entries.set(videoId, result);
    try {
      await this.flush();
    } catch (err: unknown) {
      if (previous) {
        this.entries.set(videoId, previous);
      } else {
        this.entries.delete(videoId);
      }
      throw err;
    }
  }

  flush(): Promise<void> {
    const write = this.writeChain.then(() => this.writeFile());
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  private async writeFile(): Promise<void> {
    const snapshot = JSON.stringify(Object.fromEntries(this.entries));
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(tmpPath, snapshot, "utf-8");
    await fs.rename(tmpPath, this.filePath);
    this.log.debug({ entries: this.entries.size }, "cache flushed");
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
