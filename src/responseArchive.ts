import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { logger as rootLogger } from "./logger.js";

export interface ResponseArchive {
  /** Best effort: resolves even when the write fails. */
  save(endpoint: string, suffix: string, body: string): Promise<void>;
}

/** `2026-02-26T18:21:45.450Z` → `20260226T182145.450Z` */
export const archiveTimestamp = (date: Date) => date.toISOString().replace(/[-:]/g, "");

export const archiveFileName = (date: Date, suffix: string) =>
  suffix ? `${archiveTimestamp(date)}_${suffix}.json` : `${archiveTimestamp(date)}.json`;

const prettyIfJson = (body: string) => {
  try {
    return JSON.stringify(JSON.parse(body), null, 2);
  } catch {
    return body;
  }
};

/**
 * Writes raw vendor responses to `{dir}/{endpoint}/{timestamp}_{suffix}.json`
 * for offline inspection.
 */
export class FileResponseArchive implements ResponseArchive {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly dir: string,
    options?: { logger?: Logger; now?: () => Date }
  ) {
    this.log = (options?.logger ?? rootLogger).child({ component: "response-archive" });
    this.now = options?.now ?? (() => new Date());
  }

  async save(endpoint: string, suffix: string, body: string): Promise<void> {
    const dir = path.join(this.dir, endpoint);
    const file = path.join(dir, archiveFileName(this.now(), suffix.replace(/[^\w.-]/g, "_")));

    try {
      await mkdir(dir, { recursive: true });
      const content = prettyIfJson(body);
      await writeFile(file, content);
      this.log.debug({ path: file, bytes: Buffer.byteLength(content) }, "Saved raw response");
    } catch (err) {
      this.log.warn({ err, path: file }, "Failed to save raw response");
    }
  }
}

export const noopResponseArchive: ResponseArchive = {
  save: async () => undefined
};
