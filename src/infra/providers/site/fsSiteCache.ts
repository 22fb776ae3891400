import { promises as fs } from "node:fs";
import path from "node:path";
import type { SiteCachePort } from "../../../core/ports/outboundPorts";

export const STRIPPED_FILE = "index.html";
export const CONTENT_FILE = "content.txt";

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Layout: `<sourcesPath>/sites/<host>/<url path>/{index.html,content.txt}`.
 * Writers targeting the same URL are last-writer-wins.
 */
export class FsSiteCache implements SiteCachePort {
  private readonly root: string;

  constructor(
    sourcesPath: string,
    private readonly now: () => number = Date.now,
  ) {
    this.root = path.join(sourcesPath, "sites");
  }

  directoryFor(url: URL): string {
    const host = url.hostname || "unknown";
    const urlPath = url.pathname.replace(/^\/+|\/+$/g, "");
    return path.join(this.root, host, urlPath);
  }

  async readContent(url: URL, maxAgeMs: number): Promise<string | null> {
    const file = path.join(this.directoryFor(url), CONTENT_FILE);

    try {
      const stats = await fs.stat(file);
      if (this.now() - stats.mtimeMs > maxAgeMs) {
        return null;
      }
      return await fs.readFile(file, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async writeStripped(url: URL, text: string): Promise<void> {
    await this.write(url, STRIPPED_FILE, text);
  }

  async writeContent(url: URL, content: string): Promise<void> {
    await this.write(url, CONTENT_FILE, content);
  }

  private async write(url: URL, fileName: string, text: string): Promise<void> {
    const directory = this.directoryFor(url);
    await fs.mkdir(directory, { recursive: true });
    await fs.writeFile(path.join(directory, fileName), text, "utf-8");
  }
}
