import { promises as fs } from "node:fs";
import { createRequire } from "node:module";
import fg from "fast-glob";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { KnowledgeRecord } from "../../../core/entities/record";
import type { FileDescriptor } from "../../../core/entities/source";
import type {
  FileSourceLoaderPort,
  SourceLoadRequest,
} from "../../../core/ports/inboundPorts";
import { logger } from "../../../shared/logger/logger";

export type ReadFileContent = (filePath: string) => Promise<string>;

const readUtf8: ReadFileContent = (filePath) => fs.readFile(filePath, "utf-8");

const requireCommonJs = createRequire(import.meta.url);

/**
 * pdf-parse runs a self-test when loaded as an ES module entry, so it is required through CommonJS.
 */
export const readPdfText: ReadFileContent = async (filePath) => {
  const pdfParse: typeof import("pdf-parse") = requireCommonJs("pdf-parse");
  const parsed = await pdfParse(await fs.readFile(filePath));
  return parsed.text;
};

/**
 * Expands a glob and yields one record per readable file, keyed by absolute path.
 * A file that cannot be read or parsed is skipped; an empty match set is an empty result.
 */
export class GlobFileLoader implements FileSourceLoaderPort {
  constructor(
    private readonly kind: "file" | "pdf",
    private readonly read: ReadFileContent = kind === "pdf" ? readPdfText : readUtf8,
    private readonly cwd: string = process.cwd(),
  ) {}

  async load(
    descriptor: FileDescriptor,
    request: SourceLoadRequest,
  ): Promise<Result<KnowledgeRecord[], AppBoundaryError>> {
    const operation = `glob ${descriptor.pattern}`;
    let paths: string[];
    try {
      paths = await fg(descriptor.pattern, {
        cwd: this.cwd,
        absolute: true,
        onlyFiles: true,
      });
    } catch (error) {
      return err({
        source: this.kind,
        code: "io_error",
        provider: "filesystem",
        operation,
        message: `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        retryable: false,
        cause: error,
      });
    }

    const records: KnowledgeRecord[] = [];
    for (const filePath of paths.sort()) {
      if (request.signal?.aborted) {
        return err({
          source: this.kind,
          code: "aborted",
          provider: "filesystem",
          operation,
          message: `${operation} was aborted after ${records.length} files.`,
          retryable: false,
          cause: request.signal.reason,
        });
      }

      try {
        records.push({
          id: `${this.kind}:${filePath}`,
          sourceId: `${this.kind}:${descriptor.pattern}`,
          content: await this.read(filePath),
          metadata: { source_type: this.kind, path: filePath },
        });
      } catch (error) {
        logger.warn(
          {
            path: filePath,
            kind: this.kind,
            error: error instanceof Error ? error.message : String(error),
          },
          "Skipping unreadable file",
        );
      }
    }

    logger.debug(
      { pattern: descriptor.pattern, matched: paths.length, loaded: records.length },
      "Loaded files for glob",
    );

    return ok(records);
  }
}
