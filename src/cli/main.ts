import { Command } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { parseSourceDescriptors } from "../application/services/sourceDescriptorParser";
import {
  configuredSources,
  env,
  type StoreName,
} from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { parseSince, parseStore, parseTimeout } from "./options";
import {
  exitCodeFor,
  formatIngestionReport,
  formatParseOutcomes,
} from "./report";

type IngestOptions = {
  since?: Date;
  timeout?: number;
  store?: StoreName;
  json?: boolean;
};

const resolveSources = (sources: string[]): string[] =>
  sources.length > 0 ? sources : configuredSources();

export const buildCli = () => {
  const cli = new Command();
  cli
    .name("knowledge-ingest")
    .description("Ingest GitHub activity, web pages and local files into a vector store");

  cli
    .command("ingest")
    .description("Run one ingestion pass and print the per-source report")
    .argument("[sources...]", "'<type>:<locator>' descriptors (defaults to APP_SOURCES)")
    .option("--since <iso>", "Fetch activity updated at or after this instant", parseSince)
    .option("--timeout <ms>", "Deadline for the whole run", parseTimeout)
    .option("--store <store>", "Where records are written", parseStore)
    .option("--json", "Print the report as JSON")
    .action(async (sources: string[], opts: IngestOptions) => {
      const runtime = createRuntime({ store: opts.store });
      try {
        const result = await runtime.ingestionService.run({
          sources: resolveSources(sources),
          since: opts.since,
          timeoutMs: opts.timeout ?? env.APP_INGEST_TIMEOUT_MS,
        });

        console.log(
          opts.json ? JSON.stringify(result, null, 2) : formatIngestionReport(result),
        );
        process.exitCode = exitCodeFor(result);
      } finally {
        await runtime.close();
      }
    });

  cli
    .command("sources")
    .description("Parse descriptors and show how each would be loaded, without fetching")
    .argument("[sources...]", "'<type>:<locator>' descriptors (defaults to APP_SOURCES)")
    .action((sources: string[]) => {
      console.log(formatParseOutcomes(parseSourceDescriptors(resolveSources(sources))));
    });

  cli
    .command("watch")
    .description("Re-run ingestion for APP_SOURCES every APP_SYNC_INTERVAL_SECONDS")
    .option("--store <store>", "Where records are written", parseStore)
    .action(async (opts: Pick<IngestOptions, "store">) => {
      const runtime = createRuntime({ store: opts.store });
      const sources = configuredSources();
      let running = false;

      logger.info(
        { sources, intervalSeconds: env.APP_SYNC_INTERVAL_SECONDS },
        "Watch started",
      );

      const tick = async () => {
        if (running) {
          logger.warn("Previous ingestion still running; skipping tick");
          return;
        }

        running = true;
        try {
          const result = await runtime.ingestionService.run({
            sources,
            timeoutMs: env.APP_INGEST_TIMEOUT_MS,
          });
          console.log(formatIngestionReport(result));
        } catch (error) {
          logger.error(
            { error: error instanceof Error ? error.message : String(error) },
            "Ingestion run crashed",
          );
        } finally {
          running = false;
        }
      };

      await tick();
      const interval = setInterval(async () => {
        await tick();
      }, env.APP_SYNC_INTERVAL_SECONDS * 1_000);

      process.once("SIGINT", () => {
        clearInterval(interval);
        logger.info("Watch stopped");
        runtime.close().catch((error: unknown) => {
          logger.error(
            { error: error instanceof Error ? error.message : String(error) },
            "Closing storage failed",
          );
        });
      });
    });

  return cli;
};

export const runCli = async (argv: string[]): Promise<void> => {
  await buildCli().parseAsync(argv);
};
