import { err, ok } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { LoadSourcesResult } from "../../core/entities/ingestion";
import type { KnowledgeRecord } from "../../core/entities/record";
import type {
  LoadSourcesOptions,
  MultiSourceLoaderPort,
} from "../../core/ports/inboundPorts";
import type { RecordSinkPort } from "../../core/ports/outboundPorts";
import { InMemorySyncStateRepository } from "../../infra/store/inMemorySyncStateRepository";
import { parseSourceDescriptor } from "./sourceDescriptorParser";
import { IngestionService } from "./ingestionService";

const now = new Date("2024-05-10T00:00:00Z");
const clock = { now: () => now };

const records: KnowledgeRecord[] = [
  { id: "github:repo:acme/widget", sourceId: "github:acme", content: "Repository: acme/widget" },
];

const loadedReport = (raws: Array<[string, "github" | "site"]>): LoadSourcesResult => ({
  records,
  report: {
    startedAt: now,
    finishedAt: now,
    deadlineExceeded: false,
    outcomes: raws.map(([raw, type]) => ({
      status: "loaded" as const,
      raw,
      type,
      recordCount: 1,
      durationMs: 1,
    })),
  },
});

const capturingLoader = (result: LoadSourcesResult) => {
  const calls: LoadSourcesOptions[] = [];
  const loader: MultiSourceLoaderPort = {
    loadSources: async (_sources, options) => {
      calls.push(options);
      return result;
    },
  };
  return { loader, calls };
};

const collectingSink = () => {
  const stored: KnowledgeRecord[] = [];
  const sink: RecordSinkPort = {
    addDocuments: async (batch) => {
      stored.push(...batch);
      return ok(stored.length);
    },
  };
  return { sink, stored };
};

const descriptorOf = (raw: string) => {
  const parsed = parseSourceDescriptor(raw);
  if (parsed.status !== "parsed") {
    throw new Error(`unparseable test descriptor ${raw}`);
  }
  return parsed.descriptor;
};

describe("IngestionService", () => {
  it("resumes GitHub sources from their stored watermark and defaults the rest", async () => {
    const syncState = new InMemorySyncStateRepository();
    const stored = new Date("2024-05-01T00:00:00Z");
    await syncState.saveWatermark("github:acme", stored);
    const { loader, calls } = capturingLoader(loadedReport([["github:acme", "github"]]));
    const { sink } = collectingSink();

    await new IngestionService(loader, sink, syncState, clock, 7).run({
      sources: ["github:acme", "github:other", "site:https://example.test/"],
    });

    const since = calls[0]?.since;
    if (typeof since !== "function") {
      throw new Error("expected per-source watermark resolver");
    }
    expect(since(descriptorOf("github:acme"))).toEqual(stored);
    expect(since(descriptorOf("github:other"))).toEqual(new Date("2024-05-03T00:00:00Z"));
    expect(since(descriptorOf("site:https://example.test/"))).toEqual(
      new Date("2024-05-03T00:00:00Z"),
    );
  });

  it("uses an explicit since for every source", async () => {
    const explicit = new Date("2023-01-01T00:00:00Z");
    const { loader, calls } = capturingLoader(loadedReport([]));

    await new IngestionService(
      loader,
      collectingSink().sink,
      new InMemorySyncStateRepository(),
      clock,
      7,
    ).run({ sources: ["github:acme"], since: explicit, timeoutMs: 1_000 });

    expect(calls[0]).toMatchObject({ since: explicit, timeoutMs: 1_000 });
  });

  it("stores records and advances watermarks of loaded GitHub sources only", async () => {
    const syncState = new InMemorySyncStateRepository();
    const { loader } = capturingLoader(
      loadedReport([
        ["github:acme", "github"],
        ["site:https://example.test/", "site"],
      ]),
    );
    const { sink, stored } = collectingSink();

    const result = await new IngestionService(loader, sink, syncState, clock, 7).run({
      sources: ["github:acme", "site:https://example.test/"],
    });

    expect(result.written).toBe(1);
    expect(stored).toEqual(records);
    expect(await syncState.getWatermark("github:acme")).toEqual(now);
    expect(await syncState.getWatermark("site:https://example.test/")).toBeNull();
  });

  it("keeps the watermark of a GitHub source whose listing hit the page limit", async () => {
    const syncState = new InMemorySyncStateRepository();
    const previous = new Date("2024-05-01T00:00:00Z");
    await syncState.saveWatermark("github:acme", previous);
    const { loader } = capturingLoader({
      records: [],
      report: {
        startedAt: now,
        finishedAt: now,
        deadlineExceeded: false,
        outcomes: [
          {
            status: "failed",
            raw: "github:acme",
            type: "github",
            durationMs: 1,
            error: {
              source: "github",
              code: "limit_exceeded",
              provider: "github",
              operation: "list_commits acme/widget",
              message: "list_commits acme/widget failed: more than 10 pages of results.",
              retryable: false,
            },
          },
        ],
      },
    });

    const result = await new IngestionService(
      loader,
      collectingSink().sink,
      syncState,
      clock,
      7,
    ).run({ sources: ["github:acme"] });

    expect(result.written).toBe(0);
    expect(await syncState.getWatermark("github:acme")).toEqual(previous);
  });

  it("keeps watermarks when the sink fails", async () => {
    const syncState = new InMemorySyncStateRepository();
    const { loader } = capturingLoader(loadedReport([["github:acme", "github"]]));
    const failure = {
      source: "storage" as const,
      code: "storage_error" as const,
      provider: "postgres",
      operation: "add_documents",
      message: "add_documents failed: connection refused",
      retryable: false,
    };
    const sink: RecordSinkPort = { addDocuments: async () => err(failure) };

    const result = await new IngestionService(loader, sink, syncState, clock, 7).run({
      sources: ["github:acme"],
    });

    expect(result.written).toBe(0);
    expect(result.storeError).toEqual(failure);
    expect(await syncState.getWatermark("github:acme")).toBeNull();
  });
});
