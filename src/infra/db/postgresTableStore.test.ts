import { err, ok } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { KnowledgeRecord } from "../../core/entities/record";
import type { EmbeddingPort } from "../../core/ports/outboundPorts";
import {
  accountsContract,
  documentsContract,
} from "../../core/storage/tableContracts";
import {
  PostgresTableStore,
  type SqlExecutor,
  type SqlParameter,
} from "./postgresTableStore";

const fakeSql = (rows: Array<Record<string, unknown>> = [], count = rows.length) => {
  const calls: Array<{ query: string; parameters: SqlParameter[] }> = [];
  const executor: SqlExecutor = {
    unsafe: async (query, parameters = []) => {
      calls.push({ query: query.replace(/\s+/g, " ").trim(), parameters });
      return Object.assign([...rows], { count });
    },
  };
  return { executor, calls };
};

const createdAt = new Date("2024-01-02T00:00:00Z");

const repoRecord: KnowledgeRecord = {
  id: "github:repo:acme/widget",
  sourceId: "github:acme",
  content: "Repository: acme/widget",
  createdAt,
  metadata: { stars: 3 },
};

const fixedEmbedding: EmbeddingPort = {
  embedTexts: async (texts) => ok(texts.map(() => [0.5, 1])),
};

describe("PostgresTableStore", () => {
  it("upserts on the primary key and embeds the contract's embedding column", async () => {
    const { executor, calls } = fakeSql();
    const store = new PostgresTableStore(executor, documentsContract, fixedEmbedding);

    await store.upsertMany([repoRecord]);

    expect(calls).toEqual([
      {
        query:
          'INSERT INTO "documents" ("id", "source_id", "content", "created_at", "metadata", "embedding") ' +
          'VALUES ($1, $2, $3, $4, $5, $6::vector) ' +
          'ON CONFLICT ("id") DO UPDATE SET "source_id" = EXCLUDED."source_id", ' +
          '"content" = EXCLUDED."content", "created_at" = EXCLUDED."created_at", ' +
          '"metadata" = EXCLUDED."metadata", "embedding" = EXCLUDED."embedding"',
        parameters: [
          "github:repo:acme/widget",
          "github:acme",
          "Repository: acme/widget",
          createdAt,
          '{"stars":3}',
          "[0.5,1]",
        ],
      },
    ]);
  });

  it("collapses rows that share an id to the last one before inserting", async () => {
    const { executor, calls } = fakeSql();
    const store = new PostgresTableStore(executor, documentsContract);

    await store.upsertMany([
      repoRecord,
      { ...repoRecord, sourceId: "github:acme/widget", content: "Repository: acme/widget (repo sync)" },
    ]);

    expect(calls).toHaveLength(1);
    expect(calls[0]?.query).toContain("VALUES ($1, $2, $3, $4, $5) ON CONFLICT");
    expect(calls[0]?.parameters).toEqual([
      "github:repo:acme/widget",
      "github:acme/widget",
      "Repository: acme/widget (repo sync)",
      createdAt,
      '{"stars":3}',
    ]);
  });

  it("writes large batches as several statements with their own embed calls", async () => {
    const { executor, calls } = fakeSql();
    const embedded: string[][] = [];
    const recordingEmbedding: EmbeddingPort = {
      embedTexts: async (texts) => {
        embedded.push(texts);
        return ok(texts.map(() => [0.5, 1]));
      },
    };
    const store = new PostgresTableStore(executor, documentsContract, recordingEmbedding, 2);
    const records = ["a", "b", "c"].map((id) => ({
      id: `file:/notes/${id}.md`,
      sourceId: "file:notes/*.md",
      content: `note ${id}`,
    }));

    await store.upsertMany(records);

    expect(embedded).toEqual([["note a", "note b"], ["note c"]]);
    expect(calls).toHaveLength(2);
    expect(calls[0]?.query).toContain(
      "VALUES ($1, $2, $3, $4, $5, $6::vector), ($7, $8, $9, $10, $11, $12::vector) ON CONFLICT",
    );
    expect(calls[1]?.query).toContain("VALUES ($1, $2, $3, $4, $5, $6::vector) ON CONFLICT");
    expect(calls[1]?.parameters).toEqual([
      "file:/notes/c.md",
      "file:notes/*.md",
      "note c",
      null,
      null,
      "[0.5,1]",
    ]);
  });

  it("issues no statement for an empty batch", async () => {
    const { executor, calls } = fakeSql();

    await new PostgresTableStore(executor, documentsContract).upsertMany([]);

    expect(calls).toEqual([]);
  });

  it("writes tables without an embedding target as plain rows", async () => {
    const { executor, calls } = fakeSql();
    const store = new PostgresTableStore(executor, accountsContract, fixedEmbedding);

    await store.upsertMany([
      { id: 7, sourceId: "discord:guild", name: "octo", source: "discord" },
    ]);

    expect(calls[0]?.query).toBe(
      'INSERT INTO "accounts" ("id", "source_id", "name", "source", "created_at", "updated_at") ' +
        'VALUES ($1, $2, $3, $4, $5, $6) ' +
        'ON CONFLICT ("id") DO UPDATE SET "source_id" = EXCLUDED."source_id", ' +
        '"name" = EXCLUDED."name", "source" = EXCLUDED."source", ' +
        '"created_at" = EXCLUDED."created_at", "updated_at" = EXCLUDED."updated_at"',
    );
    expect(calls[0]?.parameters).toEqual([7, "discord:guild", "octo", "discord", null, null]);
  });

  it("fails the write when embedding fails", async () => {
    const { executor, calls } = fakeSql();
    const failing: EmbeddingPort = {
      embedTexts: async () =>
        err({
          source: "embedding",
          code: "timeout",
          provider: "ollama",
          operation: "embed_texts",
          message: "embed_texts failed: HTTP request timed out.",
          retryable: true,
        }),
    };
    const store = new PostgresTableStore(executor, documentsContract, failing);

    await expect(store.upsertMany([repoRecord])).rejects.toThrow(
      "Embedding documents.content failed: embed_texts failed: HTTP request timed out.",
    );
    expect(calls).toEqual([]);
  });

  it("decodes selected rows through the contract", async () => {
    const { executor, calls } = fakeSql([
      {
        id: "github:repo:acme/widget",
        source_id: "github:acme",
        content: "Repository: acme/widget",
        created_at: createdAt,
        metadata: '{"stars":3}',
      },
    ]);
    const store = new PostgresTableStore(executor, documentsContract);

    const found = await store.findById("github:repo:acme/widget");

    expect(found._unsafeUnwrap()).toEqual(repoRecord);
    expect(calls[0]).toEqual({
      query:
        'SELECT "id", "source_id", "content", "created_at", "metadata" FROM "documents" WHERE "id" = $1 LIMIT 1',
      parameters: ["github:repo:acme/widget"],
    });
  });

  it("returns null when no row matches", async () => {
    const store = new PostgresTableStore(fakeSql().executor, documentsContract);

    expect((await store.findById("missing"))._unsafeUnwrap()).toBeNull();
  });

  it("reports a column of the wrong type as a conversion error", async () => {
    const { executor } = fakeSql([
      {
        id: "github:repo:acme/widget",
        source_id: 12,
        content: "x",
        created_at: null,
        metadata: null,
      },
    ]);
    const store = new PostgresTableStore(executor, documentsContract);

    const listed = await store.listBy("source_id", "github:acme");

    expect(listed.isErr()).toBe(true);
    if (listed.isOk()) {
      throw new Error("expected conversion error");
    }
    expect(listed.error).toMatchObject({
      code: "conversion_error",
      table: "documents",
      column: "source_id",
    });
  });

  it("deletes by indexed column and refuses other columns", async () => {
    const { executor, calls } = fakeSql([], 4);
    const store = new PostgresTableStore(executor, documentsContract);

    expect(await store.deleteBy("source_id", "github:acme")).toBe(4);
    expect(calls[0]).toEqual({
      query: 'DELETE FROM "documents" WHERE "source_id" = $1',
      parameters: ["github:acme"],
    });
    await expect(store.deleteBy("content", "x")).rejects.toThrow(
      "Column content is not indexed on documents.",
    );
  });
});
