import { describe, expect, it } from "vitest";
import type { Message } from "../../core/entities/chat";
import type { KnowledgeRecord } from "../../core/entities/record";
import { textValue } from "../../core/storage/storageValue";
import {
  documentsContract,
  messagesContract,
} from "../../core/storage/tableContracts";
import { InMemoryTableStore } from "./inMemoryTableStore";
import { TableRecordSink } from "./tableRecordSink";

const record = (id: string, sourceId: string, content = `content of ${id}`): KnowledgeRecord => ({
  id,
  sourceId,
  content,
});

describe("InMemoryTableStore", () => {
  it("replaces rows that share an id instead of duplicating them", async () => {
    const store = new InMemoryTableStore(documentsContract);

    await store.upsertMany([record("a", "site:x", "old")]);
    await store.upsertMany([record("a", "site:x", "new"), record("b", "site:x")]);

    expect(store.size).toBe(2);
    expect((await store.findById("a"))._unsafeUnwrap()?.content).toBe("new");
  });

  it("lists and deletes by an indexed column", async () => {
    const store = new InMemoryTableStore(documentsContract);
    await store.upsertMany([
      record("a", "github:acme"),
      record("b", "site:x"),
      record("c", "github:acme"),
    ]);

    const listed = await store.listBy("source_id", "github:acme");
    const deleted = await store.deleteBy("source_id", "github:acme");

    expect(listed._unsafeUnwrap().map((item) => item.id)).toEqual(["a", "c"]);
    expect(deleted).toBe(2);
    expect((await store.findById("a"))._unsafeUnwrap()).toBeNull();
    expect(store.size).toBe(1);
  });

  it("rejects lookups on columns that are not indexed", async () => {
    const store = new InMemoryTableStore(documentsContract);
    await store.upsertMany([record("a", "site:x")]);

    await expect(store.listBy("content", "x")).rejects.toThrow(
      "Column content is not indexed on documents.",
    );
  });

  it("surfaces conversion errors from stored rows", async () => {
    const store = new InMemoryTableStore(messagesContract);
    const message: Message = {
      id: "m1",
      source: "discord",
      sourceId: "discord:guild",
      channelType: "text",
      channelId: "general",
      accountId: "acct-1",
      role: "user",
      content: "hello",
    };
    store.putRow("m1", { ...messagesContract.encode(message), source: textValue("myspace") });

    const found = await store.findById("m1");

    expect(found._unsafeUnwrapErr()).toMatchObject({
      code: "conversion_error",
      table: "messages",
      column: "source",
      value: "myspace",
    });
  });
});

describe("TableRecordSink", () => {
  it("writes records and returns the count", async () => {
    const store = new InMemoryTableStore(documentsContract);
    const sink = new TableRecordSink(store, "memory");

    const written = await sink.addDocuments([record("a", "site:x"), record("b", "site:x")]);

    expect(written._unsafeUnwrap()).toBe(2);
    expect(store.size).toBe(2);
  });

  it("collapses records that share an id and counts distinct ids", async () => {
    const store = new InMemoryTableStore(documentsContract);
    const sink = new TableRecordSink(store, "memory");

    const written = await sink.addDocuments([
      record("github:repo:acme/widget", "github:acme", "from org sync"),
      record("site:https://example.test/", "site:https://example.test/"),
      record("github:repo:acme/widget", "github:acme/widget", "from repo sync"),
    ]);

    expect(written._unsafeUnwrap()).toBe(2);
    expect(store.size).toBe(2);
    const stored = await store.findById("github:repo:acme/widget");
    expect(stored._unsafeUnwrap()?.content).toBe("from repo sync");
  });

  it("hands the store one row per id", async () => {
    const upserted: KnowledgeRecord[][] = [];
    const sink = new TableRecordSink(
      {
        upsertMany: async (entities) => {
          upserted.push(entities);
        },
        findById: async () => {
          throw new Error("unused");
        },
        listBy: async () => {
          throw new Error("unused");
        },
        deleteBy: async () => 0,
      },
      "postgres",
    );

    await sink.addDocuments([record("a", "file:*.md", "first"), record("a", "file:*.md", "second")]);

    expect(upserted).toEqual([[record("a", "file:*.md", "second")]]);
  });

  it("maps storage exceptions to a storage boundary error", async () => {
    const sink = new TableRecordSink(
      {
        upsertMany: async () => {
          throw new Error("connection refused");
        },
        findById: async () => {
          throw new Error("unused");
        },
        listBy: async () => {
          throw new Error("unused");
        },
        deleteBy: async () => 0,
      },
      "postgres",
    );

    const written = await sink.addDocuments([record("a", "site:x")]);

    expect(written._unsafeUnwrapErr()).toMatchObject({
      source: "storage",
      code: "storage_error",
      provider: "postgres",
      operation: "add_documents",
      message: "add_documents failed: connection refused",
    });
  });
});
