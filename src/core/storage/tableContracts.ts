import { err, ok, type Result } from "neverthrow";
import type { ConversionError } from "../entities/appError";
import {
  decodeChannelType,
  decodeMessageSource,
  encodeChannelType,
  encodeMessageSource,
  type Account,
  type Channel,
  type Conversation,
  type Message,
} from "../entities/chat";
import type { KnowledgeRecord } from "../entities/record";
import {
  integerValue,
  optionalTimestamp,
  RowReader,
  textValue,
  type StorageRow,
  type StorageValueKind,
} from "./storageValue";

export type ColumnSpec = {
  name: string;
  kind: StorageValueKind;
  primaryKey?: boolean;
  indexed?: boolean;
  nullable?: boolean;
};

/**
 * Fixes how one entity kind is persisted: key, equality-indexed columns,
 * the single embedding target, and a lossless row codec.
 */
export type TableContract<T> = {
  name: string;
  columns: readonly ColumnSpec[];
  embeddingColumn?: string;
  idOf(entity: T): string;
  embeddingTextOf?(entity: T): string;
  encode(entity: T): StorageRow;
  decode(row: StorageRow): Result<T, ConversionError>;
};

export const indexedColumns = <T>(contract: TableContract<T>): string[] =>
  contract.columns
    .filter((column) => column.indexed === true)
    .map((column) => column.name);

/**
 * Collapses entities that share an id. The last occurrence wins and takes the first one's position.
 */
export const latestById = <T>(
  entities: Iterable<T>,
  idOf: (entity: T) => string,
): T[] => {
  const byId = new Map<string, T>();
  for (const entity of entities) {
    byId.set(idOf(entity), entity);
  }
  return [...byId.values()];
};

const decodeJson =
  (table: string, column: string) =>
  (raw: string): Result<unknown, ConversionError> => {
    try {
      return ok(JSON.parse(raw));
    } catch (error) {
      return err({
        code: "conversion_error",
        table,
        column,
        message: `Column ${column} does not hold valid JSON: ${
          error instanceof Error ? error.message : String(error)
        }`,
        value: raw,
      });
    }
  };

export const documentsContract: TableContract<KnowledgeRecord> = {
  name: "documents",
  columns: [
    { name: "id", kind: "text", primaryKey: true },
    { name: "source_id", kind: "text", indexed: true },
    { name: "content", kind: "text" },
    { name: "created_at", kind: "timestamp", nullable: true },
    { name: "metadata", kind: "text", nullable: true },
  ],
  embeddingColumn: "content",
  idOf: (record) => record.id,
  embeddingTextOf: (record) => record.content,
  encode: (record) => ({
    id: textValue(record.id),
    source_id: textValue(record.sourceId),
    content: textValue(record.content),
    created_at: optionalTimestamp(record.createdAt),
    metadata:
      record.metadata === undefined
        ? null
        : textValue(JSON.stringify(record.metadata)),
  }),
  decode: (row) => {
    const reader = new RowReader("documents", row);
    const id = reader.text("id");
    const sourceId = reader.text("source_id");
    const content = reader.text("content");
    const createdAt = reader.optionalTimestamp("created_at");
    const rawMetadata = reader.optionalText("metadata");
    const metadata =
      rawMetadata === undefined
        ? undefined
        : reader.convert<unknown>(
            "metadata",
            rawMetadata,
            decodeJson("documents", "metadata"),
            undefined,
          );

    return reader.finish(() => {
      const record: KnowledgeRecord = { id, sourceId, content };
      if (createdAt !== undefined) record.createdAt = createdAt;
      if (metadata !== undefined) record.metadata = metadata;
      return record;
    });
  },
};

export const accountsContract: TableContract<Account> = {
  name: "accounts",
  columns: [
    { name: "id", kind: "integer", primaryKey: true },
    { name: "source_id", kind: "text", indexed: true },
    { name: "name", kind: "text" },
    { name: "source", kind: "text" },
    { name: "created_at", kind: "timestamp", nullable: true },
    { name: "updated_at", kind: "timestamp", nullable: true },
  ],
  idOf: (account) => String(account.id),
  encode: (account) => ({
    id: integerValue(account.id),
    source_id: textValue(account.sourceId),
    name: textValue(account.name),
    source: textValue(encodeMessageSource(account.source)),
    created_at: optionalTimestamp(account.createdAt),
    updated_at: optionalTimestamp(account.updatedAt),
  }),
  decode: (row) => {
    const reader = new RowReader("accounts", row);
    const id = reader.integer("id");
    const sourceId = reader.text("source_id");
    const name = reader.text("name");
    const source = reader.convert(
      "source",
      reader.text("source"),
      (value) => decodeMessageSource(value, "accounts"),
      "discord",
    );
    const createdAt = reader.optionalTimestamp("created_at");
    const updatedAt = reader.optionalTimestamp("updated_at");

    return reader.finish(() => {
      const account: Account = { id, sourceId, name, source };
      if (createdAt !== undefined) account.createdAt = createdAt;
      if (updatedAt !== undefined) account.updatedAt = updatedAt;
      return account;
    });
  },
};

export const conversationsContract: TableContract<Conversation> = {
  name: "conversations",
  columns: [
    { name: "id", kind: "text", primaryKey: true },
    { name: "user_id", kind: "text", indexed: true },
    { name: "title", kind: "text" },
    { name: "created_at", kind: "timestamp", nullable: true },
    { name: "updated_at", kind: "timestamp", nullable: true },
  ],
  idOf: (conversation) => conversation.id,
  encode: (conversation) => ({
    id: textValue(conversation.id),
    user_id: textValue(conversation.userId),
    title: textValue(conversation.title),
    created_at: optionalTimestamp(conversation.createdAt),
    updated_at: optionalTimestamp(conversation.updatedAt),
  }),
  decode: (row) => {
    const reader = new RowReader("conversations", row);
    const id = reader.text("id");
    const userId = reader.text("user_id");
    const title = reader.text("title");
    const createdAt = reader.optionalTimestamp("created_at");
    const updatedAt = reader.optionalTimestamp("updated_at");

    return reader.finish(() => {
      const conversation: Conversation = { id, userId, title };
      if (createdAt !== undefined) conversation.createdAt = createdAt;
      if (updatedAt !== undefined) conversation.updatedAt = updatedAt;
      return conversation;
    });
  },
};

export const messagesContract: TableContract<Message> = {
  name: "messages",
  columns: [
    { name: "id", kind: "text", primaryKey: true },
    { name: "source", kind: "text" },
    { name: "source_id", kind: "text", indexed: true },
    { name: "channel_type", kind: "text" },
    { name: "channel_id", kind: "text", indexed: true },
    { name: "account_id", kind: "text", indexed: true },
    { name: "role", kind: "text" },
    { name: "content", kind: "text" },
    { name: "created_at", kind: "timestamp", nullable: true },
  ],
  embeddingColumn: "content",
  idOf: (message) => message.id,
  embeddingTextOf: (message) => message.content,
  encode: (message) => ({
    id: textValue(message.id),
    source: textValue(encodeMessageSource(message.source)),
    source_id: textValue(message.sourceId),
    channel_type: textValue(encodeChannelType(message.channelType)),
    channel_id: textValue(message.channelId),
    account_id: textValue(message.accountId),
    role: textValue(message.role),
    content: textValue(message.content),
    created_at: optionalTimestamp(message.createdAt),
  }),
  decode: (row) => {
    const reader = new RowReader("messages", row);
    const id = reader.text("id");
    const source = reader.convert(
      "source",
      reader.text("source"),
      (value) => decodeMessageSource(value, "messages"),
      "discord",
    );
    const sourceId = reader.text("source_id");
    const channelType = reader.convert(
      "channel_type",
      reader.text("channel_type"),
      (value) => decodeChannelType(value, "messages"),
      "text",
    );
    const channelId = reader.text("channel_id");
    const accountId = reader.text("account_id");
    const role = reader.text("role");
    const content = reader.text("content");
    const createdAt = reader.optionalTimestamp("created_at");

    return reader.finish(() => {
      const message: Message = {
        id,
        source,
        sourceId,
        channelType,
        channelId,
        accountId,
        role,
        content,
      };
      if (createdAt !== undefined) message.createdAt = createdAt;
      return message;
    });
  },
};

export const channelsContract: TableContract<Channel> = {
  name: "channels",
  columns: [
    { name: "id", kind: "text", primaryKey: true },
    { name: "channel_id", kind: "text", indexed: true },
    { name: "channel_type", kind: "text" },
    { name: "source", kind: "text" },
    { name: "name", kind: "text" },
    { name: "created_at", kind: "timestamp", nullable: true },
    { name: "updated_at", kind: "timestamp", nullable: true },
  ],
  idOf: (channel) => channel.id,
  encode: (channel) => ({
    id: textValue(channel.id),
    channel_id: textValue(channel.channelId),
    channel_type: textValue(encodeChannelType(channel.channelType)),
    source: textValue(encodeMessageSource(channel.source)),
    name: textValue(channel.name),
    created_at: optionalTimestamp(channel.createdAt),
    updated_at: optionalTimestamp(channel.updatedAt),
  }),
  decode: (row) => {
    const reader = new RowReader("channels", row);
    const id = reader.text("id");
    const channelId = reader.text("channel_id");
    const channelType = reader.convert(
      "channel_type",
      reader.text("channel_type"),
      (value) => decodeChannelType(value, "channels"),
      "text",
    );
    const source = reader.convert(
      "source",
      reader.text("source"),
      (value) => decodeMessageSource(value, "channels"),
      "discord",
    );
    const name = reader.text("name");
    const createdAt = reader.optionalTimestamp("created_at");
    const updatedAt = reader.optionalTimestamp("updated_at");

    return reader.finish(() => {
      const channel: Channel = { id, channelId, channelType, source, name };
      if (createdAt !== undefined) channel.createdAt = createdAt;
      if (updatedAt !== undefined) channel.updatedAt = updatedAt;
      return channel;
    });
  },
};
