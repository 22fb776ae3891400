import {
  index,
  integer,
  pgTable,
  text,
  timestamp,
  vector,
} from "drizzle-orm/pg-core";

export const EMBEDDING_DIMENSIONS = 768;

export const documentsTable = pgTable(
  "documents",
  {
    id: text("id").primaryKey(),
    sourceId: text("source_id").notNull(),
    content: text("content").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }),
    metadata: text("metadata"),
    embedding: vector("embedding", { dimensions: EMBEDDING_DIMENSIONS }),
  },
  (table) => ({
    sourceIdx: index("documents_source_id_idx").on(table.sourceId),
  }),
);

export const accountsTable = pgTable(
  "accounts",
  {
    id: integer("id").primaryKey(),
    sourceId: text("source_id").notNull(),
    name: text("name").notNull(),
    source: text("source").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }),
    updatedAt: timestamp("updated_at", { withTimezone: true }),
  },
  (table) => ({
    sourceIdx: index("accounts_source_id_idx").on(table.sourceId),
  }),
);

export const conversationsTable = pgTable(
  "conversations",
  {
    id: text("id").primaryKey(),
    userId: text("user_id").notNull(),
    title: text("title").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }),
    updatedAt: timestamp("updated_at", { withTimezone: true }),
  },
  (table) => ({
    userIdx: index("conversations_user_id_idx").on(table.userId),
  }),
);

export const messagesTable = pgTable(
  "messages",
  {
    id: text("id").primaryKey(),
    source: text("source").notNull(),
    sourceId: text("source_id").notNull(),
    channelType: text("channel_type").notNull(),
    channelId: text("channel_id").notNull(),
    accountId: text("account_id").notNull(),
    role: text("role").notNull(),
    content: text("content").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }),
    embedding: vector("embedding", { dimensions: EMBEDDING_DIMENSIONS }),
  },
  (table) => ({
    sourceIdx: index("messages_source_id_idx").on(table.sourceId),
    channelIdx: index("messages_channel_id_idx").on(table.channelId),
    accountIdx: index("messages_account_id_idx").on(table.accountId),
  }),
);

export const channelsTable = pgTable(
  "channels",
  {
    id: text("id").primaryKey(),
    channelId: text("channel_id").notNull(),
    channelType: text("channel_type").notNull(),
    source: text("source").notNull(),
    name: text("name").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }),
    updatedAt: timestamp("updated_at", { withTimezone: true }),
  },
  (table) => ({
    channelIdx: index("channels_channel_id_idx").on(table.channelId),
  }),
);

/**
 * Last successful sync instant per configured source descriptor.
 */
export const syncStateTable = pgTable("sync_state", {
  sourceKey: text("source_key").primaryKey(),
  watermark: timestamp("watermark", { withTimezone: true }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});
