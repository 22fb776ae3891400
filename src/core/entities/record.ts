/**
 * The unit of ingestion. Only `content` feeds the embedding; everything else is retrievable metadata.
 */
export type KnowledgeRecord = {
  id: string;
  sourceId: string;
  content: string;
  createdAt?: Date;
  metadata?: unknown;
};
