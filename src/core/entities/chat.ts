import { err, ok, type Result } from "neverthrow";
import type { ConversionError } from "./appError";

export const messageSources = ["discord", "telegram", "twitter", "github"] as const;
export type MessageSource = (typeof messageSources)[number];

export const channelTypes = [
  "direct_message",
  "text",
  "voice",
  "thread",
] as const;
export type ChannelType = (typeof channelTypes)[number];

const decodeVariant = <T extends string>(
  variants: readonly T[],
  table: string,
  column: string,
  value: string,
): Result<T, ConversionError> => {
  const match = variants.find((variant) => variant === value);
  if (match === undefined) {
    return err({
      code: "conversion_error",
      table,
      column,
      message: `Unknown ${column} '${value}'. Expected one of: ${variants.join(", ")}.`,
      value,
    });
  }

  return ok(match);
};

export const encodeMessageSource = (source: MessageSource): string => source;

export const decodeMessageSource = (
  value: string,
  table = "messages",
): Result<MessageSource, ConversionError> =>
  decodeVariant(messageSources, table, "source", value);

export const encodeChannelType = (channelType: ChannelType): string =>
  channelType;

export const decodeChannelType = (
  value: string,
  table = "messages",
): Result<ChannelType, ConversionError> =>
  decodeVariant(channelTypes, table, "channel_type", value);

export type Account = {
  id: number;
  sourceId: string;
  name: string;
  source: MessageSource;
  createdAt?: Date;
  updatedAt?: Date;
};

export type Conversation = {
  id: string;
  userId: string;
  title: string;
  createdAt?: Date;
  updatedAt?: Date;
};

export type Message = {
  id: string;
  source: MessageSource;
  sourceId: string;
  channelType: ChannelType;
  channelId: string;
  accountId: string;
  role: string;
  content: string;
  createdAt?: Date;
};

export type Channel = {
  id: string;
  channelId: string;
  channelType: ChannelType;
  source: MessageSource;
  name: string;
  createdAt?: Date;
  updatedAt?: Date;
};
