const SNOWFLAKE_PATTERN = /^\d{17,20}$/;
const MESSAGE_LINK_PATTERN =
  /^https?:\/\/(?:(?:ptb|canary)\.)?discord(?:app)?\.com\/channels\/(\d{17,20}|@me)\/(\d{17,20})\/(\d{17,20})\/?$/;

export const isSnowflake = (value: unknown): value is string => {
  return typeof value === "string" && SNOWFLAKE_PATTERN.test(value);
};

export interface MessageReference {
  channelId: string | null;
  messageId: string;
}

/**
 * Accepts a raw message id or a "copy message link" URL.
 * Returns null when neither shape matches.
 */
export function parseMessageReference(input: string): MessageReference | null {
  const value = input.trim();
  if (isSnowflake(value)) return { channelId: null, messageId: value };

  const match = MESSAGE_LINK_PATTERN.exec(value);
  if (!match) return null;
  const [, , channelId, messageId] = match;
  if (!channelId || !messageId) return null;
  return { channelId, messageId };
}
