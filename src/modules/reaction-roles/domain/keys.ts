/**
 * Identity helpers: trigger keys, document ids, component custom ids.
 * Everything here is pure and shared by the store, the registrar and the
 * event listeners, which must agree on the exact same strings.
 */
import { COMPONENT_PREFIX } from "./constants";

const CUSTOM_EMOJI_PATTERN = /^<(a)?:([A-Za-z0-9_~]+):(\d{2,})>$/;
const HEX_COLOR_PATTERN = /^#?([0-9a-fA-F]{6})$/;

export interface EmojiLike {
  id?: string | null;
  name?: string | null;
}

/**
 * Canonical trigger key for an emoji: the id of a custom emoji, the text of a
 * unicode one. Reaction payloads and configured emoji strings normalize to
 * the same key.
 */
export function normalizeTriggerKey(emoji: EmojiLike | string | null | undefined): string {
  if (!emoji) return "";

  if (typeof emoji === "object") {
    return emoji.id || emoji.name || "";
  }

  const trimmed = emoji.trim();
  const custom = CUSTOM_EMOJI_PATTERN.exec(trimmed);
  if (custom) return custom[3] ?? "";
  return trimmed;
}

export interface ParsedEmoji {
  key: string;
  /** The string to send back to the platform (`<:name:id>` or the unicode text). */
  display: string;
  custom: boolean;
}

/** Parses operator input; null when it cannot be an emoji. */
export function parseEmoji(input: string | null | undefined): ParsedEmoji | null {
  const trimmed = input?.trim();
  if (!trimmed) return null;

  const custom = CUSTOM_EMOJI_PATTERN.exec(trimmed);
  if (custom?.[3]) {
    return { key: custom[3], display: trimmed, custom: true };
  }

  if (/\s/.test(trimmed) || /^[\w<>:@#]+$/.test(trimmed) || trimmed.length > 16) {
    return null;
  }
  return { key: trimmed, display: trimmed, custom: false };
}

/** Category id: lower case, whitespace runs become `_`, colons are dropped. */
export function slugifyCategoryId(name: string): string {
  return name.trim().toLowerCase().replace(/:/g, "").replace(/\s+/g, "_");
}

export const roleMessageKey = (guildId: string, messageId: string) =>
  `${guildId}:${messageId}`;

export type ComponentKind = "button" | "menu";

export interface ComponentTarget {
  kind: ComponentKind;
  guildId: string;
  messageId: string;
  /** Trigger key for buttons, category id for menus. */
  key: string;
}

const KIND_CODES: Record<ComponentKind, string> = { button: "b", menu: "m" };

export function encodeComponentId(target: ComponentTarget): string {
  return [
    COMPONENT_PREFIX,
    KIND_CODES[target.kind],
    target.guildId,
    target.messageId,
    target.key,
  ].join(":");
}

export function decodeComponentId(customId: string): ComponentTarget | null {
  const [prefix, code, guildId, messageId, ...rest] = customId.split(":");
  if (prefix !== COMPONENT_PREFIX || !guildId || !messageId) return null;

  const key = rest.join(":");
  if (!key) return null;

  if (code === KIND_CODES.button) return { kind: "button", guildId, messageId, key };
  if (code === KIND_CODES.menu) return { kind: "menu", guildId, messageId, key };
  return null;
}

export const isReactionRoleComponentId = (customId: string) =>
  customId.startsWith(`${COMPONENT_PREFIX}:`);

/** `#FF0000` or `FF0000` to a number; null when malformed. */
export function parseHexColor(input: string): number | null {
  const match = HEX_COLOR_PATTERN.exec(input.trim());
  return match?.[1] ? Number.parseInt(match[1], 16) : null;
}
