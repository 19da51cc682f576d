/**
 * Upgrades legacy reaction-role documents to the version 2 layout.
 *
 * Legacy documents look like `{ guild_id, message_id, data }` where `data`
 * mixes a `settings` entry with one entry per emoji. Version 2 documents pass
 * through untouched; anything unrecognized is returned as-is so validation
 * rejects it.
 */
import {
  BINDING_MODES,
  DEFAULT_DESCRIPTION,
  DEFAULT_TITLE,
  ROLE_MESSAGE_VERSION,
} from "./constants";
import { normalizeTriggerKey, parseHexColor, roleMessageKey } from "./keys";

type RawRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is RawRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const LEGACY_STYLES: Record<string, "reaction" | "button" | "menu"> = {
  reactions: "reaction",
  reaction: "reaction",
  buttons: "button",
  button: "button",
  menu: "menu",
};

function idString(value: unknown): string | null {
  if (typeof value === "string" && value.trim()) return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

const optionalString = (value: unknown): string | null =>
  typeof value === "string" && value.trim() ? value : null;

function legacyMode(value: unknown): string {
  return typeof value === "string" && BINDING_MODES.some((mode) => mode === value)
    ? value
    : "normal";
}

function legacyBinding(entry: unknown, emoji: string | null) {
  if (isRecord(entry)) {
    const roleId = idString(entry.role_id);
    if (!roleId) return null;
    return {
      roleId,
      mode: legacyMode(entry.mode),
      label: optionalString(entry.label),
      emoji: optionalString(entry.emoji) ?? emoji,
      description: optionalString(entry.description),
      orphaned: false,
    };
  }

  // Oldest documents stored the bare role id under the emoji.
  const roleId = idString(entry);
  if (!roleId) return null;
  return { roleId, mode: "normal", label: null, emoji, description: null, orphaned: false };
}

function legacyColor(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string") return parseHexColor(value);
  return null;
}

function legacyCategories(value: unknown) {
  if (!isRecord(value)) return [];

  const categories = [];
  for (const [id, raw] of Object.entries(value)) {
    if (!isRecord(raw)) continue;
    const roles = Array.isArray(raw.roles) ? raw.roles : [];
    const bindings = [];
    for (const role of roles) {
      const binding = legacyBinding(role, null);
      if (binding) bindings.push(binding);
    }
    categories.push({
      id,
      name: optionalString(raw.name) ?? id,
      emoji: optionalString(raw.emoji),
      description: optionalString(raw.description),
      bindings,
    });
  }
  return categories;
}

/**
 * Builds a version 2 document from the `data` payload of a legacy entry.
 * `now` stamps both timestamps since legacy data carries none.
 */
export function upgradeLegacyData(
  guildId: string,
  messageId: string,
  data: RawRecord,
  now: Date = new Date(),
): RawRecord {
  const settings = isRecord(data.settings) ? data.settings : {};
  const style = LEGACY_STYLES[String(settings.style ?? "reactions")] ?? "reaction";
  const embed = isRecord(settings.embed_data) ? settings.embed_data : {};

  const requiredRoles = Array.isArray(settings.required_roles)
    ? settings.required_roles.map(idString).filter((id): id is string => id !== null)
    : [];
  const maxRoles =
    typeof settings.max_roles === "number" && settings.max_roles > 0
      ? Math.floor(settings.max_roles)
      : null;

  const triggers: RawRecord = {};
  if (style !== "menu") {
    for (const [emoji, entry] of Object.entries(data)) {
      if (emoji === "settings") continue;
      const key = normalizeTriggerKey(emoji);
      const binding = legacyBinding(entry, emoji);
      if (key && binding) triggers[key] = binding;
    }
  }

  return {
    _id: roleMessageKey(guildId, messageId),
    version: ROLE_MESSAGE_VERSION,
    guildId,
    messageId,
    channelId: null,
    style,
    settings: { requiredRoles: [...new Set(requiredRoles)], maxRoles },
    triggers,
    categories: style === "menu" ? legacyCategories(settings.categories) : [],
    display: {
      title: optionalString(embed.title) ?? DEFAULT_TITLE,
      description: optionalString(embed.description) ?? DEFAULT_DESCRIPTION,
      color: legacyColor(embed.color),
    },
    stale: false,
    createdAt: now,
    updatedAt: now,
  };
}

export function isLegacyRoleMessage(raw: unknown): boolean {
  return isRecord(raw) && !("version" in raw) && "guild_id" in raw && "message_id" in raw;
}

export function migrateRoleMessage(raw: unknown, now: Date = new Date()): unknown {
  if (!isLegacyRoleMessage(raw) || !isRecord(raw)) return raw;

  const guildId = idString(raw.guild_id);
  const messageId = idString(raw.message_id);
  if (!guildId || !messageId) return raw;

  return upgradeLegacyData(guildId, messageId, isRecord(raw.data) ? raw.data : {}, now);
}
