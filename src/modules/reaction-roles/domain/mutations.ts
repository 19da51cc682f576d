/**
 * Pure configuration edits. Each returns a new RoleMessage and throws
 * `ConfigurationError` when the edit would break a configuration rule.
 */
import { ConfigurationError } from "../errors";
import { allBindingEntries, findCategory } from "./accessors";
import { DEFAULT_DESCRIPTION, DEFAULT_TITLE, LIMITS, ROLE_MESSAGE_VERSION } from "./constants";
import { type ParsedEmoji, roleMessageKey, slugifyCategoryId } from "./keys";
import type {
  Binding,
  BindingMode,
  RoleMessage,
  RoleMessageDisplay,
  RoleMessageStyle,
} from "./types";

export interface NewRoleMessage {
  guildId: string;
  messageId: string;
  channelId: string;
  style: RoleMessageStyle;
  display?: Partial<RoleMessageDisplay>;
}

export interface BindingInput {
  roleId: string;
  mode: BindingMode;
  emoji?: ParsedEmoji | null;
  label?: string | null;
  description?: string | null;
}

export interface CategoryInput {
  name: string;
  emoji?: string | null;
  description?: string | null;
}

export interface SettingsPatch {
  requiredRoles?: string[];
  maxRoles?: number | null;
}

const touch = (message: RoleMessage, now: Date): RoleMessage => ({ ...message, updatedAt: now });

function checkLength(field: string, value: string | null | undefined, max: number) {
  if (value && value.length > max) {
    throw new ConfigurationError("invalid_input", `${field} must be at most ${max} characters.`);
  }
}

function expectStyle(message: RoleMessage, styles: RoleMessageStyle[]) {
  if (!styles.includes(message.style)) {
    throw new ConfigurationError(
      "style_mismatch",
      `This operation does not apply to ${message.style} role messages.`,
    );
  }
}

function assertRoleUnbound(message: RoleMessage, roleId: string) {
  if (allBindingEntries(message).some((entry) => entry.binding.roleId === roleId)) {
    throw new ConfigurationError(
      "duplicate_role",
      `Role ${roleId} is already bound on this message.`,
    );
  }
}

function toBinding(input: BindingInput): Binding {
  checkLength("Label", input.label, LIMITS.label);
  checkLength("Description", input.description, LIMITS.description);
  return {
    roleId: input.roleId,
    mode: input.mode,
    label: input.label?.trim() || null,
    emoji: input.emoji?.display ?? null,
    description: input.description?.trim() || null,
    orphaned: false,
  };
}

export function createRoleMessageDoc(input: NewRoleMessage, now: Date = new Date()): RoleMessage {
  const title = input.display?.title ?? DEFAULT_TITLE;
  checkLength("Title", title, 256);

  return {
    _id: roleMessageKey(input.guildId, input.messageId),
    version: ROLE_MESSAGE_VERSION,
    guildId: input.guildId,
    messageId: input.messageId,
    channelId: input.channelId,
    style: input.style,
    settings: { requiredRoles: [], maxRoles: null },
    triggers: {},
    categories: [],
    display: {
      title,
      description: input.display?.description ?? DEFAULT_DESCRIPTION,
      color: input.display?.color ?? null,
    },
    stale: false,
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Adds a reaction or button trigger. Reactions are keyed by emoji; a button
 * without an emoji is keyed by its role id.
 */
export function addTrigger(
  message: RoleMessage,
  input: BindingInput,
  now: Date = new Date(),
): { message: RoleMessage; key: string } {
  expectStyle(message, ["reaction", "button"]);

  if (message.style === "reaction" && !input.emoji) {
    throw new ConfigurationError("invalid_input", "Reaction triggers need an emoji.");
  }
  if (message.style === "button" && !input.emoji && !input.label) {
    throw new ConfigurationError("invalid_input", "Buttons need an emoji or a label.");
  }

  const key = input.emoji?.key ?? input.roleId;
  if (message.triggers[key]) {
    throw new ConfigurationError("duplicate_trigger", "That trigger is already bound on this message.");
  }
  assertRoleUnbound(message, input.roleId);

  const limit = message.style === "reaction" ? LIMITS.reactions : LIMITS.buttons;
  if (Object.keys(message.triggers).length >= limit) {
    throw new ConfigurationError("limit_reached", `A ${message.style} message holds at most ${limit} roles.`);
  }

  const binding = toBinding(input);
  return {
    key,
    message: touch({ ...message, triggers: { ...message.triggers, [key]: binding } }, now),
  };
}

export function removeTrigger(
  message: RoleMessage,
  key: string,
  now: Date = new Date(),
): { message: RoleMessage; removed: Binding } {
  expectStyle(message, ["reaction", "button"]);

  const removed = message.triggers[key];
  if (!removed) {
    throw new ConfigurationError("unknown_trigger", "No role is bound to that trigger.");
  }

  const triggers = { ...message.triggers };
  delete triggers[key];
  return { removed, message: touch({ ...message, triggers }, now) };
}

export function updateSettings(
  message: RoleMessage,
  patch: SettingsPatch,
  now: Date = new Date(),
): RoleMessage {
  const maxRoles = patch.maxRoles === undefined ? message.settings.maxRoles : patch.maxRoles;
  if (maxRoles !== null && (!Number.isInteger(maxRoles) || maxRoles < 1)) {
    throw new ConfigurationError("invalid_input", "Max roles must be a positive whole number.");
  }

  const requiredRoles = patch.requiredRoles
    ? [...new Set(patch.requiredRoles)]
    : message.settings.requiredRoles;

  return touch({ ...message, settings: { requiredRoles, maxRoles } }, now);
}

export function updateDisplay(
  message: RoleMessage,
  patch: Partial<RoleMessageDisplay>,
  now: Date = new Date(),
): RoleMessage {
  checkLength("Title", patch.title, 256);
  checkLength("Description", patch.description, 4096);
  return touch({ ...message, display: { ...message.display, ...patch } }, now);
}

export function addCategory(
  message: RoleMessage,
  input: CategoryInput,
  now: Date = new Date(),
): { message: RoleMessage; categoryId: string } {
  expectStyle(message, ["menu"]);

  const name = input.name.trim();
  if (!name) throw new ConfigurationError("invalid_input", "Category name is required.");
  checkLength("Category name", name, LIMITS.categoryName);
  checkLength("Description", input.description, LIMITS.description);

  const categoryId = slugifyCategoryId(name);
  if (findCategory(message, categoryId)) {
    throw new ConfigurationError("duplicate_category", `Category '${name}' already exists.`);
  }
  if (message.categories.length >= LIMITS.categories) {
    throw new ConfigurationError(
      "limit_reached",
      `A menu holds at most ${LIMITS.categories} categories.`,
    );
  }

  const category = {
    id: categoryId,
    name,
    emoji: input.emoji?.trim() || null,
    description: input.description?.trim() || null,
    bindings: [],
  };
  return {
    categoryId,
    message: touch({ ...message, categories: [...message.categories, category] }, now),
  };
}

export function removeCategory(
  message: RoleMessage,
  categoryId: string,
  now: Date = new Date(),
): RoleMessage {
  expectStyle(message, ["menu"]);
  if (!findCategory(message, categoryId)) {
    throw new ConfigurationError("unknown_category", "That category does not exist.");
  }
  return touch(
    { ...message, categories: message.categories.filter((category) => category.id !== categoryId) },
    now,
  );
}

export function addMenuBinding(
  message: RoleMessage,
  categoryId: string,
  input: BindingInput,
  now: Date = new Date(),
): RoleMessage {
  expectStyle(message, ["menu"]);

  const category = findCategory(message, categoryId);
  if (!category) {
    throw new ConfigurationError("unknown_category", "That category does not exist.");
  }
  assertRoleUnbound(message, input.roleId);
  if (category.bindings.length >= LIMITS.menuOptions) {
    throw new ConfigurationError(
      "limit_reached",
      `A category holds at most ${LIMITS.menuOptions} roles.`,
    );
  }

  const binding = toBinding(input);
  return touch(
    {
      ...message,
      categories: message.categories.map((entry) =>
        entry.id === categoryId ? { ...entry, bindings: [...entry.bindings, binding] } : entry,
      ),
    },
    now,
  );
}

export function removeMenuBinding(
  message: RoleMessage,
  categoryId: string,
  roleId: string,
  now: Date = new Date(),
): RoleMessage {
  expectStyle(message, ["menu"]);

  const category = findCategory(message, categoryId);
  if (!category) {
    throw new ConfigurationError("unknown_category", "That category does not exist.");
  }
  if (!category.bindings.some((binding) => binding.roleId === roleId)) {
    throw new ConfigurationError("unknown_trigger", "That role is not in this category.");
  }

  return touch(
    {
      ...message,
      categories: message.categories.map((entry) =>
        entry.id === categoryId
          ? { ...entry, bindings: entry.bindings.filter((binding) => binding.roleId !== roleId) }
          : entry,
      ),
    },
    now,
  );
}

export function setStale(message: RoleMessage, stale: boolean, now: Date = new Date()): RoleMessage {
  return message.stale === stale ? message : touch({ ...message, stale }, now);
}

/** Flags every binding of `roleId` as orphaned; null when nothing changed. */
export function orphanRole(
  message: RoleMessage,
  roleId: string,
  now: Date = new Date(),
): RoleMessage | null {
  const hit = allBindingEntries(message).some(
    (entry) => entry.binding.roleId === roleId && !entry.binding.orphaned,
  );
  if (!hit) return null;

  const mark = (binding: Binding): Binding =>
    binding.roleId === roleId ? { ...binding, orphaned: true } : binding;

  const triggers: Record<string, Binding> = {};
  for (const [key, binding] of Object.entries(message.triggers)) triggers[key] = mark(binding);

  return touch(
    {
      ...message,
      triggers,
      categories: message.categories.map((category) => ({
        ...category,
        bindings: category.bindings.map(mark),
      })),
    },
    now,
  );
}

/**
 * Drops bindings that are orphaned or whose role is in `missingRoles`, then
 * drops categories left without bindings.
 */
export function pruneBindings(
  message: RoleMessage,
  missingRoles: ReadonlySet<string>,
  now: Date = new Date(),
): { message: RoleMessage; removedBindings: number; removedCategories: number } {
  const dead = (binding: Binding) => binding.orphaned || missingRoles.has(binding.roleId);
  let removedBindings = 0;

  const triggers: Record<string, Binding> = {};
  for (const [key, binding] of Object.entries(message.triggers)) {
    if (dead(binding)) removedBindings += 1;
    else triggers[key] = binding;
  }

  const categories = [];
  let removedCategories = 0;
  for (const category of message.categories) {
    const bindings = category.bindings.filter((binding) => !dead(binding));
    removedBindings += category.bindings.length - bindings.length;
    if (bindings.length === 0) {
      removedCategories += 1;
      continue;
    }
    categories.push({ ...category, bindings });
  }

  if (removedBindings === 0 && removedCategories === 0) {
    return { message, removedBindings, removedCategories };
  }
  return {
    message: touch({ ...message, triggers, categories }, now),
    removedBindings,
    removedCategories,
  };
}

/** Copy of `source` living on another message. Stale state is not carried over. */
export function cloneRoleMessage(
  source: RoleMessage,
  target: { messageId: string; channelId: string },
  now: Date = new Date(),
): RoleMessage {
  return {
    ...structuredClone(source),
    _id: roleMessageKey(source.guildId, target.messageId),
    messageId: target.messageId,
    channelId: target.channelId,
    stale: false,
    createdAt: now,
    updatedAt: now,
  };
}
