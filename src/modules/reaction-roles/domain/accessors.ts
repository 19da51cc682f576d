/**
 * Read helpers over a RoleMessage. Orphaned bindings are invisible through
 * every helper except `allBindingEntries`.
 */
import type { BindingEntry, Category, RoleMessage } from "./types";

/** Every binding, orphaned ones included. Menu keys are role ids. */
export function allBindingEntries(message: RoleMessage): BindingEntry[] {
  if (message.style === "menu") {
    return message.categories.flatMap((category) =>
      category.bindings.map((binding) => ({
        key: binding.roleId,
        binding,
        categoryId: category.id,
      })),
    );
  }

  return Object.entries(message.triggers).map(([key, binding]) => ({
    key,
    binding,
    categoryId: null,
  }));
}

export function activeBindingEntries(message: RoleMessage): BindingEntry[] {
  return allBindingEntries(message).filter((entry) => !entry.binding.orphaned);
}

export function findBindingEntry(message: RoleMessage, key: string): BindingEntry | null {
  return activeBindingEntries(message).find((entry) => entry.key === key) ?? null;
}

/**
 * Other active bindings sharing the unique scope of `entry`: the whole
 * message for reaction/button, the category for menus.
 */
export function scopeSiblings(message: RoleMessage, entry: BindingEntry): BindingEntry[] {
  return activeBindingEntries(message).filter(
    (other) => other.key !== entry.key && other.categoryId === entry.categoryId,
  );
}

export function boundRoleIds(message: RoleMessage): Set<string> {
  return new Set(activeBindingEntries(message).map((entry) => entry.binding.roleId));
}

/** Union of the roles bound by every message, stale ones included. */
export function guildBoundRoleIds(messages: readonly RoleMessage[]): Set<string> {
  const roles = new Set<string>();
  for (const message of messages) {
    for (const roleId of boundRoleIds(message)) roles.add(roleId);
  }
  return roles;
}

export function exclusiveRoleIds(messages: readonly RoleMessage[]): Set<string> {
  const roles = new Set<string>();
  for (const message of messages) {
    for (const entry of activeBindingEntries(message)) {
      if (entry.binding.mode === "exclusive") roles.add(entry.binding.roleId);
    }
  }
  return roles;
}

export function findCategory(message: RoleMessage, categoryId: string): Category | null {
  return message.categories.find((category) => category.id === categoryId) ?? null;
}

export function activeCategoryBindings(category: Category) {
  return category.bindings.filter((binding) => !binding.orphaned);
}

export const isActiveMessage = (message: RoleMessage) => !message.stale;

/** The platform reaction for a trigger key; custom emoji need their stored form. */
export function reactionEmoji(key: string, emoji: string | null): string {
  return emoji ?? key;
}
