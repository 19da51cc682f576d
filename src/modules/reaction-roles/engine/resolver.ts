/**
 * Assignment resolver: turns an activation into the exact role mutations
 * that keep the mode invariants.
 *
 * Pure. The caller passes a freshly fetched member role set and every
 * RoleMessage of the guild; nothing here touches the platform or the store.
 *
 * Invariants after applying an `applied` outcome:
 * - at most one `unique` role per scope (message, or category for menus);
 * - holding an `exclusive` role means holding no other role bound in the guild;
 * - at most `maxRoles` roles bound by the target message.
 */
import {
  boundRoleIds,
  exclusiveRoleIds,
  findBindingEntry,
  findCategory,
  guildBoundRoleIds,
  scopeSiblings,
} from "../domain/accessors";
import type {
  BindingEntry,
  MenuSelectionInput,
  Outcome,
  RejectionReason,
  ResolveInput,
  RoleMessage,
} from "../domain/types";

const rejected = (reason: RejectionReason): Outcome => ({ kind: "rejected", reason });

const applied = (add: Iterable<string> = [], remove: Iterable<string> = []): Outcome => ({
  kind: "applied",
  add: new Set(add),
  remove: new Set(remove),
});

/** Guild messages with `target` swapped in, so edits in flight are seen. */
function withTarget(messages: readonly RoleMessage[], target: RoleMessage): RoleMessage[] {
  const others = messages.filter((message) => message._id !== target._id);
  return [...others, target];
}

function lacksRequiredRole(target: RoleMessage, memberRoles: ReadonlySet<string>): boolean {
  const required = target.settings.requiredRoles;
  return required.length > 0 && !required.some((roleId) => memberRoles.has(roleId));
}

function heldCount(target: RoleMessage, roles: ReadonlySet<string>): number {
  let held = 0;
  for (const roleId of boundRoleIds(target)) {
    if (roles.has(roleId)) held += 1;
  }
  return held;
}

/**
 * Roles to drop before toggling `entry`. Besides the mode rule, adding a
 * non-exclusive role drops any exclusive role the member holds elsewhere in
 * the guild; otherwise that exclusive holder would end up with a second role.
 */
function preRemove(
  memberRoles: ReadonlySet<string>,
  messages: readonly RoleMessage[],
  target: RoleMessage,
  entry: BindingEntry,
  adding: boolean,
): Set<string> {
  const roleId = entry.binding.roleId;
  const remove = new Set<string>();

  switch (entry.binding.mode) {
    case "normal":
      break;
    case "unique":
      for (const sibling of scopeSiblings(target, entry)) {
        if (memberRoles.has(sibling.binding.roleId)) remove.add(sibling.binding.roleId);
      }
      break;
    case "exclusive":
      for (const bound of guildBoundRoleIds(messages)) {
        if (bound !== roleId && memberRoles.has(bound)) remove.add(bound);
      }
      break;
  }

  if (adding && entry.binding.mode !== "exclusive") {
    for (const exclusive of exclusiveRoleIds(messages)) {
      if (exclusive !== roleId && memberRoles.has(exclusive)) remove.add(exclusive);
    }
  }

  return remove;
}

export function resolve(input: ResolveInput): Outcome {
  const { memberRoles, target, trigger, kind } = input;
  if (target.stale) return rejected("missing_binding");

  const entry = findBindingEntry(target, trigger);
  if (!entry) return rejected("missing_binding");

  const roleId = entry.binding.roleId;
  const held = memberRoles.has(roleId);

  if (kind === "deselect") {
    return held ? applied([], [roleId]) : applied();
  }

  if (lacksRequiredRole(target, memberRoles)) {
    return rejected("missing_required_role");
  }

  const maxRoles = target.settings.maxRoles;
  if (maxRoles !== null && !held && heldCount(target, memberRoles) >= maxRoles) {
    return rejected("cap_reached");
  }

  const messages = withTarget(input.guildMessages, target);
  const remove = preRemove(memberRoles, messages, target, entry, !held);

  if (held) {
    remove.add(roleId);
    return applied([], remove);
  }
  return applied([roleId], remove);
}

/**
 * Moves one menu category to the desired selection. Values outside the
 * category are ignored. Additions run in category order, exclusive ones last,
 * on a working copy of the member's roles, so later picks see the removals of
 * earlier ones.
 */
export function resolveMenuSelection(input: MenuSelectionInput): Outcome {
  const { memberRoles, target, categoryId } = input;
  if (target.stale) return rejected("missing_binding");

  const category = findCategory(target, categoryId);
  if (!category) return rejected("missing_binding");

  const desired = new Set(input.desired);
  const entries = category.bindings
    .filter((binding) => !binding.orphaned)
    .map((binding): BindingEntry => ({ key: binding.roleId, binding, categoryId }));

  // Exclusive picks go last so they win over anything picked with them.
  const toAdd = entries
    .filter((entry) => desired.has(entry.binding.roleId) && !memberRoles.has(entry.binding.roleId))
    .sort(
      (a, b) =>
        Number(a.binding.mode === "exclusive") - Number(b.binding.mode === "exclusive"),
    );
  const toRemove = entries.filter(
    (entry) => !desired.has(entry.binding.roleId) && memberRoles.has(entry.binding.roleId),
  );

  if (toAdd.length > 0 && lacksRequiredRole(target, memberRoles)) {
    return rejected("missing_required_role");
  }

  const messages = withTarget(input.guildMessages, target);
  const working = new Set(memberRoles);
  for (const entry of toRemove) working.delete(entry.binding.roleId);

  for (const entry of toAdd) {
    for (const roleId of preRemove(working, messages, target, entry, true)) {
      working.delete(roleId);
    }
    working.add(entry.binding.roleId);
  }

  const maxRoles = target.settings.maxRoles;
  if (maxRoles !== null && toAdd.length > 0 && heldCount(target, working) > maxRoles) {
    return rejected("cap_reached");
  }

  const add = [...working].filter((roleId) => !memberRoles.has(roleId));
  const remove = [...memberRoles].filter((roleId) => !working.has(roleId));
  return applied(add, remove);
}
