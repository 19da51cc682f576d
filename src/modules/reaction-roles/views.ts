/**
 * Neutral view model of a role message. Rendering into platform components
 * happens in the adapter; this only decides what is shown.
 */
import { activeBindingEntries, activeCategoryBindings } from "./domain/accessors";
import { encodeComponentId } from "./domain/keys";
import type { RoleMessage } from "./domain/types";

export interface ViewField {
  name: string;
  value: string;
}

export interface ButtonView {
  customId: string;
  label: string | null;
  emoji: string | null;
}

export interface MenuOptionView {
  value: string;
  label: string;
  description: string | null;
  emoji: string | null;
}

export interface MenuView {
  customId: string;
  placeholder: string;
  minValues: number;
  maxValues: number;
  options: MenuOptionView[];
}

export interface RoleMessageView {
  embed: {
    title: string;
    description: string;
    color: number | null;
    fields: ViewField[];
  };
  buttons: ButtonView[];
  menus: MenuView[];
}

const OPTION_FALLBACK_DESCRIPTION = "Click to toggle this role";

const roleName = (names: ReadonlyMap<string, string>, roleId: string) =>
  names.get(roleId) ?? `Role ${roleId}`;

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max - 3)}...` : value;
}

/**
 * @param roleNames Role id to display name; unknown ids fall back to `Role <id>`.
 */
export function buildRoleMessageView(
  message: RoleMessage,
  roleNames: ReadonlyMap<string, string> = new Map(),
): RoleMessageView {
  const { display } = message;
  const view: RoleMessageView = {
    embed: { title: display.title, description: display.description, color: display.color, fields: [] },
    buttons: [],
    menus: [],
  };

  switch (message.style) {
    case "reaction": {
      const lines = activeBindingEntries(message).map(
        ({ binding }) => `${binding.emoji ?? ""} <@&${binding.roleId}>`.trim(),
      );
      if (lines.length) view.embed.fields.push({ name: "Roles", value: lines.join("\n") });
      break;
    }

    case "button":
      for (const { key, binding } of activeBindingEntries(message)) {
        view.buttons.push({
          customId: encodeComponentId({
            kind: "button",
            guildId: message.guildId,
            messageId: message.messageId,
            key,
          }),
          label: binding.label ?? (binding.emoji ? null : roleName(roleNames, binding.roleId)),
          emoji: binding.emoji,
        });
      }
      break;

    case "menu":
      for (const category of message.categories) {
        const bindings = activeCategoryBindings(category);
        if (!bindings.length) continue;

        if (category.description) {
          view.embed.fields.push({ name: category.name, value: category.description });
        }

        const single = bindings.some((binding) => binding.mode !== "normal");
        const placeholder = `Select ${category.name} roles`;
        view.menus.push({
          customId: encodeComponentId({
            kind: "menu",
            guildId: message.guildId,
            messageId: message.messageId,
            key: category.id,
          }),
          placeholder: category.emoji ? `${category.emoji} ${placeholder}` : placeholder,
          minValues: 0,
          maxValues: single ? 1 : bindings.length,
          options: bindings.map((binding) => ({
            value: binding.roleId,
            label: truncate(binding.label ?? roleName(roleNames, binding.roleId), 100),
            description: truncate(binding.description ?? OPTION_FALLBACK_DESCRIPTION, 100),
            emoji: binding.emoji,
          })),
        });
      }
      break;
  }

  return view;
}
