/**
 * Seyfert rendering layer.
 *
 * Turns the neutral role-message view into seyfert builders.
 */
import {
  ActionRow,
  Button,
  Embed,
  StringSelectMenu,
  StringSelectOption,
} from "seyfert";
import { ButtonStyle } from "seyfert/lib/types";
import type { RoleMessageView } from "@/modules/reaction-roles";

const BUTTONS_PER_ROW = 5;
const MAX_ROWS = 5;
const DEFAULT_COLOR = 0x3498db;

// Role mentions in the embed must not ping anyone.
const NO_MENTIONS: { parse: ("roles" | "users" | "everyone")[] } = { parse: [] };

export function renderEmbed(view: RoleMessageView): Embed {
  const embed = new Embed()
    .setTitle(view.embed.title)
    .setColor(view.embed.color ?? DEFAULT_COLOR);

  if (view.embed.description) embed.setDescription(view.embed.description);
  if (view.embed.fields.length) embed.addFields(...view.embed.fields);
  return embed;
}

function buttonRows(view: RoleMessageView): ActionRow<Button>[] {
  const rows: ActionRow<Button>[] = [];
  for (let i = 0; i < view.buttons.length && rows.length < MAX_ROWS; i += BUTTONS_PER_ROW) {
    const buttons = view.buttons.slice(i, i + BUTTONS_PER_ROW).map((entry) => {
      const button = new Button().setCustomId(entry.customId).setStyle(ButtonStyle.Secondary);
      if (entry.label) button.setLabel(entry.label);
      if (entry.emoji) button.setEmoji(entry.emoji);
      return button;
    });
    rows.push(new ActionRow<Button>().addComponents(...buttons));
  }
  return rows;
}

function menuRows(view: RoleMessageView): ActionRow<StringSelectMenu>[] {
  return view.menus.slice(0, MAX_ROWS).map((entry) => {
    const menu = new StringSelectMenu()
      .setCustomId(entry.customId)
      .setPlaceholder(entry.placeholder)
      .setValuesLength({ min: entry.minValues, max: entry.maxValues });

    for (const option of entry.options) {
      const built = new StringSelectOption().setLabel(option.label).setValue(option.value);
      if (option.description) built.setDescription(option.description);
      if (option.emoji) built.setEmoji(option.emoji);
      menu.addOption(built);
    }
    return new ActionRow<StringSelectMenu>().addComponents(menu);
  });
}

/**
 * Message body for a role message. `components` is always set, so an edit
 * also removes components that no longer exist.
 */
export function renderRoleMessage(view: RoleMessageView) {
  return {
    embeds: [renderEmbed(view)],
    components: [...buttonRows(view), ...menuRows(view)],
    allowed_mentions: NO_MENTIONS,
  };
}
