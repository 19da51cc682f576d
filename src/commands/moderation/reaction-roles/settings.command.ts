import {
  createBooleanOption,
  createIntegerOption,
  createRoleOption,
  createStringOption,
  Declare,
  Options,
  SubCommand,
  type GuildCommandContext,
} from "seyfert";

import type { RoleMessageDisplay } from "@/modules/reaction-roles";

import {
  describeConfigureResult,
  parseColorOption,
  parseMessageOption,
  requireReactionRolesContext,
  runConfigure,
} from "./shared";

const options = {
  message: createStringOption({ description: "Role message id or link", required: true }),
  max_roles: createIntegerOption({
    description: "Most roles a member can hold from this message (0 = no limit)",
    required: false,
    min_value: 0,
  }),
  add_required: createRoleOption({
    description: "Members need one of the required roles to pick",
    required: false,
  }),
  remove_required: createRoleOption({ description: "Drop a required role", required: false }),
  clear_required: createBooleanOption({ description: "Drop every required role", required: false }),
  title: createStringOption({ description: "New embed title", required: false }),
  description: createStringOption({ description: "New embed description", required: false }),
  color: createStringOption({ description: "New embed colour, e.g. #3498db", required: false }),
};

@Declare({
  name: "settings",
  description: "Change limits, required roles or the embed of a role message",
})
@Options(options)
export default class ReactionRolesSettingsCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const { max_roles, add_required, remove_required, clear_required, title, description, color } =
      ctx.options;

    const result = await runConfigure(ctx, async () => {
      const messageId = parseMessageOption(ctx.options.message);
      const display: Partial<RoleMessageDisplay> = {};
      if (title !== undefined) display.title = title;
      if (description !== undefined) display.description = description;
      const parsedColor = parseColorOption(color);
      if (parsedColor !== undefined) display.color = parsedColor;

      let result = await context.engine.updateSettings(context.guildId, messageId, {
        maxRoles: max_roles === undefined ? undefined : max_roles || null,
        addRequiredRole: add_required?.id,
        removeRequiredRole: remove_required?.id,
        clearRequiredRoles: clear_required ?? false,
      });
      if (Object.keys(display).length) {
        result = await context.engine.updateDisplay(context.guildId, messageId, display);
      }
      return result;
    });
    if (!result) return;

    const { maxRoles, requiredRoles } = result.message.settings;
    const summary = [
      `Max roles: ${maxRoles ?? "no limit"}`,
      `Required roles: ${requiredRoles.length ? requiredRoles.map((id) => `<@&${id}>`).join(", ") : "none"}`,
    ].join("\n");
    await ctx.editOrReply({ content: describeConfigureResult(`Settings saved.\n${summary}`, result) });
  }
}
