import {
  createRoleOption,
  createStringOption,
  Declare,
  Options,
  SubCommand,
  type GuildCommandContext,
} from "seyfert";

import {
  describeConfigureResult,
  MODE_CHOICES,
  parseMessageOption,
  parseMode,
  requireReactionRolesContext,
  runConfigure,
} from "./shared";

const options = {
  message: createStringOption({ description: "Role message id or link", required: true }),
  role: createRoleOption({ description: "Role to hand out", required: true }),
  emoji: createStringOption({
    description: "Emoji (required for reactions, optional for buttons)",
    required: false,
  }),
  label: createStringOption({ description: "Button label", required: false }),
  mode: createStringOption({
    description: "Conflict rule for this role",
    required: false,
    choices: MODE_CHOICES,
  }),
};

@Declare({
  name: "add",
  description: "Bind a role to a reaction or button",
})
@Options(options)
export default class ReactionRolesAddCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const role = ctx.options.role;
    const result = await runConfigure(ctx, () =>
      context.engine.addBinding(context.guildId, parseMessageOption(ctx.options.message), {
        roleId: role.id,
        mode: parseMode(ctx.options.mode),
        emoji: ctx.options.emoji,
        label: ctx.options.label,
      }),
    );
    if (!result) return;

    const trigger = result.message.triggers[result.key];
    const shown = trigger?.emoji ?? trigger?.label ?? role.name;
    await ctx.editOrReply({
      content: describeConfigureResult(`Bound ${shown} to <@&${role.id}>.`, result),
    });
  }
}
