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
  parseMessageOption,
  requireReactionRolesContext,
  runConfigure,
} from "./shared";

const options = {
  message: createStringOption({ description: "Role message id or link", required: true }),
  emoji: createStringOption({ description: "Emoji of the trigger to remove", required: false }),
  role: createRoleOption({ description: "Role whose trigger to remove", required: false }),
};

@Declare({
  name: "remove",
  description: "Unbind a reaction or button",
})
@Options(options)
export default class ReactionRolesRemoveCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    if (!ctx.options.emoji && !ctx.options.role) {
      await ctx.editOrReply({ content: "Give the emoji or the role of the trigger to remove." });
      return;
    }

    const result = await runConfigure(ctx, () =>
      context.engine.removeBinding(context.guildId, parseMessageOption(ctx.options.message), {
        trigger: ctx.options.emoji,
        roleId: ctx.options.role?.id,
      }),
    );
    if (!result) return;

    await ctx.editOrReply({ content: describeConfigureResult("Trigger removed.", result) });
  }
}
