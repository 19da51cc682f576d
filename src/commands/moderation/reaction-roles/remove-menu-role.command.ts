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
  message: createStringOption({ description: "Menu message id or link", required: true }),
  category: createStringOption({ description: "Category name or id", required: true }),
  role: createRoleOption({ description: "Role to stop offering", required: true }),
};

@Declare({
  name: "remove-menu-role",
  description: "Stop offering a role in a menu category",
})
@Options(options)
export default class ReactionRolesRemoveMenuRoleCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const result = await runConfigure(ctx, () =>
      context.engine.removeMenuBinding(
        context.guildId,
        parseMessageOption(ctx.options.message),
        ctx.options.category,
        ctx.options.role.id,
      ),
    );
    if (!result) return;

    await ctx.editOrReply({ content: describeConfigureResult("Role removed from the menu.", result) });
  }
}
