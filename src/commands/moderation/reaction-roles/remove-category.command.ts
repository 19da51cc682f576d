import {
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
};

@Declare({
  name: "remove-category",
  description: "Remove a select menu and its roles",
})
@Options(options)
export default class ReactionRolesRemoveCategoryCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const result = await runConfigure(ctx, () =>
      context.engine.removeCategory(
        context.guildId,
        parseMessageOption(ctx.options.message),
        ctx.options.category,
      ),
    );
    if (!result) return;

    await ctx.editOrReply({ content: describeConfigureResult("Category removed.", result) });
  }
}
