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
  name: createStringOption({ description: "Category name", required: true, max_length: 40 }),
  emoji: createStringOption({ description: "Emoji shown in the placeholder", required: false }),
  description: createStringOption({ description: "Text shown above the menu", required: false }),
};

@Declare({
  name: "add-category",
  description: "Add a select menu to a menu role message",
})
@Options(options)
export default class ReactionRolesAddCategoryCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const result = await runConfigure(ctx, () =>
      context.engine.addCategory(context.guildId, parseMessageOption(ctx.options.message), {
        name: ctx.options.name,
        emoji: ctx.options.emoji,
        description: ctx.options.description,
      }),
    );
    if (!result) return;

    await ctx.editOrReply({
      content: describeConfigureResult(
        `Category \`${result.categoryId}\` added. It shows up once it has a role; use \`/reactionroles add-menu-role\`.`,
        result,
      ),
    });
  }
}
