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
  message: createStringOption({ description: "Menu message id or link", required: true }),
  category: createStringOption({ description: "Category name or id", required: true }),
  role: createRoleOption({ description: "Role to offer", required: true }),
  label: createStringOption({ description: "Option label (defaults to the role name)", required: false }),
  description: createStringOption({ description: "Option description", required: false }),
  emoji: createStringOption({ description: "Option emoji", required: false }),
  mode: createStringOption({
    description: "Conflict rule for this role",
    required: false,
    choices: MODE_CHOICES,
  }),
};

@Declare({
  name: "add-menu-role",
  description: "Offer a role in a menu category",
})
@Options(options)
export default class ReactionRolesAddMenuRoleCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const role = ctx.options.role;
    const result = await runConfigure(ctx, () =>
      context.engine.addMenuBinding(
        context.guildId,
        parseMessageOption(ctx.options.message),
        ctx.options.category,
        {
          roleId: role.id,
          mode: parseMode(ctx.options.mode),
          label: ctx.options.label ?? role.name,
          description: ctx.options.description,
          emoji: ctx.options.emoji,
        },
      ),
    );
    if (!result) return;

    await ctx.editOrReply({
      content: describeConfigureResult(`Added <@&${role.id}> to the menu.`, result),
    });
  }
}
