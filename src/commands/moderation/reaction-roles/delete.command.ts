import {
  createStringOption,
  Declare,
  Options,
  SubCommand,
  type GuildCommandContext,
} from "seyfert";

import { parseMessageOption, requireReactionRolesContext, runConfigure } from "./shared";

const options = {
  message: createStringOption({ description: "Role message id or link", required: true }),
};

@Declare({
  name: "delete",
  description: "Forget a role message (the message itself stays)",
})
@Options(options)
export default class ReactionRolesDeleteCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const messageId = await runConfigure(ctx, async () => {
      const id = parseMessageOption(ctx.options.message);
      await context.engine.deleteRoleMessage(context.guildId, id);
      return id;
    });
    if (!messageId) return;

    ctx.client.logger.info("[reaction-roles] role message deleted by command", {
      guildId: context.guildId,
      messageId,
      actorId: ctx.author.id,
    });
    await ctx.editOrReply({
      content: `Role message \`${messageId}\` is no longer managed. Delete the message itself if you no longer need it.`,
    });
  }
}
