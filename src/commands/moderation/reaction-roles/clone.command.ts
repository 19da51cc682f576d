import {
  createChannelOption,
  createStringOption,
  Declare,
  Options,
  SubCommand,
  type GuildCommandContext,
} from "seyfert";
import { ChannelType } from "seyfert/lib/types";

import {
  describeConfigureResult,
  parseMessageOption,
  requireReactionRolesContext,
  runConfigure,
} from "./shared";

const options = {
  message: createStringOption({ description: "Role message id or link to copy", required: true }),
  channel: createChannelOption({
    description: "Channel to post the copy in",
    required: true,
    channel_types: [ChannelType.GuildText, ChannelType.GuildAnnouncement],
  }),
};

@Declare({
  name: "clone",
  description: "Post a copy of a role message with the same roles",
})
@Options(options)
export default class ReactionRolesCloneCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const result = await runConfigure(ctx, () =>
      context.engine.clone(
        context.guildId,
        parseMessageOption(ctx.options.message),
        ctx.options.channel.id,
      ),
    );
    if (!result) return;

    await ctx.editOrReply({
      content: describeConfigureResult(
        `Cloned into <#${ctx.options.channel.id}> as \`${result.message.messageId}\`.`,
        result,
      ),
    });
  }
}
