import {
  createChannelOption,
  createStringOption,
  Declare,
  Options,
  SubCommand,
  type GuildCommandContext,
} from "seyfert";
import { ChannelType } from "seyfert/lib/types";

import { parseColorOption, requireReactionRolesContext, runConfigure } from "./shared";

const options = {
  channel: createChannelOption({
    description: "Channel to post the menu in",
    required: true,
    channel_types: [ChannelType.GuildText, ChannelType.GuildAnnouncement],
  }),
  title: createStringOption({ description: "Embed title", required: false }),
  description: createStringOption({ description: "Embed description", required: false }),
  color: createStringOption({ description: "Embed colour, e.g. #3498db", required: false }),
};

@Declare({
  name: "create-menu",
  description: "Post a new select-menu role message",
})
@Options(options)
export default class ReactionRolesCreateMenuCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const message = await runConfigure(ctx, () =>
      context.engine.createRoleMessage({
        guildId: context.guildId,
        channelId: ctx.options.channel.id,
        style: "menu",
        title: ctx.options.title,
        description: ctx.options.description ?? "Pick your roles from the menus below",
        color: parseColorOption(ctx.options.color),
      }),
    );
    if (!message) return;

    await ctx.editOrReply({
      content: `Posted menu \`${message.messageId}\`. Add a category with \`/reactionroles add-category\`.`,
    });
  }
}
