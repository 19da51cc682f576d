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
    description: "Channel to post the role message in",
    required: true,
    channel_types: [ChannelType.GuildText, ChannelType.GuildAnnouncement],
  }),
  style: createStringOption({
    description: "How members pick roles",
    required: true,
    choices: [
      { name: "Reactions", value: "reaction" },
      { name: "Buttons", value: "button" },
    ],
  }),
  title: createStringOption({ description: "Embed title", required: false }),
  description: createStringOption({ description: "Embed description", required: false }),
  color: createStringOption({ description: "Embed colour, e.g. #3498db", required: false }),
};

@Declare({
  name: "create",
  description: "Post a new reaction or button role message",
})
@Options(options)
export default class ReactionRolesCreateCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const style = ctx.options.style === "button" ? "button" : "reaction";
    const message = await runConfigure(ctx, () =>
      context.engine.createRoleMessage({
        guildId: context.guildId,
        channelId: ctx.options.channel.id,
        style,
        title: ctx.options.title,
        description: ctx.options.description,
        color: parseColorOption(ctx.options.color),
      }),
    );
    if (!message) return;

    await ctx.editOrReply({
      content: `Posted role message \`${message.messageId}\` in <#${ctx.options.channel.id}>. Add roles with \`/reactionroles add\`.`,
    });
  }
}
