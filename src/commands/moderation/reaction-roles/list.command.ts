/**
 * Lists every role message of the guild, one embed field per message.
 */
import { Declare, Embed, SubCommand, type GuildCommandContext } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";

import { formatRoleMessageField, requireReactionRolesContext } from "./shared";

const MAX_FIELDS = 25;

@Declare({
  name: "list",
  description: "List the role messages of this server",
})
export default class ReactionRolesListCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const messages = context.engine.list(context.guildId);
    if (!messages.length) {
      await ctx.editOrReply({ content: "No role messages yet. Start with `/reactionroles create`." });
      return;
    }

    const fields = messages.map(formatRoleMessageField);
    const embeds: Embed[] = [];
    const totalPages = Math.ceil(fields.length / MAX_FIELDS);
    for (let index = 0; index < fields.length && embeds.length < 10; index += MAX_FIELDS) {
      const embed = new Embed({ title: "Role messages", color: EmbedColors.Blue }).addFields(
        fields.slice(index, index + MAX_FIELDS),
      );
      if (totalPages > 1) {
        embed.setFooter({ text: `Page ${Math.floor(index / MAX_FIELDS) + 1}/${totalPages}` });
      }
      embeds.push(embed);
    }

    await ctx.editOrReply({ embeds });
  }
}
