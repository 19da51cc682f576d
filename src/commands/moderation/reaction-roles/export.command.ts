import { AttachmentBuilder, Declare, SubCommand, type GuildCommandContext } from "seyfert";

import { requireReactionRolesContext } from "./shared";

@Declare({
  name: "export",
  description: "Download the role message configuration as JSON",
})
export default class ReactionRolesExportCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const snapshot = context.engine.export(context.guildId);
    const file = new AttachmentBuilder()
      .setName(`reaction-roles-${context.guildId}.json`)
      .setDescription("Reaction roles export")
      .setFile("buffer", Buffer.from(JSON.stringify(snapshot, null, 2)));

    await ctx.editOrReply({
      content: `Exported ${snapshot.messages.length} role message(s).`,
      files: [file],
    });
  }
}
