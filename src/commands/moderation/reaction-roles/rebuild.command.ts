import { Declare, SubCommand, type GuildCommandContext } from "seyfert";

import { formatRebuildReport, requireReactionRolesContext, runConfigure } from "./shared";

@Declare({
  name: "rebuild",
  description: "Re-create reactions and components on every role message",
})
export default class ReactionRolesRebuildCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const report = await runConfigure(ctx, () => context.engine.rebuild(context.guildId));
    if (!report) return;

    await ctx.editOrReply({ content: formatRebuildReport(report) });
  }
}
