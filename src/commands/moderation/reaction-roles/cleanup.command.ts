import { Declare, SubCommand, type GuildCommandContext } from "seyfert";

import { formatCleanupReport, requireReactionRolesContext, runConfigure } from "./shared";

@Declare({
  name: "cleanup",
  description: "Remove deleted roles and mark missing messages as stale",
})
export default class ReactionRolesCleanupCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const report = await runConfigure(ctx, () => context.engine.cleanup(context.guildId));
    if (!report) return;

    ctx.client.logger.info("[reaction-roles] cleanup finished", {
      guildId: context.guildId,
      actorId: ctx.author.id,
      changed: report.changed.length,
    });
    await ctx.editOrReply({ content: formatCleanupReport(report) });
  }
}
