import { Declare, SubCommand, type GuildCommandContext } from "seyfert";

import { formatReconcileReport, requireReactionRolesContext, runConfigure } from "./shared";

@Declare({
  name: "verify",
  description: "Check role messages for deleted roles and missing messages",
})
export default class ReactionRolesVerifyCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const report = await runConfigure(ctx, () => context.engine.verify(context.guildId));
    if (!report) return;

    const hint = report.issueCount ? "\nRun `/reactionroles cleanup` to fix them." : "";
    await ctx.editOrReply({ content: `${formatReconcileReport(report)}${hint}` });
  }
}
