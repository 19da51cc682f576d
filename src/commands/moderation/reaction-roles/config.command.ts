import {
  createBooleanOption,
  Declare,
  Options,
  SubCommand,
  type GuildCommandContext,
} from "seyfert";

import { configStore, ConfigurableModule } from "@/configuration";
import type { ReactionRolesConfig } from "@/modules/reaction-roles";

import { requireReactionRolesContext, runConfigure } from "./shared";

const options = {
  enabled: createBooleanOption({ description: "Hand out roles in this server", required: false }),
  remove_reaction: createBooleanOption({
    description: "Take back a reaction the member is not allowed to use",
    required: false,
  }),
  notify: createBooleanOption({
    description: "Tell members by direct message why a reaction was refused",
    required: false,
  }),
};

const onOff = (value: boolean) => (value ? "on" : "off");

@Declare({
  name: "config",
  description: "Show or change reaction role settings for this server",
})
@Options(options)
export default class ReactionRolesConfigCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    await ctx.deferReply(true);
    const context = await requireReactionRolesContext(ctx);
    if (!context) return;

    const changes: Partial<ReactionRolesConfig> = {};
    if (ctx.options.enabled !== undefined) changes.enabled = ctx.options.enabled;
    if (ctx.options.remove_reaction !== undefined) {
      changes.removeReactionOnReject = ctx.options.remove_reaction;
    }
    if (ctx.options.notify !== undefined) changes.notifyOnReject = ctx.options.notify;

    const config = await runConfigure(ctx, () =>
      Object.keys(changes).length
        ? configStore.set(context.guildId, ConfigurableModule.ReactionRoles, changes)
        : configStore.get(context.guildId, ConfigurableModule.ReactionRoles),
    );
    if (!config) return;

    await ctx.editOrReply({
      content: [
        `Enabled: ${onOff(config.enabled)}`,
        `Remove refused reactions: ${onOff(config.removeReactionOnReject)}`,
        `Direct message on refusal: ${onOff(config.notifyOnReject)}`,
      ].join("\n"),
    });
  }
}
