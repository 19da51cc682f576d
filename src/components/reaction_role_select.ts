import { ComponentCommand, type ComponentContext } from "seyfert";

import { routeComponent } from "@/adapters/components";
import { isReactionRoleComponentId } from "@/modules/reaction-roles";

export default class ReactionRoleSelect extends ComponentCommand {
  componentType = "StringSelect" as const;

  filter(ctx: ComponentContext<"StringSelect">) {
    return isReactionRoleComponentId(ctx.customId);
  }

  async run(ctx: ComponentContext<"StringSelect">) {
    await ctx.deferReply(true);
    const content = await routeComponent(ctx.client, {
      customId: ctx.customId,
      guildId: ctx.guildId,
      memberId: ctx.author.id,
      values: ctx.interaction.values,
    });
    await ctx.editOrReply({ content });
  }
}
