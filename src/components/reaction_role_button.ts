import { ComponentCommand, type ComponentContext } from "seyfert";

import { routeComponent } from "@/adapters/components";
import { isReactionRoleComponentId } from "@/modules/reaction-roles";

export default class ReactionRoleButton extends ComponentCommand {
  componentType = "Button" as const;

  // Prefix only: retired buttons still get an answer instead of a failed interaction.
  filter(ctx: ComponentContext<"Button">) {
    return isReactionRoleComponentId(ctx.customId);
  }

  async run(ctx: ComponentContext<"Button">) {
    await ctx.deferReply(true);
    const content = await routeComponent(ctx.client, {
      customId: ctx.customId,
      guildId: ctx.guildId,
      memberId: ctx.author.id,
      values: [],
    });
    await ctx.editOrReply({ content });
  }
}
