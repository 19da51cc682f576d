/**
 * Shared path of the reaction role button and menu handlers: guild switch,
 * route lookup, activation, reply text.
 */
import { configStore, ConfigurableModule } from "@/configuration";
import {
  decodeComponentId,
  describeActivation,
  describeRejection,
  type EngineLogger,
  type ReactionRoleEngine,
} from "@/modules/reaction-roles";

/** The slice of the seyfert client the routers use. */
export interface ComponentRouterDeps {
  reactionRoles: ReactionRoleEngine;
  logger: EngineLogger;
}

export interface ComponentActivation {
  customId: string;
  guildId: string | undefined;
  memberId: string;
  values: string[];
}

export async function routeComponent(
  client: ComponentRouterDeps,
  input: ComponentActivation,
): Promise<string> {
  const target = decodeComponentId(input.customId);
  const guildId = input.guildId;
  if (!guildId || !target || target.guildId !== guildId) {
    return describeRejection("missing_binding", null);
  }

  const engine = client.reactionRoles;
  try {
    const config = await configStore.get(guildId, ConfigurableModule.ReactionRoles);
    if (!config.enabled) return "Reaction roles are disabled in this server.";

    const report = await engine.registrar.dispatch({ ...input, guildId });
    if (!report) return describeRejection("missing_binding", null);
    return describeActivation(report, engine.getRoleMessage(guildId, target.messageId));
  } catch (error) {
    client.logger.error("[reaction-roles] component activation failed", {
      guildId,
      customId: input.customId,
      memberId: input.memberId,
      error,
    });
    return "Something went wrong while updating your roles. Try again later.";
  }
}
