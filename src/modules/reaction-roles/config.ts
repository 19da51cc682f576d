/**
 * Per-guild switches for reaction roles.
 *
 * - `enabled`: listeners and component routers ignore the guild when false.
 * - `removeReactionOnReject`: take the member's reaction back when a gate
 *   rejects it, so the message keeps showing what they actually hold.
 * - `notifyOnReject`: explain rejections by direct message (reaction style;
 *   buttons and menus answer ephemerally anyway).
 */
import { defineConfig, z } from "@/configuration/definitions";
import { ConfigurableModule } from "@/configuration/constants";

const reactionRolesSchema = z
  .object({
    enabled: z.boolean().default(true),
    removeReactionOnReject: z.boolean().default(true),
    notifyOnReject: z.boolean().default(true),
  })
  .default({});

export type ReactionRolesConfig = z.infer<typeof reactionRolesSchema>;

declare module "@/configuration/definitions" {
  export interface ConfigDefinitions {
    [ConfigurableModule.ReactionRoles]: ReactionRolesConfig;
  }
}

export const reactionRolesConfig = defineConfig(
  ConfigurableModule.ReactionRoles,
  reactionRolesSchema,
  { path: "reactionRoles" },
);
