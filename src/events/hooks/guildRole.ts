import type { ResolveEventParams } from "seyfert";

import { createEventHook } from "@/events/hooks/createEventHook";

export type GuildRoleDeleteArgs = ResolveEventParams<"guildRoleDelete">;

const roleDeleteHook = createEventHook<GuildRoleDeleteArgs>({
  name: "guildRoleDelete",
});

export const onGuildRoleDelete = roleDeleteHook.on;
export const emitGuildRoleDelete = roleDeleteHook.emit;
