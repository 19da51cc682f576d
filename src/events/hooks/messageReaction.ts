/**
 * Hooks for reaction add/remove gateway events.
 */
import type { ResolveEventParams } from "seyfert";

import { createEventHook } from "@/events/hooks/createEventHook";

export type MessageReactionAddArgs = ResolveEventParams<"messageReactionAdd">;

const reactionAddHook = createEventHook<MessageReactionAddArgs>({
  name: "messageReactionAdd",
});

export const onMessageReactionAdd = reactionAddHook.on;
export const emitMessageReactionAdd = reactionAddHook.emit;

export type MessageReactionRemoveArgs = ResolveEventParams<"messageReactionRemove">;

const reactionRemoveHook = createEventHook<MessageReactionRemoveArgs>({
  name: "messageReactionRemove",
});

export const onMessageReactionRemove = reactionRemoveHook.on;
export const emitMessageReactionRemove = reactionRemoveHook.emit;
