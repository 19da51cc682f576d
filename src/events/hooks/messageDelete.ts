/**
 * Hooks for single and bulk message deletion.
 */
import type { ResolveEventParams } from "seyfert";

import { createEventHook } from "@/events/hooks/createEventHook";

export type MessageDeleteArgs = ResolveEventParams<"messageDelete">;

const deleteHook = createEventHook<MessageDeleteArgs>({
  name: "messageDelete",
});

export const onMessageDelete = deleteHook.on;
export const emitMessageDelete = deleteHook.emit;

export type MessageDeleteBulkArgs = ResolveEventParams<"messageDeleteBulk">;

const bulkHook = createEventHook<MessageDeleteBulkArgs>({
  name: "messageDeleteBulk",
});

export const onMessageDeleteBulk = bulkHook.on;
export const emitMessageDeleteBulk = bulkHook.emit;
