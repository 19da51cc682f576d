/**
 * Reaction roles listeners: translate gateway payloads into engine calls.
 *
 * Reaction add/remove drive reaction-style messages. Message and role
 * deletions keep stored configuration in step with the guild. Buttons and
 * menus are routed by the component handlers in src/components.
 */
import { z } from "zod";

import { configStore, ConfigurableModule } from "@/configuration";
import { onGuildRoleDelete } from "@/events/hooks/guildRole";
import { onMessageDelete, onMessageDeleteBulk } from "@/events/hooks/messageDelete";
import {
  onMessageReactionAdd,
  onMessageReactionRemove,
} from "@/events/hooks/messageReaction";
import {
  describeRejection,
  type EngineLogger,
  messageLink,
  normalizeTriggerKey,
  type ReactionRoleEngine,
  type ReactionRolesConfig,
  type RoleMessage,
} from "@/modules/reaction-roles";

/** The slice of the seyfert client these listeners use. */
export interface ReactionListenerDeps {
  botId: string;
  reactionRoles: ReactionRoleEngine;
  logger: EngineLogger;
}

const ReactionPayloadSchema = z.object({
  guildId: z.string().optional(),
  channelId: z.string(),
  messageId: z.string(),
  userId: z.string(),
  emoji: z.object({
    id: z.string().nullish(),
    name: z.string().nullish(),
  }),
  member: z
    .object({ user: z.object({ bot: z.boolean().optional() }).optional() })
    .optional(),
});

type ReactionPayload = z.infer<typeof ReactionPayloadSchema>;

const MessageDeletePayloadSchema = z.object({
  id: z.string(),
  guildId: z.string().optional(),
});

const BulkDeletePayloadSchema = z.object({
  ids: z.array(z.string()),
  guildId: z.string().optional(),
});

// Cached roles carry `id`; uncached deletions only the raw `roleId`.
const RoleDeletePayloadSchema = z.object({
  guildId: z.string(),
  id: z.string().optional(),
  roleId: z.string().optional(),
});

const SUPPRESS_WINDOW_MS = 30_000;

/**
 * Rejected reactions the bot just took back, with their expiry time. The
 * member may already hold the role, so the removal event must not reach the
 * engine as a deselect. Only reactions seen in an add event are recorded.
 */
const withdrawn = new Map<string, number>();

function consumeWithdrawn(id: string, now: number): boolean {
  for (const [entry, expiresAt] of withdrawn) {
    if (expiresAt <= now) withdrawn.delete(entry);
  }
  return withdrawn.delete(id);
}

const reactionId = (messageId: string, key: string, userId: string) =>
  `${messageId}:${key}:${userId}`;

async function enabledConfig(guildId: string): Promise<ReactionRolesConfig | null> {
  const config = await configStore.get(guildId, ConfigurableModule.ReactionRoles);
  return config.enabled ? config : null;
}

function reactionMessage(client: ReactionListenerDeps, payload: ReactionPayload): RoleMessage | null {
  if (!payload.guildId || payload.userId === client.botId) return null;
  if (payload.member?.user?.bot) return null;

  const message = client.reactionRoles.getRoleMessage(payload.guildId, payload.messageId);
  return message?.style === "reaction" ? message : null;
}

async function withdrawReaction(
  client: ReactionListenerDeps,
  target: { channelId: string; messageId: string; key: string; emoji: string },
  userId: string,
  options: { suppressRemoval?: boolean } = {},
): Promise<void> {
  const id = reactionId(target.messageId, target.key, userId);
  if (options.suppressRemoval) withdrawn.set(id, Date.now() + SUPPRESS_WINDOW_MS);
  try {
    await client.reactionRoles.platform.messages.removeUserReaction(
      target.channelId,
      target.messageId,
      target.emoji,
      userId,
    );
  } catch (error) {
    withdrawn.delete(id);
    client.logger.warn("[reaction-roles] could not withdraw reaction", {
      messageId: target.messageId,
      userId,
      error,
    });
  }
}

/**
 * Takes back the member's reactions for roles the engine just removed
 * (unique siblings, exclusive conflicts), so reactions mirror held roles.
 * The removal events that follow reach the engine as deselects of roles
 * already gone, which change nothing.
 */
async function withdrawRemovedReactions(
  client: ReactionListenerDeps,
  guildId: string,
  userId: string,
  removed: readonly string[],
): Promise<void> {
  if (!removed.length) return;
  const roles = new Set(removed);

  for (const message of client.reactionRoles.list(guildId)) {
    if (message.style !== "reaction" || message.stale || !message.channelId) continue;

    for (const [key, binding] of Object.entries(message.triggers)) {
      if (binding.orphaned || !roles.has(binding.roleId)) continue;
      await withdrawReaction(
        client,
        {
          channelId: message.channelId,
          messageId: message.messageId,
          key,
          emoji: binding.emoji ?? key,
        },
        userId,
      );
    }
  }
}

export async function handleReactionAdd(
  client: ReactionListenerDeps,
  payload: unknown,
): Promise<void> {
  const parsed = ReactionPayloadSchema.safeParse(payload);
  if (!parsed.success) return;

  const reaction = parsed.data;
  const message = reactionMessage(client, reaction);
  if (!message) return;

  const config = await enabledConfig(message.guildId);
  if (!config) return;

  const key = normalizeTriggerKey(reaction.emoji);
  const report = await client.reactionRoles.onTriggerSelected(
    message.guildId,
    message.messageId,
    key,
    reaction.userId,
  );

  if (report.status === "applied") {
    const removed = report.removed.filter(
      (roleId) => roleId !== message.triggers[key]?.roleId,
    );
    await withdrawRemovedReactions(client, message.guildId, reaction.userId, removed);
    return;
  }

  if (report.status !== "rejected" || report.reason === "missing_binding") return;

  if (config.removeReactionOnReject) {
    await withdrawReaction(
      client,
      {
        channelId: reaction.channelId,
        messageId: reaction.messageId,
        key,
        emoji: message.triggers[key]?.emoji ?? key,
      },
      reaction.userId,
      { suppressRemoval: true },
    );
  }

  if (config.notifyOnReject) {
    const link = messageLink(message.guildId, reaction.channelId, message.messageId);
    await client.reactionRoles.platform.users.sendDirect(
      reaction.userId,
      `${describeRejection(report.reason, message)}\n${link}`,
    );
  }
}

export async function handleReactionRemove(
  client: ReactionListenerDeps,
  payload: unknown,
): Promise<void> {
  const parsed = ReactionPayloadSchema.safeParse(payload);
  if (!parsed.success) return;

  const reaction = parsed.data;
  const key = normalizeTriggerKey(reaction.emoji);
  if (consumeWithdrawn(reactionId(reaction.messageId, key, reaction.userId), Date.now())) return;

  const message = reactionMessage(client, reaction);
  if (!message) return;
  if (!(await enabledConfig(message.guildId))) return;

  await client.reactionRoles.onTriggerDeselected(
    message.guildId,
    message.messageId,
    key,
    reaction.userId,
  );
}

onMessageReactionAdd((payload, client) => handleReactionAdd(client, payload));
onMessageReactionRemove((payload, client) => handleReactionRemove(client, payload));

onMessageDelete(async (payload, client) => {
  const parsed = MessageDeletePayloadSchema.safeParse(payload);
  if (!parsed.success || !parsed.data.guildId) return;

  await client.reactionRoles.markMessageDeleted(parsed.data.guildId, parsed.data.id);
});

onMessageDeleteBulk(async (payload, client) => {
  const parsed = BulkDeletePayloadSchema.safeParse(payload);
  if (!parsed.success || !parsed.data.guildId) return;

  const { guildId, ids } = parsed.data;
  for (const id of ids) {
    await client.reactionRoles.markMessageDeleted(guildId, id);
  }
});

onGuildRoleDelete(async (payload, client) => {
  const parsed = RoleDeletePayloadSchema.safeParse(payload);
  if (!parsed.success) return;

  const roleId = parsed.data.roleId ?? parsed.data.id;
  if (!roleId) return;
  await client.reactionRoles.markRoleDeleted(parsed.data.guildId, roleId);
});
