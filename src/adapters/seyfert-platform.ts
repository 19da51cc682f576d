/**
 * RolePlatform on top of a seyfert client.
 *
 * Every REST failure is classified into a PlatformError code; role mutations
 * report `forbidden` / `not_found` as statuses instead of throwing.
 */
import type { UsingClient } from "seyfert";
import { ChannelType } from "seyfert/lib/types";
import {
  PlatformError,
  type GuildRoleInfo,
  type PlatformErrorCode,
  type RoleMutationStatus,
  type RolePlatform,
} from "@/modules/reaction-roles";
import { renderRoleMessage } from "./seyfert";

// Discord JSON error codes.
const FORBIDDEN_CODES = new Set([50001, 50013]);
const NOT_FOUND_CODES = new Set([10003, 10007, 10008, 10011, 10013, 10014]);

const SEARCHABLE_CHANNELS = new Set<number>([
  ChannelType.GuildText,
  ChannelType.GuildAnnouncement,
]);

function numericProp(error: object, key: string): number | null {
  const value: unknown = Reflect.get(error, key);
  return typeof value === "number" ? value : null;
}

export function classifyError(error: unknown): PlatformErrorCode {
  if (error instanceof PlatformError) return error.code;
  if (typeof error !== "object" || error === null) return "unknown";

  const code = numericProp(error, "code");
  const status = numericProp(error, "status");
  if ((code !== null && FORBIDDEN_CODES.has(code)) || status === 403) return "forbidden";
  if ((code !== null && NOT_FOUND_CODES.has(code)) || status === 404) return "not_found";

  const message = error instanceof Error ? error.message : "";
  if (/Missing (Permissions|Access)|\b403\b/.test(message)) return "forbidden";
  if (/Unknown (Role|Member|Message|Channel|Emoji|User)|\b404\b/.test(message)) return "not_found";
  return "unknown";
}

function wrap(error: unknown, message: string): PlatformError {
  if (error instanceof PlatformError) return error;
  return new PlatformError(classifyError(error), message, { cause: error });
}

function mutationStatus(error: unknown): RoleMutationStatus {
  const code = classifyError(error);
  if (code === "unknown") throw wrap(error, "Role update failed.");
  return code;
}

export function createSeyfertPlatform(client: UsingClient): RolePlatform {
  return {
    roles: {
      async addRole(guildId, memberId, roleId) {
        try {
          await client.members.addRole(guildId, memberId, roleId);
          return "ok";
        } catch (error) {
          return mutationStatus(error);
        }
      },
      async removeRole(guildId, memberId, roleId) {
        try {
          await client.members.removeRole(guildId, memberId, roleId);
          return "ok";
        } catch (error) {
          return mutationStatus(error);
        }
      },
    },

    members: {
      async fetchRoles(guildId, memberId) {
        try {
          const member = await client.members.fetch(guildId, memberId, true);
          return [...member.roles.keys];
        } catch (error) {
          if (classifyError(error) === "not_found") return null;
          throw wrap(error, `Failed to fetch member ${memberId}.`);
        }
      },
    },

    guild: {
      async listRoles(guildId): Promise<GuildRoleInfo[]> {
        try {
          const roles = await client.roles.list(guildId, true);
          return roles.map((role) => ({
            id: role.id,
            name: role.name,
            position: role.position,
            managed: role.managed,
          }));
        } catch (error) {
          throw wrap(error, `Failed to list roles of ${guildId}.`);
        }
      },
      async botHighestPosition(guildId) {
        try {
          const me = await client.members.fetch(guildId, client.botId, true);
          const highest = await me.roles.highest(true);
          return highest?.position ?? 0;
        } catch (error) {
          throw wrap(error, "Failed to read my highest role.");
        }
      },
    },

    messages: {
      async exists(channelId, messageId) {
        try {
          await client.messages.fetch(messageId, channelId, true);
          return true;
        } catch (error) {
          return classifyError(error) === "not_found" ? false : null;
        }
      },
      async locate(guildId, messageId) {
        const channels = await client.guilds.channels.list(guildId, true);
        for (const channel of channels) {
          if (!SEARCHABLE_CHANNELS.has(channel.type)) continue;
          const found = await client.messages
            .fetch(messageId, channel.id, true)
            .then(() => true)
            .catch(() => false);
          if (found) return channel.id;
        }
        return null;
      },
      async create(channelId, view) {
        try {
          const created = await client.messages.write(channelId, renderRoleMessage(view));
          return created.id;
        } catch (error) {
          throw wrap(error, `Failed to post in ${channelId}.`);
        }
      },
      async edit(channelId, messageId, view) {
        try {
          await client.messages.edit(messageId, channelId, renderRoleMessage(view));
        } catch (error) {
          throw wrap(error, `Failed to edit message ${messageId}.`);
        }
      },
      async addReaction(channelId, messageId, emoji) {
        try {
          await client.reactions.add(messageId, channelId, emoji);
        } catch (error) {
          throw wrap(error, `Failed to react with ${emoji}.`);
        }
      },
      async clearReactions(channelId, messageId, emoji) {
        try {
          await client.reactions.purge(messageId, channelId, emoji);
        } catch (error) {
          throw wrap(error, `Failed to clear reactions on ${messageId}.`);
        }
      },
      async removeUserReaction(channelId, messageId, emoji, userId) {
        try {
          await client.reactions.delete(messageId, channelId, emoji, userId);
        } catch (error) {
          throw wrap(error, `Failed to remove reaction of ${userId}.`);
        }
      },
    },

    users: {
      async sendDirect(userId, content) {
        try {
          await client.users.write(userId, { content });
          return true;
        } catch (error) {
          client.logger.debug("[reaction-roles] direct message refused", { userId, error });
          return false;
        }
      },
    },
  };
}
