/**
 * What the engine needs from the chat platform. The seyfert implementation
 * lives in src/adapters/seyfert-platform.ts; tests use an in-process fake.
 */
import type { RoleMessageView } from "./views";

export type RoleMutationStatus = "ok" | "forbidden" | "not_found";

export interface GuildRoleInfo {
  id: string;
  name: string;
  position: number;
  /** Integration or booster roles; the bot can never assign them. */
  managed: boolean;
}

export interface RolePort {
  addRole(guildId: string, memberId: string, roleId: string): Promise<RoleMutationStatus>;
  removeRole(guildId: string, memberId: string, roleId: string): Promise<RoleMutationStatus>;
}

export interface MemberPort {
  /** Live role ids of the member; null when the member is not in the guild. */
  fetchRoles(guildId: string, memberId: string): Promise<string[] | null>;
}

export interface GuildPort {
  listRoles(guildId: string): Promise<GuildRoleInfo[]>;
  botHighestPosition(guildId: string): Promise<number>;
}

export interface MessagePort {
  /** null when the lookup itself failed (as opposed to a missing message). */
  exists(channelId: string, messageId: string): Promise<boolean | null>;
  /** Scans the guild's text channels; resolves the channel holding the message. */
  locate(guildId: string, messageId: string): Promise<string | null>;
  /** Posts a new message and resolves its id. */
  create(channelId: string, view: RoleMessageView): Promise<string>;
  edit(channelId: string, messageId: string, view: RoleMessageView): Promise<void>;
  addReaction(channelId: string, messageId: string, emoji: string): Promise<void>;
  /** Every reaction of the message, or only those of `emoji`. */
  clearReactions(channelId: string, messageId: string, emoji?: string): Promise<void>;
  removeUserReaction(
    channelId: string,
    messageId: string,
    emoji: string,
    userId: string,
  ): Promise<void>;
}

export interface UserPort {
  /** false when the user does not accept direct messages. */
  sendDirect(userId: string, content: string): Promise<boolean>;
}

export interface RolePlatform {
  roles: RolePort;
  members: MemberPort;
  guild: GuildPort;
  messages: MessagePort;
  users: UserPort;
}
