/**
 * In-process stand-ins for the chat platform and fixtures shared by the
 * reaction roles tests.
 */
import {
  CachedBindingStore,
  MemoryRoleMessageBackend,
  ReactionRoleEngine,
  type Binding,
  type BindingMode,
  type EngineLogger,
  type GuildPort,
  type GuildRoleInfo,
  type MemberPort,
  type MessagePort,
  type RoleMessage,
  type RoleMessageStyle,
  type RoleMessageView,
  type RolePlatform,
  type RolePort,
  type UserPort,
} from "@/modules/reaction-roles";
import { createRoleMessageDoc } from "@/modules/reaction-roles/domain/mutations";

export const GUILD = "guild-1";
export const CHANNEL = "channel-1";
export const MEMBER = "member-1";
export const FIXED_NOW = new Date("2024-05-01T12:00:00.000Z");

export const silentLogger: EngineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function binding(
  roleId: string,
  mode: BindingMode = "normal",
  extra: Partial<Binding> = {},
): Binding {
  return {
    roleId,
    mode,
    label: null,
    emoji: null,
    description: null,
    orphaned: false,
    ...extra,
  };
}

export function roleMessage(
  messageId: string,
  style: RoleMessageStyle,
  patch: Partial<RoleMessage> = {},
): RoleMessage {
  const base = createRoleMessageDoc(
    { guildId: GUILD, messageId, channelId: CHANNEL, style },
    FIXED_NOW,
  );
  return { ...base, ...patch };
}

/** Reaction message whose trigger keys are the given emoji. */
export function reactionMessage(
  messageId: string,
  triggers: Record<string, Binding>,
  patch: Partial<RoleMessage> = {},
): RoleMessage {
  const withEmoji: Record<string, Binding> = {};
  for (const [key, entry] of Object.entries(triggers)) {
    withEmoji[key] = { ...entry, emoji: entry.emoji ?? key };
  }
  return roleMessage(messageId, "reaction", { triggers: withEmoji, ...patch });
}

export interface EditCall {
  channelId: string;
  messageId: string;
  view: RoleMessageView;
}

export class FakePlatform implements RolePlatform {
  readonly memberRoles = new Map<string, Set<string>>();
  readonly guildRoles = new Map<string, GuildRoleInfo>();
  /** messageId -> channelId of every message that exists. */
  readonly posted = new Map<string, string>();
  readonly edits: EditCall[] = [];
  readonly reactions: string[] = [];
  readonly cleared: string[] = [];
  readonly removedReactions: string[] = [];
  readonly directMessages: { userId: string; content: string }[] = [];
  readonly roleCalls: string[] = [];
  readonly forbiddenRoles = new Set<string>();
  readonly failingEmoji = new Set<string>();
  botTop = 50;
  listRolesFails = false;
  private created = 0;

  member(memberId: string, roles: string[] = []): this {
    this.memberRoles.set(memberId, new Set(roles));
    return this;
  }

  role(id: string, position = 1, managed = false): this {
    this.guildRoles.set(id, { id, name: id.toUpperCase(), position, managed });
    return this;
  }

  held(memberId: string = MEMBER): string[] {
    return [...(this.memberRoles.get(memberId) ?? [])].sort();
  }

  roles: RolePort = {
    addRole: async (_guildId, memberId, roleId) => {
      this.roleCalls.push(`add:${roleId}`);
      if (this.forbiddenRoles.has(roleId)) return "forbidden";
      const held = this.memberRoles.get(memberId);
      if (!held) return "not_found";
      held.add(roleId);
      return "ok";
    },
    removeRole: async (_guildId, memberId, roleId) => {
      this.roleCalls.push(`remove:${roleId}`);
      if (this.forbiddenRoles.has(roleId)) return "forbidden";
      const held = this.memberRoles.get(memberId);
      if (!held) return "not_found";
      held.delete(roleId);
      return "ok";
    },
  };

  members: MemberPort = {
    fetchRoles: async (_guildId, memberId) => {
      const held = this.memberRoles.get(memberId);
      return held ? [...held] : null;
    },
  };

  guild: GuildPort = {
    listRoles: async () => {
      if (this.listRolesFails) throw new Error("roles unavailable");
      return [...this.guildRoles.values()];
    },
    botHighestPosition: async () => this.botTop,
  };

  messages: MessagePort = {
    exists: async (channelId, messageId) => this.posted.get(messageId) === channelId,
    locate: async (_guildId, messageId) => this.posted.get(messageId) ?? null,
    create: async (channelId) => {
      this.created += 1;
      const messageId = `posted-${this.created}`;
      this.posted.set(messageId, channelId);
      return messageId;
    },
    edit: async (channelId, messageId, view) => {
      if (this.posted.get(messageId) !== channelId) throw new Error("Unknown Message");
      this.edits.push({ channelId, messageId, view });
    },
    addReaction: async (_channelId, messageId, emoji) => {
      if (this.failingEmoji.has(emoji)) throw new Error("Unknown Emoji");
      this.reactions.push(`${messageId}:${emoji}`);
    },
    clearReactions: async (_channelId, messageId) => {
      this.cleared.push(messageId);
    },
    removeUserReaction: async (_channelId, messageId, emoji, userId) => {
      this.removedReactions.push(`${messageId}:${emoji}:${userId}`);
    },
  };

  users: UserPort = {
    sendDirect: async (userId, content) => {
      this.directMessages.push({ userId, content });
      return true;
    },
  };
}

/**
 * Engine over a FakePlatform and a memory backend holding `initial`. Every
 * initial message exists on the platform in CHANNEL; the member exists with
 * no roles and the roles fire, water and chess sit below the bot, admin above.
 */
export async function setupEngine(initial: RoleMessage[] = []) {
  const platform = new FakePlatform()
    .member(MEMBER)
    .role("fire", 1)
    .role("water", 2)
    .role("chess", 3)
    .role("admin", 60);
  for (const message of initial) platform.posted.set(message.messageId, CHANNEL);

  const backend = new MemoryRoleMessageBackend(initial);
  const store = new CachedBindingStore(backend, silentLogger);
  await store.load();

  const engine = new ReactionRoleEngine({
    store,
    platform,
    logger: silentLogger,
    now: () => FIXED_NOW,
  });
  engine.registerAll();
  return { platform, backend, store, engine };
}
