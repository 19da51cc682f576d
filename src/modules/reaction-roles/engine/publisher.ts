/**
 * Keeps the platform message of a RoleMessage in line with its configuration:
 * reactions for the reaction style, the rendered view for buttons and menus.
 */
import { activeBindingEntries, reactionEmoji } from "../domain/accessors";
import type { RoleMessage } from "../domain/types";
import { PlatformError } from "../errors";
import type { EngineLogger } from "../logger";
import type { RolePlatform } from "../ports";
import { buildRoleMessageView, type RoleMessageView } from "../views";

export const toPlatformError = (error: unknown, fallback: string): PlatformError =>
  error instanceof PlatformError ? error : new PlatformError("unknown", fallback, { cause: error });

export class MessagePublisher {
  constructor(
    private readonly platform: RolePlatform,
    private readonly logger: EngineLogger,
  ) {}

  /** Role id to name for the guild; empty when the lookup fails. */
  async roleNames(guildId: string): Promise<Map<string, string>> {
    try {
      const roles = await this.platform.guild.listRoles(guildId);
      return new Map(roles.map((role) => [role.id, role.name]));
    } catch (error) {
      this.logger.warn("[reaction-roles] could not list roles for rendering", { guildId, error });
      return new Map();
    }
  }

  async view(message: RoleMessage): Promise<RoleMessageView> {
    return buildRoleMessageView(message, await this.roleNames(message.guildId));
  }

  /** Stored channel, or the one found by scanning the guild; null when not found. */
  async channelFor(message: RoleMessage): Promise<string | null> {
    if (message.channelId) return message.channelId;
    return this.platform.messages.locate(message.guildId, message.messageId);
  }

  /**
   * Pushes the configuration to the platform message: the rendered view,
   * then the reactions for the reaction style. With `clear`, existing
   * reactions are wiped first so removed triggers disappear too.
   * Reaction failures are per emoji and do not stop the others.
   *
   * @returns Emoji that could not be added.
   * @throws PlatformError when the message cannot be located or edited.
   */
  async publish(message: RoleMessage, options: { clear?: boolean } = {}): Promise<string[]> {
    const channelId = await this.channelFor(message).catch((error: unknown) => {
      throw toPlatformError(error, `Failed to locate message ${message.messageId}.`);
    });
    if (!channelId) {
      throw new PlatformError("not_found", `Message ${message.messageId} was not found.`);
    }

    try {
      await this.platform.messages.edit(channelId, message.messageId, await this.view(message));
    } catch (error) {
      throw toPlatformError(error, `Failed to update message ${message.messageId}.`);
    }
    if (message.style !== "reaction") return [];

    if (options.clear) {
      try {
        await this.platform.messages.clearReactions(channelId, message.messageId);
      } catch (error) {
        throw toPlatformError(error, `Failed to clear reactions on ${message.messageId}.`);
      }
    }

    const failed: string[] = [];
    for (const { key, binding } of activeBindingEntries(message)) {
      const emoji = reactionEmoji(key, binding.emoji);
      try {
        await this.platform.messages.addReaction(channelId, message.messageId, emoji);
      } catch (error) {
        failed.push(emoji);
        this.logger.warn("[reaction-roles] failed to add reaction", {
          messageId: message.messageId,
          emoji,
          error,
        });
      }
    }
    return failed;
  }
}
