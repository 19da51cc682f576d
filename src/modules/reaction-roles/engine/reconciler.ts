/**
 * Reconciler: compares stored configuration with the live guild.
 *
 * - `verify` only reads.
 * - `cleanup` removes what `verify` flags; a second run changes nothing.
 * - `rebuild` pushes configuration back onto every message that still exists.
 *
 * A missing message is never deleted from configuration: it is marked
 * stale so `rebuild` or `clone` can bring it back.
 */
import { allBindingEntries } from "../domain/accessors";
import { pruneBindings, setStale } from "../domain/mutations";
import type {
  CleanupReport,
  MessageHealth,
  RebuildReport,
  ReconcileReport,
  RoleMessage,
} from "../domain/types";
import type { BindingStore } from "../data/store";
import type { EngineLogger } from "../logger";
import type { GuildRoleInfo, RolePlatform } from "../ports";
import type { DispatchRegistrar } from "./dispatch";
import type { MessagePublisher } from "./publisher";

export interface ReconcilerDeps {
  store: BindingStore;
  platform: RolePlatform;
  registrar: DispatchRegistrar;
  publisher: MessagePublisher;
  logger: EngineLogger;
  now: () => Date;
}

interface Presence {
  exists: boolean | null;
  /** Set when the message was found by scanning because no channel was stored. */
  locatedChannelId: string | null;
}

export class Reconciler {
  constructor(private readonly deps: ReconcilerDeps) {}

  private async presence(message: RoleMessage): Promise<Presence> {
    const { messages } = this.deps.platform;

    if (message.channelId) {
      return {
        exists: await messages.exists(message.channelId, message.messageId),
        locatedChannelId: null,
      };
    }

    try {
      const channelId = await messages.locate(message.guildId, message.messageId);
      return { exists: channelId !== null, locatedChannelId: channelId };
    } catch (error) {
      this.deps.logger.warn("[reaction-roles] message lookup failed", {
        guildId: message.guildId,
        messageId: message.messageId,
        error,
      });
      return { exists: null, locatedChannelId: null };
    }
  }

  private async botTopPosition(guildId: string): Promise<number | null> {
    try {
      return await this.deps.platform.guild.botHighestPosition(guildId);
    } catch (error) {
      this.deps.logger.warn("[reaction-roles] could not read bot role position", { guildId, error });
      return null;
    }
  }

  private inspect(
    message: RoleMessage,
    presence: Presence,
    roles: ReadonlyMap<string, GuildRoleInfo>,
    botTop: number | null,
  ): MessageHealth {
    const orphanedBindings = [];
    const unmanageable = new Set<string>();

    for (const { key, binding, categoryId } of allBindingEntries(message)) {
      const role = roles.get(binding.roleId);
      if (!role || binding.orphaned) {
        orphanedBindings.push({ key, roleId: binding.roleId, categoryId });
        continue;
      }
      if (role.managed || (botTop !== null && role.position >= botTop)) {
        unmanageable.add(role.id);
      }
    }

    const emptyCategories = message.categories
      .filter((category) =>
        category.bindings.every((binding) => binding.orphaned || !roles.has(binding.roleId)),
      )
      .map((category) => category.id);

    return {
      messageId: message.messageId,
      channelId: message.channelId,
      style: message.style,
      stale: message.stale,
      messageExists: presence.exists,
      locatedChannelId: presence.locatedChannelId,
      orphanedBindings,
      emptyCategories,
      unmanageableRoles: [...unmanageable],
    };
  }

  async verify(guildId: string): Promise<ReconcileReport> {
    const messages = this.deps.store.get(guildId);
    const roles = new Map(
      (await this.deps.platform.guild.listRoles(guildId)).map((role) => [role.id, role]),
    );
    const botTop = await this.botTopPosition(guildId);

    const report: ReconcileReport = { guildId, messages: [], issueCount: 0 };
    for (const message of messages) {
      const health = this.inspect(message, await this.presence(message), roles, botTop);
      report.messages.push(health);
      report.issueCount +=
        health.orphanedBindings.length +
        health.emptyCategories.length +
        (!health.stale && health.messageExists === false ? 1 : 0);
    }

    this.deps.logger.debug("[reaction-roles] verify finished", {
      guildId,
      messages: report.messages.length,
      issues: report.issueCount,
    });
    return report;
  }

  /** @throws PersistenceError when a repaired message cannot be written. */
  async cleanup(guildId: string): Promise<CleanupReport> {
    const { store, registrar, logger, now } = this.deps;
    const verified = await this.verify(guildId);
    const report: CleanupReport = {
      guildId,
      verified,
      removedBindings: 0,
      removedCategories: 0,
      markedStale: [],
      backfilledChannels: 0,
      changed: [],
    };

    for (const health of verified.messages) {
      const original = store.getMessage(guildId, health.messageId);
      if (!original) continue;

      const missingRoles = new Set(health.orphanedBindings.map((orphan) => orphan.roleId));
      const pruned = pruneBindings(original, missingRoles, now());
      let next = pruned.message;
      report.removedBindings += pruned.removedBindings;
      report.removedCategories += pruned.removedCategories;

      if (health.messageExists === false && !next.stale) {
        next = setStale(next, true, now());
        report.markedStale.push(next.messageId);
      }
      if (health.locatedChannelId && next.channelId !== health.locatedChannelId) {
        next = { ...next, channelId: health.locatedChannelId, updatedAt: now() };
        report.backfilledChannels += 1;
      }

      if (next === original) continue;

      const saved = await store.put(next);
      if (saved.isErr()) throw saved.error;

      if (next.stale) registrar.unregisterMessage(guildId, next.messageId);
      else registrar.registerMessage(next);
      report.changed.push(next.messageId);
    }

    logger.info("[reaction-roles] cleanup finished", {
      guildId,
      removedBindings: report.removedBindings,
      removedCategories: report.removedCategories,
      markedStale: report.markedStale.length,
    });
    return report;
  }

  /** @throws PersistenceError when a restored message cannot be written. */
  async rebuild(guildId: string): Promise<RebuildReport> {
    const { store, registrar, publisher, logger, now } = this.deps;
    const report: RebuildReport = { guildId, rebuilt: [], restored: [], skipped: [], failures: [] };

    for (const original of store.get(guildId)) {
      const presence = await this.presence(original);
      if (presence.exists !== true) {
        report.skipped.push({
          messageId: original.messageId,
          reason: presence.exists === null ? "lookup_failed" : "missing",
        });
        continue;
      }

      let next = original;
      if (next.stale) {
        next = setStale(next, false, now());
        report.restored.push(next.messageId);
      }
      if (presence.locatedChannelId && next.channelId !== presence.locatedChannelId) {
        next = { ...next, channelId: presence.locatedChannelId, updatedAt: now() };
      }
      if (next !== original) {
        const saved = await store.put(next);
        if (saved.isErr()) throw saved.error;
      }

      try {
        const failedReactions = await publisher.publish(next, { clear: true });
        if (failedReactions.length) {
          report.failures.push({
            messageId: next.messageId,
            error: `Could not add ${failedReactions.join(" ")}`,
          });
        } else {
          report.rebuilt.push(next.messageId);
        }
      } catch (error) {
        report.failures.push({
          messageId: next.messageId,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      registrar.registerMessage(next);
    }

    logger.info("[reaction-roles] rebuild finished", {
      guildId,
      rebuilt: report.rebuilt.length,
      restored: report.restored.length,
      skipped: report.skipped.length,
      failed: report.failures.length,
    });
    return report;
  }
}
