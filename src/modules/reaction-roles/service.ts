/**
 * Reaction roles engine facade.
 *
 * Entry point for everything outside the module: platform events call the
 * activation methods, slash commands call the configuration and
 * reconciliation methods, and the bootstrap calls `load` + `registerAll`
 * before the gateway connects.
 *
 * Activation flow: stored RoleMessage -> fresh member roles -> resolver ->
 * one platform call per role. No locks: correctness rests on idempotent role
 * calls and a freshly fetched role set per activation.
 */
import { activeBindingEntries, findCategory } from "./domain/accessors";
import { normalizeTriggerKey, parseEmoji, slugifyCategoryId } from "./domain/keys";
import {
  addCategory,
  addMenuBinding,
  addTrigger,
  cloneRoleMessage,
  createRoleMessageDoc,
  orphanRole,
  removeCategory,
  removeMenuBinding,
  removeTrigger,
  setStale,
  updateDisplay,
  updateSettings,
  type BindingInput,
  type CategoryInput,
} from "./domain/mutations";
import { ROLE_MESSAGE_VERSION } from "./domain/constants";
import type {
  ActivationReport,
  BindingMode,
  CleanupReport,
  ExportSnapshot,
  Outcome,
  RebuildReport,
  ReconcileReport,
  RoleMessage,
  RoleMessageDisplay,
  RoleMessageStyle,
} from "./domain/types";
import type { CachedBindingStore, FlushReport } from "./data/store";
import { ConfigurationError, type PlatformError } from "./errors";
import { type ComponentIdentity, DispatchRegistrar } from "./engine/dispatch";
import { MessagePublisher, toPlatformError } from "./engine/publisher";
import { Reconciler } from "./engine/reconciler";
import { resolve, resolveMenuSelection } from "./engine/resolver";
import { applyMutationPlan } from "./engine/roleOps";
import { createDefaultLogger, type EngineLogger } from "./logger";
import type { RolePlatform } from "./ports";

export interface ReactionRoleEngineOptions {
  store: CachedBindingStore;
  platform: RolePlatform;
  logger?: EngineLogger;
  now?: () => Date;
}

export interface CreateRoleMessageInput {
  guildId: string;
  channelId: string;
  style: RoleMessageStyle;
  title?: string;
  description?: string;
  color?: number | null;
}

export interface AddBindingInput {
  roleId: string;
  mode?: BindingMode;
  emoji?: string | null;
  label?: string | null;
  description?: string | null;
}

export interface SettingsUpdate {
  maxRoles?: number | null;
  addRequiredRole?: string;
  removeRequiredRole?: string;
  clearRequiredRoles?: boolean;
}

/** A stored configuration change plus what happened on the platform message. */
export interface ConfigureResult {
  message: RoleMessage;
  /** Set when the configuration was saved but the message could not be updated. */
  refreshError: PlatformError | null;
  /** Reactions the platform refused (unknown emoji, missing permission). */
  failedReactions: string[];
}

export class ReactionRoleEngine {
  readonly registrar: DispatchRegistrar;
  private readonly reconciler: Reconciler;
  private readonly publisher: MessagePublisher;
  private readonly store: CachedBindingStore;
  readonly platform: RolePlatform;
  private readonly logger: EngineLogger;
  private readonly now: () => Date;

  constructor(options: ReactionRoleEngineOptions) {
    this.store = options.store;
    this.platform = options.platform;
    this.logger = options.logger ?? createDefaultLogger();
    this.now = options.now ?? (() => new Date());

    this.registrar = new DispatchRegistrar((identity) => this.componentHandler(identity));
    this.publisher = new MessagePublisher(this.platform, this.logger);
    this.reconciler = new Reconciler({
      store: this.store,
      platform: this.platform,
      registrar: this.registrar,
      publisher: this.publisher,
      logger: this.logger,
      now: this.now,
    });
  }

  /* ------------------------------------------------------------------ */
  /* Startup                                                            */
  /* ------------------------------------------------------------------ */

  /** Registers a route for every stored button and menu. */
  registerAll(): number {
    const count = this.registrar.registerAll(this.store.all());
    this.logger.info("[reaction-roles] registered component routes", { count });
    return count;
  }

  flush(): Promise<FlushReport> {
    return this.store.flush();
  }

  private componentHandler(identity: ComponentIdentity) {
    return (interaction: { memberId: string; values: string[] }) =>
      identity.kind === "button"
        ? this.onTriggerSelected(identity.guildId, identity.messageId, identity.key, interaction.memberId)
        : this.onMenuSelectionChanged(
            identity.guildId,
            identity.messageId,
            identity.key,
            interaction.memberId,
            interaction.values,
          );
  }

  /* ------------------------------------------------------------------ */
  /* Activation                                                         */
  /* ------------------------------------------------------------------ */

  onTriggerSelected(
    guildId: string,
    messageId: string,
    triggerKey: string,
    memberId: string,
  ): Promise<ActivationReport> {
    return this.activate(guildId, messageId, memberId, (memberRoles, guildMessages, target) =>
      resolve({ memberRoles, guildMessages, target, trigger: triggerKey, kind: "select" }),
    );
  }

  onTriggerDeselected(
    guildId: string,
    messageId: string,
    triggerKey: string,
    memberId: string,
  ): Promise<ActivationReport> {
    return this.activate(guildId, messageId, memberId, (memberRoles, guildMessages, target) =>
      resolve({ memberRoles, guildMessages, target, trigger: triggerKey, kind: "deselect" }),
    );
  }

  onMenuSelectionChanged(
    guildId: string,
    messageId: string,
    categoryId: string,
    memberId: string,
    desiredRoleIds: readonly string[],
  ): Promise<ActivationReport> {
    return this.activate(guildId, messageId, memberId, (memberRoles, guildMessages, target) =>
      resolveMenuSelection({
        memberRoles,
        guildMessages,
        target,
        categoryId,
        desired: desiredRoleIds,
      }),
    );
  }

  private async activate(
    guildId: string,
    messageId: string,
    memberId: string,
    decide: (
      memberRoles: ReadonlySet<string>,
      guildMessages: RoleMessage[],
      target: RoleMessage,
    ) => Outcome,
  ): Promise<ActivationReport> {
    const target = this.store.getMessage(guildId, messageId);
    if (!target || target.stale) {
      return { status: "rejected", reason: "missing_binding" };
    }

    const roles = await this.platform.members.fetchRoles(guildId, memberId);
    if (!roles) {
      return { status: "unavailable", reason: "member_not_found" };
    }

    const outcome = decide(new Set(roles), this.store.get(guildId), target);
    if (outcome.kind === "rejected") {
      this.logger.debug("[reaction-roles] activation rejected", {
        guildId,
        messageId,
        memberId,
        reason: outcome.reason,
      });
      return { status: "rejected", reason: outcome.reason };
    }

    const result = await applyMutationPlan(
      this.platform.roles,
      { guildId, memberId, add: outcome.add, remove: outcome.remove },
      this.logger,
    );
    return { status: "applied", roleMessage: target, ...result };
  }

  /* ------------------------------------------------------------------ */
  /* Configuration                                                      */
  /* ------------------------------------------------------------------ */

  list(guildId: string): RoleMessage[] {
    return this.store
      .get(guildId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  getRoleMessage(guildId: string, messageId: string): RoleMessage | null {
    return this.store.getMessage(guildId, messageId);
  }

  private requireMessage(guildId: string, messageId: string): RoleMessage {
    const message = this.store.getMessage(guildId, messageId);
    if (!message) {
      throw new ConfigurationError("unknown_message", "No reaction role message with that id.");
    }
    return message;
  }

  /** Rejects roles that do not exist or sit at/above the bot's highest role. */
  private async assertManageable(guildId: string, roleIds: string[]): Promise<void> {
    const roles = await this.platform.guild.listRoles(guildId);
    const top = await this.platform.guild.botHighestPosition(guildId);

    for (const roleId of roleIds) {
      const role = roles.find((entry) => entry.id === roleId);
      if (!role) {
        throw new ConfigurationError("invalid_input", `Role ${roleId} does not exist.`);
      }
      if (role.managed || role.position >= top) {
        throw new ConfigurationError(
          "role_not_manageable",
          `I cannot assign ${role.name}: it is managed or not below my highest role.`,
        );
      }
    }
  }

  private parseEmojiInput(emoji: string | null | undefined) {
    if (!emoji?.trim()) return null;
    const parsed = parseEmoji(emoji);
    if (!parsed) {
      throw new ConfigurationError("invalid_input", `'${emoji}' is not an emoji.`);
    }
    return parsed;
  }

  /** Persists, re-registers routes and refreshes the platform message. */
  private async commit(message: RoleMessage, options: { clear?: boolean } = {}): Promise<ConfigureResult> {
    // A failed write is queued by the store; the in-memory copy already changed.
    await this.store.put(message);

    if (message.stale) {
      this.registrar.unregisterMessage(message.guildId, message.messageId);
      return { message, refreshError: null, failedReactions: [] };
    }
    this.registrar.registerMessage(message);

    try {
      const failedReactions = await this.publisher.publish(message, options);
      return { message, refreshError: null, failedReactions };
    } catch (error) {
      const refreshError = toPlatformError(error, "Failed to update the message.");
      this.logger.warn("[reaction-roles] saved configuration but could not refresh message", {
        guildId: message.guildId,
        messageId: message.messageId,
        error: refreshError,
      });
      return { message, refreshError, failedReactions: [] };
    }
  }

  /** Posts a new role message in `channelId` and stores its configuration. */
  async createRoleMessage(input: CreateRoleMessageInput): Promise<RoleMessage> {
    const display: Partial<RoleMessageDisplay> = {
      title: input.title,
      description: input.description,
      color: input.color ?? null,
    };
    const draft = createRoleMessageDoc(
      { guildId: input.guildId, messageId: "0", channelId: input.channelId, style: input.style, display },
      this.now(),
    );

    let messageId: string;
    try {
      messageId = await this.platform.messages.create(input.channelId, await this.publisher.view(draft));
    } catch (error) {
      throw toPlatformError(error, "Failed to post the role message.");
    }

    const message = createRoleMessageDoc(
      { guildId: input.guildId, messageId, channelId: input.channelId, style: input.style, display },
      this.now(),
    );
    await this.store.put(message);
    this.registrar.registerMessage(message);

    this.logger.info("[reaction-roles] created role message", {
      guildId: input.guildId,
      messageId,
      style: input.style,
    });
    return message;
  }

  async addBinding(guildId: string, messageId: string, input: AddBindingInput): Promise<ConfigureResult & { key: string }> {
    const current = this.requireMessage(guildId, messageId);
    const binding: BindingInput = {
      roleId: input.roleId,
      mode: input.mode ?? "normal",
      emoji: this.parseEmojiInput(input.emoji),
      label: input.label,
      description: input.description,
    };

    const { message, key } = addTrigger(current, binding, this.now());
    await this.assertManageable(guildId, [input.roleId]);

    return { ...(await this.commit(message)), key };
  }

  /** Removes the trigger reached by `trigger` (an emoji) or bound to `roleId`. */
  async removeBinding(
    guildId: string,
    messageId: string,
    target: { trigger?: string | null; roleId?: string | null },
  ): Promise<ConfigureResult> {
    const current = this.requireMessage(guildId, messageId);
    const byTrigger = target.trigger ? normalizeTriggerKey(target.trigger) : null;
    const key =
      byTrigger ??
      Object.entries(current.triggers).find(([, binding]) => binding.roleId === target.roleId)?.[0];
    if (!key) {
      throw new ConfigurationError("unknown_trigger", "No role is bound to that trigger.");
    }

    const { message } = removeTrigger(current, key, this.now());
    return this.commit(message, { clear: message.style === "reaction" });
  }

  async updateSettings(guildId: string, messageId: string, update: SettingsUpdate): Promise<ConfigureResult> {
    const current = this.requireMessage(guildId, messageId);

    let requiredRoles = update.clearRequiredRoles ? [] : [...current.settings.requiredRoles];
    if (update.addRequiredRole) requiredRoles.push(update.addRequiredRole);
    if (update.removeRequiredRole) {
      requiredRoles = requiredRoles.filter((roleId) => roleId !== update.removeRequiredRole);
    }

    const message = updateSettings(
      current,
      { maxRoles: update.maxRoles, requiredRoles },
      this.now(),
    );
    await this.store.put(message);
    return { message, refreshError: null, failedReactions: [] };
  }

  async updateDisplay(
    guildId: string,
    messageId: string,
    patch: Partial<RoleMessageDisplay>,
  ): Promise<ConfigureResult> {
    const current = this.requireMessage(guildId, messageId);
    return this.commit(updateDisplay(current, patch, this.now()));
  }

  async addCategory(guildId: string, messageId: string, input: CategoryInput): Promise<ConfigureResult & { categoryId: string }> {
    const current = this.requireMessage(guildId, messageId);
    if (input.emoji?.trim() && !parseEmoji(input.emoji)) {
      throw new ConfigurationError("invalid_input", `'${input.emoji}' is not an emoji.`);
    }
    const { message, categoryId } = addCategory(current, input, this.now());
    return { ...(await this.commit(message)), categoryId };
  }

  /** Accepts the category id or its display name. */
  async removeCategory(guildId: string, messageId: string, category: string): Promise<ConfigureResult> {
    const current = this.requireMessage(guildId, messageId);
    return this.commit(removeCategory(current, this.categoryId(current, category), this.now()));
  }

  async addMenuBinding(
    guildId: string,
    messageId: string,
    category: string,
    input: AddBindingInput,
  ): Promise<ConfigureResult> {
    const current = this.requireMessage(guildId, messageId);
    const message = addMenuBinding(
      current,
      this.categoryId(current, category),
      {
        roleId: input.roleId,
        mode: input.mode ?? "normal",
        emoji: this.parseEmojiInput(input.emoji),
        label: input.label,
        description: input.description,
      },
      this.now(),
    );
    await this.assertManageable(guildId, [input.roleId]);
    return this.commit(message);
  }

  async removeMenuBinding(
    guildId: string,
    messageId: string,
    category: string,
    roleId: string,
  ): Promise<ConfigureResult> {
    const current = this.requireMessage(guildId, messageId);
    return this.commit(
      removeMenuBinding(current, this.categoryId(current, category), roleId, this.now()),
    );
  }

  private categoryId(message: RoleMessage, input: string): string {
    const trimmed = input.trim();
    return findCategory(message, trimmed) ? trimmed : slugifyCategoryId(trimmed);
  }

  /**
   * Forgets a role message. Its components stop being routed; the platform
   * message itself is left in place.
   */
  async deleteRoleMessage(guildId: string, messageId: string): Promise<boolean> {
    this.requireMessage(guildId, messageId);
    this.registrar.unregisterMessage(guildId, messageId);
    const removed = await this.store.deleteMessage(guildId, messageId);
    this.logger.info("[reaction-roles] deleted role message", { guildId, messageId });
    return removed.unwrapOr(true);
  }

  /* ------------------------------------------------------------------ */
  /* Platform drift                                                     */
  /* ------------------------------------------------------------------ */

  /** The platform message is gone: keep the configuration, stop routing. */
  async markMessageDeleted(guildId: string, messageId: string): Promise<boolean> {
    const current = this.store.getMessage(guildId, messageId);
    if (!current || current.stale) return false;

    this.registrar.unregisterMessage(guildId, messageId);
    await this.store.put(setStale(current, true, this.now()));
    this.logger.info("[reaction-roles] role message deleted on platform; marked stale", {
      guildId,
      messageId,
    });
    return true;
  }

  /** A guild role was deleted: orphan its bindings everywhere. */
  async markRoleDeleted(guildId: string, roleId: string): Promise<number> {
    let touched = 0;
    for (const message of this.store.get(guildId)) {
      const next = orphanRole(message, roleId, this.now());
      if (!next) continue;

      touched += 1;
      await this.store.put(next);
      if (!next.stale) this.registrar.registerMessage(next);
    }

    if (touched) {
      this.logger.info("[reaction-roles] orphaned bindings of deleted role", {
        guildId,
        roleId,
        messages: touched,
      });
    }
    return touched;
  }

  /* ------------------------------------------------------------------ */
  /* Reconciliation                                                     */
  /* ------------------------------------------------------------------ */

  verify(guildId: string): Promise<ReconcileReport> {
    return this.reconciler.verify(guildId);
  }

  cleanup(guildId: string): Promise<CleanupReport> {
    return this.reconciler.cleanup(guildId);
  }

  rebuild(guildId: string): Promise<RebuildReport> {
    return this.reconciler.rebuild(guildId);
  }

  /**
   * Posts a copy of a role message (stale ones included) in `channelId` and
   * stores the copied configuration under the new message id.
   */
  async clone(guildId: string, messageId: string, channelId: string): Promise<ConfigureResult> {
    const source = this.requireMessage(guildId, messageId);

    // Components need the new message id, so post the embed alone first.
    const bare = { ...source, triggers: {}, categories: [] };
    let newMessageId: string;
    try {
      newMessageId = await this.platform.messages.create(channelId, await this.publisher.view(bare));
    } catch (error) {
      throw toPlatformError(error, "Failed to post the cloned message.");
    }

    const copy = cloneRoleMessage(source, { messageId: newMessageId, channelId }, this.now());
    this.logger.info("[reaction-roles] cloned role message", {
      guildId,
      from: messageId,
      to: newMessageId,
      bindings: activeBindingEntries(copy).length,
    });
    return this.commit(copy);
  }

  /** Versioned JSON-ready snapshot of every role message in the guild. */
  export(guildId: string): ExportSnapshot {
    return {
      version: ROLE_MESSAGE_VERSION,
      guildId,
      exportedAt: this.now().toISOString(),
      messages: this.list(guildId),
    };
  }
}
