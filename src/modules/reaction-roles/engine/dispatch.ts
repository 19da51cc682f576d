/**
 * Dispatch registrar: the route table behind every button and menu this
 * module owns.
 *
 * Component identities are derived from stored configuration alone, so the
 * whole table can be rebuilt at startup before the gateway connects. The
 * seyfert component routers only ask `has`/`dispatch`; they never see
 * configuration.
 */
import { activeBindingEntries, activeCategoryBindings } from "../domain/accessors";
import { type ComponentTarget, encodeComponentId, roleMessageKey } from "../domain/keys";
import type { ActivationReport, RoleMessage } from "../domain/types";

export interface ComponentIdentity extends ComponentTarget {
  customId: string;
}

export interface ComponentInteraction {
  customId: string;
  guildId: string;
  memberId: string;
  /** Selected values; empty for buttons. */
  values: string[];
}

export type ComponentHandler = (interaction: ComponentInteraction) => Promise<ActivationReport>;

export type HandlerFactory = (identity: ComponentIdentity) => ComponentHandler;

function identity(target: ComponentTarget): ComponentIdentity {
  return { ...target, customId: encodeComponentId(target) };
}

/**
 * One identity per active button trigger and per menu category that still
 * has an active binding. Stale messages and orphaned bindings yield nothing.
 */
export function deriveComponentIdentities(messages: readonly RoleMessage[]): ComponentIdentity[] {
  const identities: ComponentIdentity[] = [];

  for (const message of messages) {
    if (message.stale) continue;
    const { guildId, messageId } = message;

    if (message.style === "button") {
      for (const { key } of activeBindingEntries(message)) {
        identities.push(identity({ kind: "button", guildId, messageId, key }));
      }
    } else if (message.style === "menu") {
      for (const category of message.categories) {
        if (!activeCategoryBindings(category).length) continue;
        identities.push(identity({ kind: "menu", guildId, messageId, key: category.id }));
      }
    }
  }

  return identities;
}

interface Route {
  identity: ComponentIdentity;
  handler: ComponentHandler;
}

export class DispatchRegistrar {
  private readonly routes = new Map<string, Route>();
  private readonly byMessage = new Map<string, Set<string>>();

  constructor(private readonly handlerFor: HandlerFactory) {}

  /** Adds or replaces the route of one identity. */
  register(identity: ComponentIdentity, handler: ComponentHandler = this.handlerFor(identity)): void {
    this.routes.set(identity.customId, { identity, handler });

    const key = roleMessageKey(identity.guildId, identity.messageId);
    let ids = this.byMessage.get(key);
    if (!ids) {
      ids = new Set();
      this.byMessage.set(key, ids);
    }
    ids.add(identity.customId);
  }

  /**
   * Makes the table match the current configuration of one message: routes
   * it no longer derives are dropped. Returns the number of routes now held.
   */
  registerMessage(message: RoleMessage): number {
    this.unregisterMessage(message.guildId, message.messageId);
    const identities = deriveComponentIdentities([message]);
    for (const entry of identities) this.register(entry);
    return identities.length;
  }

  unregisterMessage(guildId: string, messageId: string): number {
    const key = roleMessageKey(guildId, messageId);
    const ids = this.byMessage.get(key);
    if (!ids) return 0;

    for (const customId of ids) this.routes.delete(customId);
    this.byMessage.delete(key);
    return ids.size;
  }

  /** Rebuilds the whole table from configuration. Safe to run repeatedly. */
  registerAll(messages: readonly RoleMessage[]): number {
    this.routes.clear();
    this.byMessage.clear();
    const identities = deriveComponentIdentities(messages);
    for (const entry of identities) this.register(entry);
    return identities.length;
  }

  resolve(customId: string): ComponentIdentity | null {
    return this.routes.get(customId)?.identity ?? null;
  }

  has(customId: string): boolean {
    return this.routes.has(customId);
  }

  get size(): number {
    return this.routes.size;
  }

  /** Runs the routed handler; null when nothing is registered for the id. */
  async dispatch(interaction: ComponentInteraction): Promise<ActivationReport | null> {
    const route = this.routes.get(interaction.customId);
    if (!route) return null;
    return route.handler(interaction);
  }
}
