/**
 * Contracts between the resolver, the facade and its callers.
 */
import type { PlatformError } from "../errors";
import type { Binding, RoleMessage } from "./schema";

export type {
  Binding,
  BindingMode,
  Category,
  RoleMessage,
  RoleMessageDisplay,
  RoleMessageSettings,
  RoleMessageStyle,
} from "./schema";

export type ActivationKind = "select" | "deselect";

export type RejectionReason = "missing_binding" | "missing_required_role" | "cap_reached";

export type Outcome =
  | { kind: "rejected"; reason: RejectionReason }
  | { kind: "applied"; add: Set<string>; remove: Set<string> };

/** A binding together with the key that reaches it and its scope. */
export interface BindingEntry {
  key: string;
  binding: Binding;
  /** Category id for menu bindings, null otherwise. */
  categoryId: string | null;
}

export interface ResolveInput {
  memberRoles: ReadonlySet<string>;
  /** Every RoleMessage of the guild, `target` included. */
  guildMessages: readonly RoleMessage[];
  target: RoleMessage;
  trigger: string;
  kind: ActivationKind;
}

export interface MenuSelectionInput {
  memberRoles: ReadonlySet<string>;
  guildMessages: readonly RoleMessage[];
  target: RoleMessage;
  categoryId: string;
  desired: readonly string[];
}

export interface MutationFailure {
  roleId: string;
  action: "add" | "remove";
  error: PlatformError;
}

export interface MutationResult {
  added: string[];
  removed: string[];
  failures: MutationFailure[];
}

export type ActivationReport =
  | { status: "rejected"; reason: RejectionReason }
  | ({ status: "applied"; roleMessage: RoleMessage } & MutationResult)
  | { status: "unavailable"; reason: "member_not_found" };

export interface OrphanedBinding {
  key: string;
  roleId: string;
  categoryId: string | null;
}

export interface MessageHealth {
  messageId: string;
  channelId: string | null;
  style: RoleMessage["style"];
  stale: boolean;
  /** null when the lookup itself failed. */
  messageExists: boolean | null;
  /** Channel the message was found in, when it differs from the stored one. */
  locatedChannelId: string | null;
  orphanedBindings: OrphanedBinding[];
  emptyCategories: string[];
  /** Roles at or above the bot's highest role. Warnings, not issues. */
  unmanageableRoles: string[];
}

export interface ReconcileReport {
  guildId: string;
  messages: MessageHealth[];
  issueCount: number;
}

export interface CleanupReport {
  guildId: string;
  verified: ReconcileReport;
  removedBindings: number;
  removedCategories: number;
  markedStale: string[];
  backfilledChannels: number;
  changed: string[];
}

export interface RebuildReport {
  guildId: string;
  rebuilt: string[];
  restored: string[];
  skipped: { messageId: string; reason: "missing" | "lookup_failed" }[];
  failures: { messageId: string; error: string }[];
}

export interface ExportSnapshot {
  version: number;
  guildId: string;
  exportedAt: string;
  messages: RoleMessage[];
}
