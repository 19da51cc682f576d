/**
 * Shared helpers for the /reactionroles subcommands: guild context, option
 * parsing, error replies and report formatting. Subcommands stay thin calls
 * into the engine.
 */
import type { GuildCommandContext } from "seyfert";

import {
  BINDING_MODES,
  ConfigurationError,
  parseHexColor,
  PlatformError,
  type BindingMode,
  type CleanupReport,
  type ConfigureResult,
  type MessageHealth,
  type ReactionRoleEngine,
  type RebuildReport,
  type ReconcileReport,
  type RoleMessage,
} from "@/modules/reaction-roles";
import { parseMessageReference } from "@/utils/snowflake";

const MAX_CONTENT = 1_900;

export interface ReactionRolesCommandContext {
  guildId: string;
  engine: ReactionRoleEngine;
}

export const MODE_CHOICES = [
  { name: "Normal (toggle freely)", value: "normal" },
  { name: "Unique (one per message or category)", value: "unique" },
  { name: "Exclusive (one across the server)", value: "exclusive" },
];

export async function requireReactionRolesContext(
  ctx: GuildCommandContext,
): Promise<ReactionRolesCommandContext | null> {
  if (!ctx.guildId) {
    await ctx.editOrReply({ content: "This command only works inside a server." });
    return null;
  }
  return { guildId: ctx.guildId, engine: ctx.client.reactionRoles };
}

export const isBindingMode = (value: unknown): value is BindingMode =>
  BINDING_MODES.some((mode) => mode === value);

export function parseMode(value: string | undefined): BindingMode {
  if (value === undefined) return "normal";
  if (!isBindingMode(value)) {
    throw new ConfigurationError("invalid_input", `Unknown mode '${value}'.`);
  }
  return value;
}

/** Undefined when not given; throws on a malformed hex colour. */
export function parseColorOption(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const color = parseHexColor(value);
  if (color === null) {
    throw new ConfigurationError("invalid_input", `'${value}' is not a hex colour like #3498db.`);
  }
  return color;
}

/** Message id from a raw id or a message link. */
export function parseMessageOption(value: string): string {
  const reference = parseMessageReference(value);
  if (!reference) {
    throw new ConfigurationError("invalid_input", "Give a message id or a message link.");
  }
  return reference.messageId;
}

export function clip(content: string, max = MAX_CONTENT): string {
  return content.length <= max ? content : `${content.slice(0, max - 1)}…`;
}

/**
 * Runs a configuration action and turns expected failures into a reply.
 * Resolves null when the action failed and the member was already told.
 */
export async function runConfigure<T>(
  ctx: GuildCommandContext,
  action: () => Promise<T> | T,
): Promise<T | null> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      await ctx.editOrReply({ content: error.message });
      return null;
    }
    if (error instanceof PlatformError) {
      const hint =
        error.code === "forbidden" ? " Check my permissions in that channel." : "";
      await ctx.editOrReply({ content: `${error.message}${hint}` });
      return null;
    }

    ctx.client.logger.error("[reaction-roles] command failed", {
      guildId: ctx.guildId,
      error,
    });
    await ctx.editOrReply({ content: "Something went wrong. Try again later." });
    return null;
  }
}

export function describeConfigureResult(headline: string, result: ConfigureResult): string {
  const lines = [headline];
  if (result.message.stale) {
    lines.push("The message is stale; run `/reactionroles rebuild` once it is back.");
  }
  if (result.refreshError) {
    lines.push(`Saved, but the message could not be updated: ${result.refreshError.message}`);
  }
  if (result.failedReactions.length) {
    lines.push(`Could not react with: ${result.failedReactions.join(" ")}`);
  }
  return lines.join("\n");
}

const roleMention = (roleId: string) => `<@&${roleId}>`;

/** Embed field describing one role message for `/reactionroles list`. */
export function formatRoleMessageField(message: RoleMessage): { name: string; value: string } {
  const state = message.stale ? " [stale]" : "";
  const where = message.channelId ? `<#${message.channelId}>` : "unknown channel";
  const lines = [`${message.style} in ${where} \`${message.messageId}\``];

  for (const [key, binding] of Object.entries(message.triggers)) {
    const trigger = binding.emoji ?? binding.label ?? key;
    const orphaned = binding.orphaned ? " [orphaned]" : "";
    lines.push(`${trigger} → ${roleMention(binding.roleId)} (${binding.mode})${orphaned}`);
  }
  for (const category of message.categories) {
    const roles = category.bindings.map((binding) => roleMention(binding.roleId)).join(", ");
    lines.push(`__${category.name}__: ${roles || "no roles"}`);
  }

  const { maxRoles, requiredRoles } = message.settings;
  if (maxRoles !== null) lines.push(`Max roles: ${maxRoles}`);
  if (requiredRoles.length) lines.push(`Requires: ${requiredRoles.map(roleMention).join(", ")}`);

  return {
    name: clip(`${message.display.title}${state}`, 256),
    value: clip(lines.join("\n"), 1_024),
  };
}

function describeHealth(health: MessageHealth): string[] {
  const problems: string[] = [];
  if (health.messageExists === false) problems.push("message not found");
  if (health.messageExists === null) problems.push("could not check the message");
  if (health.locatedChannelId) problems.push(`found in <#${health.locatedChannelId}>`);
  if (health.orphanedBindings.length) {
    const roles = health.orphanedBindings.map((orphan) => roleMention(orphan.roleId));
    problems.push(`deleted roles: ${roles.join(", ")}`);
  }
  if (health.emptyCategories.length) {
    problems.push(`empty categories: ${health.emptyCategories.join(", ")}`);
  }
  if (health.unmanageableRoles.length) {
    problems.push(`above my role: ${health.unmanageableRoles.map(roleMention).join(", ")}`);
  }
  return problems;
}

export function formatReconcileReport(report: ReconcileReport): string {
  const lines: string[] = [];
  for (const health of report.messages) {
    const problems = describeHealth(health);
    if (!problems.length) continue;
    const stale = health.stale ? " [stale]" : "";
    lines.push(`\`${health.messageId}\`${stale}: ${problems.join("; ")}`);
  }

  if (!lines.length) {
    return `No issues found across ${report.messages.length} message(s).`;
  }
  const header = `${report.issueCount} issue(s) across ${report.messages.length} message(s).`;
  return clip([header, ...lines].join("\n"));
}

export function formatCleanupReport(report: CleanupReport): string {
  if (!report.changed.length) return "Nothing to clean up.";

  const lines = [
    `Removed ${report.removedBindings} binding(s) and ${report.removedCategories} category(ies).`,
  ];
  if (report.markedStale.length) {
    lines.push(`Marked stale: ${report.markedStale.map((id) => `\`${id}\``).join(", ")}`);
  }
  if (report.backfilledChannels) {
    lines.push(`Recovered the channel of ${report.backfilledChannels} message(s).`);
  }
  return clip(lines.join("\n"));
}

export function formatRebuildReport(report: RebuildReport): string {
  const lines = [`Rebuilt ${report.rebuilt.length} message(s).`];
  if (report.restored.length) {
    lines.push(`Restored: ${report.restored.map((id) => `\`${id}\``).join(", ")}`);
  }
  for (const skipped of report.skipped) {
    const reason = skipped.reason === "missing" ? "message not found" : "lookup failed";
    lines.push(`Skipped \`${skipped.messageId}\`: ${reason}`);
  }
  for (const failure of report.failures) {
    lines.push(`Failed \`${failure.messageId}\`: ${failure.error}`);
  }
  return clip(lines.join("\n"));
}
