/**
 * Member-facing wording for activation outcomes. Shared by the reaction
 * listener (direct messages) and the component routers (ephemeral replies).
 */
import type { ActivationReport, RejectionReason, RoleMessage } from "./domain/types";

const mention = (roleId: string) => `<@&${roleId}>`;

export function describeRejection(reason: RejectionReason, message: RoleMessage | null): string {
  switch (reason) {
    case "missing_binding":
      return "This role option is no longer available.";
    case "missing_required_role": {
      const required = message?.settings.requiredRoles ?? [];
      return required.length
        ? `You need one of these roles first: ${required.map(mention).join(", ")}.`
        : "You are missing a role required for this message.";
    }
    case "cap_reached": {
      const max = message?.settings.maxRoles;
      return max
        ? `You already have the maximum of ${max} role${max === 1 ? "" : "s"} from this message.`
        : "You already have the maximum number of roles from this message.";
    }
  }
}

/** One line per effect; empty effects get their own wording. */
export function describeActivation(report: ActivationReport, message: RoleMessage | null): string {
  if (report.status === "rejected") return describeRejection(report.reason, message);
  if (report.status === "unavailable") return "I could not find you in this server.";

  const lines: string[] = [];
  if (report.added.length) lines.push(`Added: ${report.added.map(mention).join(", ")}`);
  if (report.removed.length) lines.push(`Removed: ${report.removed.map(mention).join(", ")}`);
  if (report.failures.length) {
    const failed = report.failures.map((failure) => mention(failure.roleId)).join(", ");
    lines.push(`Could not update: ${failed}`);
  }
  return lines.length ? lines.join("\n") : "Your roles are already up to date.";
}

/** Link to a message, for direct messages sent outside the guild. */
export function messageLink(guildId: string, channelId: string, messageId: string): string {
  return `https://discord.com/channels/${guildId}/${channelId}/${messageId}`;
}
