import type { MutationFailure, MutationResult } from "../domain/types";
import { PlatformError } from "../errors";
import type { EngineLogger } from "../logger";
import type { RolePort, RoleMutationStatus } from "../ports";

export interface MutationPlan {
  guildId: string;
  memberId: string;
  add: Iterable<string>;
  remove: Iterable<string>;
}

function toPlatformError(status: Exclude<RoleMutationStatus, "ok">, roleId: string): PlatformError {
  return status === "forbidden"
    ? new PlatformError("forbidden", `Missing permission to manage role ${roleId}.`)
    : new PlatformError("not_found", `Role ${roleId} or the member no longer exists.`);
}

/**
 * Issues one platform call per role, removals first. Each call is caught on
 * its own: a failure is recorded and the remaining calls still run. Nothing
 * is rolled back.
 */
export async function applyMutationPlan(
  roles: RolePort,
  plan: MutationPlan,
  logger: EngineLogger,
): Promise<MutationResult> {
  const result: MutationResult = { added: [], removed: [], failures: [] };
  const { guildId, memberId } = plan;

  const run = async (action: MutationFailure["action"], roleId: string) => {
    try {
      const status =
        action === "add"
          ? await roles.addRole(guildId, memberId, roleId)
          : await roles.removeRole(guildId, memberId, roleId);

      if (status === "ok") {
        (action === "add" ? result.added : result.removed).push(roleId);
        logger.debug(`[reaction-roles] ${action === "add" ? "granted" : "revoked"} role`, {
          guildId,
          memberId,
          roleId,
        });
        return;
      }
      result.failures.push({ roleId, action, error: toPlatformError(status, roleId) });
    } catch (error) {
      const platformError =
        error instanceof PlatformError
          ? error
          : new PlatformError("unknown", `Failed to ${action} role ${roleId}.`, { cause: error });
      result.failures.push({ roleId, action, error: platformError });
    }

    logger.warn(`[reaction-roles] failed to ${action} role`, { guildId, memberId, roleId });
  };

  for (const roleId of plan.remove) await run("remove", roleId);
  for (const roleId of plan.add) await run("add", roleId);

  return result;
}
