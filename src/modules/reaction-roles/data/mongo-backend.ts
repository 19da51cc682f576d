/**
 * MongoDB backend for reaction-role messages.
 *
 * Version 2 documents live in `reaction_role_messages`. Entries of the legacy
 * `reaction_roles` collection are upgraded on load (see domain/migrate.ts)
 * and copied into the new collection; the legacy collection is never written.
 */
import { MongoStore } from "@/db/mongo-store";
import { OkResult, type Result } from "@/utils/result";
import { LEGACY_COLLECTION, ROLE_MESSAGES_COLLECTION } from "../domain/constants";
import { RoleMessageSchema } from "../domain/schema";
import type { RoleMessage } from "../domain/types";
import type { EngineLogger } from "../logger";
import type { RoleMessageBackend } from "./backend";

export class MongoRoleMessageBackend implements RoleMessageBackend {
  constructor(
    private readonly logger: EngineLogger,
    private readonly store = new MongoStore<RoleMessage>(ROLE_MESSAGES_COLLECTION, RoleMessageSchema),
    private readonly legacy = new MongoStore<RoleMessage>(LEGACY_COLLECTION, RoleMessageSchema),
  ) {}

  async ensureIndexes(): Promise<void> {
    const col = await this.store.collection();
    await col.createIndex({ guildId: 1 });
  }

  async loadAll(): Promise<Result<RoleMessage[]>> {
    const current = await this.store.find({});
    if (current.isErr()) return current;

    const messages = current.unwrapOr([]);
    const known = new Set(messages.map((message) => message._id));

    const legacy = await this.legacy.find({});
    if (legacy.isErr()) {
      this.logger.warn("[reaction-roles] legacy collection unreadable; skipping migration", {
        error: legacy.error,
      });
      return OkResult(messages);
    }

    for (const migrated of legacy.unwrapOr([])) {
      if (known.has(migrated._id)) continue;
      const saved = await this.store.set(migrated._id, migrated);
      if (saved.isErr()) {
        this.logger.error("[reaction-roles] failed to store migrated message", {
          id: migrated._id,
          error: saved.error,
        });
      } else {
        this.logger.info("[reaction-roles] migrated legacy message", { id: migrated._id });
      }
      known.add(migrated._id);
      messages.push(migrated);
    }

    return OkResult(messages);
  }

  save(message: RoleMessage): Promise<Result<RoleMessage>> {
    return this.store.set(message._id, message);
  }

  remove(id: string): Promise<Result<boolean>> {
    return this.store.delete(id);
  }
}
