/**
 * Binding store: the authoritative in-memory copy of every RoleMessage.
 *
 * Invariants:
 * - Writes replace whole documents; callers read, modify a copy, then `put`.
 * - Reads hand out deep copies, so callers cannot mutate the cache.
 * - A failed backend write leaves memory as written and queues the id;
 *   `flush` retries with whatever memory holds at that point.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { roleMessageKey } from "../domain/keys";
import type { RoleMessage } from "../domain/types";
import { PersistenceError } from "../errors";
import type { EngineLogger } from "../logger";
import type { RoleMessageBackend } from "./backend";

export interface BindingStore {
  get(guildId: string): RoleMessage[];
  getMessage(guildId: string, messageId: string): RoleMessage | null;
  put(message: RoleMessage): Promise<Result<RoleMessage, PersistenceError>>;
  deleteMessage(guildId: string, messageId: string): Promise<Result<boolean, PersistenceError>>;
}

export interface FlushReport {
  attempted: number;
  flushed: number;
  failed: number;
}

type PendingOp = { op: "save"; guildId: string; messageId: string } | { op: "remove" };

export class CachedBindingStore implements BindingStore {
  private readonly guilds = new Map<string, Map<string, RoleMessage>>();
  private readonly pending = new Map<string, PendingOp>();
  private flushing: Promise<FlushReport> | null = null;

  constructor(
    private readonly backend: RoleMessageBackend,
    private readonly logger: EngineLogger,
  ) {}

  /** Replaces the whole cache with what the backend holds. */
  async load(): Promise<Result<number, PersistenceError>> {
    const loaded = await this.backend.loadAll();
    if (loaded.isErr()) {
      this.logger.error("[reaction-roles] failed to load role messages", { error: loaded.error });
      return ErrResult(new PersistenceError("load", null, { cause: loaded.error }));
    }

    const messages = loaded.unwrapOr([]);
    this.guilds.clear();
    for (const message of messages) this.remember(message);

    this.logger.info("[reaction-roles] loaded role messages", { count: messages.length });
    return OkResult(messages.length);
  }

  get(guildId: string): RoleMessage[] {
    const guild = this.guilds.get(guildId);
    return guild ? [...guild.values()].map((message) => structuredClone(message)) : [];
  }

  getMessage(guildId: string, messageId: string): RoleMessage | null {
    const message = this.guilds.get(guildId)?.get(messageId);
    return message ? structuredClone(message) : null;
  }

  all(): RoleMessage[] {
    return [...this.guilds.values()].flatMap((guild) =>
      [...guild.values()].map((message) => structuredClone(message)),
    );
  }

  async put(message: RoleMessage): Promise<Result<RoleMessage, PersistenceError>> {
    const copy = structuredClone(message);
    this.remember(copy);
    this.pending.delete(copy._id);

    const saved = await this.backend.save(copy);
    if (saved.isErr()) {
      this.pending.set(copy._id, { op: "save", guildId: copy.guildId, messageId: copy.messageId });
      this.logger.warn("[reaction-roles] write failed; queued for flush", {
        id: copy._id,
        error: saved.error,
      });
      return ErrResult(new PersistenceError("save", copy._id, { cause: saved.error }));
    }
    return OkResult(structuredClone(copy));
  }

  async deleteMessage(
    guildId: string,
    messageId: string,
  ): Promise<Result<boolean, PersistenceError>> {
    const id = roleMessageKey(guildId, messageId);
    const guild = this.guilds.get(guildId);
    const existed = guild?.delete(messageId) ?? false;
    if (guild && guild.size === 0) this.guilds.delete(guildId);
    this.pending.delete(id);

    const removed = await this.backend.remove(id);
    if (removed.isErr()) {
      this.pending.set(id, { op: "remove" });
      this.logger.warn("[reaction-roles] delete failed; queued for flush", {
        id,
        error: removed.error,
      });
      return ErrResult(new PersistenceError("remove", id, { cause: removed.error }));
    }
    return OkResult(existed);
  }

  pendingCount(): number {
    return this.pending.size;
  }

  /** Retries queued writes. Concurrent callers share one run. */
  flush(): Promise<FlushReport> {
    if (!this.flushing) {
      this.flushing = this.runFlush().finally(() => {
        this.flushing = null;
      });
    }
    return this.flushing;
  }

  private async runFlush(): Promise<FlushReport> {
    const report: FlushReport = { attempted: 0, flushed: 0, failed: 0 };

    for (const [id, entry] of [...this.pending]) {
      report.attempted += 1;

      let result: Result<unknown>;
      if (entry.op === "remove") {
        result = await this.backend.remove(id);
      } else {
        const current = this.guilds.get(entry.guildId)?.get(entry.messageId);
        if (!current) {
          this.pending.delete(id);
          report.flushed += 1;
          continue;
        }
        result = await this.backend.save(structuredClone(current));
      }

      // A newer put/delete may have replaced the entry while we awaited.
      if (result.isOk()) {
        if (this.pending.get(id) === entry) this.pending.delete(id);
        report.flushed += 1;
      } else {
        report.failed += 1;
        this.logger.warn("[reaction-roles] flush retry failed", { id, error: result.error });
      }
    }

    if (report.attempted > 0) {
      this.logger.info("[reaction-roles] flush finished", report);
    }
    return report;
  }

  private remember(message: RoleMessage): void {
    let guild = this.guilds.get(message.guildId);
    if (!guild) {
      guild = new Map();
      this.guilds.set(message.guildId, guild);
    }
    guild.set(message.messageId, message);
  }
}
