/**
 * Guild configuration provider backed by Mongo (native driver).
 * Reads and writes per-guild configuration slices by dot-path inside one
 * document per guild, without exposing persistence details to callers.
 */
import type { Document } from "mongodb";
import { getDb } from "@/db/mongo";

export interface ConfigProvider {
  /** Raw value stored at `path`, or undefined when nothing is stored. */
  getConfig(guildId: string, path: string): Promise<unknown>;
  setConfig(guildId: string, path: string, changes: Record<string, unknown>): Promise<void>;
}

interface GuildConfigDocument extends Document {
  _id: string;
}

const COLLECTION = "guild_config";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Walks a dot-path through plain objects. */
export function readPath(source: unknown, path: string): unknown {
  let current: unknown = source;
  for (const part of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

export class MongoGuildConfigProvider implements ConfigProvider {
  private async collection() {
    return (await getDb()).collection<GuildConfigDocument>(COLLECTION);
  }

  async getConfig(guildId: string, path: string): Promise<unknown> {
    const col = await this.collection();
    const doc = await col.findOne({ _id: guildId });
    return doc ? readPath(doc, path) : undefined;
  }

  async setConfig(guildId: string, path: string, changes: Record<string, unknown>): Promise<void> {
    const updates: Record<string, unknown> = {};
    for (const [subKey, value] of Object.entries(changes)) {
      if (value === undefined) continue;
      updates[`${path}.${subKey}`] = value;
    }
    if (!Object.keys(updates).length) return;

    // $set per field so unrelated slices of the document are not clobbered.
    const col = await this.collection();
    await col.updateOne({ _id: guildId }, { $set: updates }, { upsert: true });
  }
}

/** In-process provider; used by tests and when no database is configured. */
export class MemoryConfigProvider implements ConfigProvider {
  private readonly docs = new Map<string, Record<string, unknown>>();

  async getConfig(guildId: string, path: string): Promise<unknown> {
    return readPath(this.docs.get(guildId), path);
  }

  async setConfig(guildId: string, path: string, changes: Record<string, unknown>): Promise<void> {
    const doc = this.docs.get(guildId) ?? {};
    let target = doc;
    for (const part of path.split(".")) {
      const next = target[part];
      if (isRecord(next)) {
        target = next;
      } else {
        const created: Record<string, unknown> = {};
        target[part] = created;
        target = created;
      }
    }
    for (const [subKey, value] of Object.entries(changes)) {
      if (value !== undefined) target[subKey] = value;
    }
    this.docs.set(guildId, doc);
  }
}
