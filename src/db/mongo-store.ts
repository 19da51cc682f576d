/**
 * Whole-document store over one Mongo collection.
 *
 * Every read goes through the zod schema, so a schema with a preprocessing
 * step upgrades old documents as they load. Documents that still fail
 * validation are logged and left out. Nothing here throws: driver failures
 * come back as `Err`.
 */
import type { Collection, Document, Filter } from "mongodb";
import type { z } from "zod";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { getDb } from "./mongo";

export class MongoStore<T extends Document & { _id: string }> {
  constructor(
    private readonly collectionName: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ) {}

  async collection(): Promise<Collection<T>> {
    return (await getDb()).collection<T>(this.collectionName);
  }

  private async attempt<R>(op: (col: Collection<T>) => Promise<R>): Promise<Result<R>> {
    try {
      return OkResult(await op(await this.collection()));
    } catch (error) {
      return ErrResult(error instanceof Error ? error : new Error(String(error)));
    }
  }

  private byId(id: string): Filter<T> {
    return { _id: id } as Filter<T>;
  }

  /** Matching documents that pass validation. */
  find(filter: Filter<T>): Promise<Result<T[]>> {
    return this.attempt(async (col) => {
      const valid: T[] = [];
      for (const raw of await col.find(filter).toArray()) {
        const parsed = this.schema.safeParse(raw);
        if (parsed.success) {
          valid.push(parsed.data);
        } else {
          console.error(`[mongo:${this.collectionName}] skipping invalid document`, {
            id: raw._id,
            issues: parsed.error.flatten(),
          });
        }
      }
      return valid;
    });
  }

  /** Inserts or replaces the document stored under `id`. */
  set(id: string, data: T): Promise<Result<T>> {
    return this.attempt(async (col) => {
      await col.replaceOne(this.byId(id), data, { upsert: true });
      return data;
    });
  }

  delete(id: string): Promise<Result<boolean>> {
    return this.attempt(async (col) => (await col.deleteOne(this.byId(id))).deletedCount > 0);
  }
}
