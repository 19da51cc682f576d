import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { RoleMessage } from "../domain/types";
import type { RoleMessageBackend } from "./backend";

/**
 * Process-local backend. Used when no database is configured and by tests,
 * which can make writes fail with `failWrites`.
 */
export class MemoryRoleMessageBackend implements RoleMessageBackend {
  readonly docs = new Map<string, RoleMessage>();
  failWrites = false;
  saves = 0;
  removes = 0;

  constructor(initial: RoleMessage[] = []) {
    for (const message of initial) this.docs.set(message._id, structuredClone(message));
  }

  async loadAll(): Promise<Result<RoleMessage[]>> {
    return OkResult([...this.docs.values()].map((message) => structuredClone(message)));
  }

  async save(message: RoleMessage): Promise<Result<RoleMessage>> {
    if (this.failWrites) return ErrResult(new Error("write refused"));
    this.saves += 1;
    this.docs.set(message._id, structuredClone(message));
    return OkResult(message);
  }

  async remove(id: string): Promise<Result<boolean>> {
    if (this.failWrites) return ErrResult(new Error("write refused"));
    this.removes += 1;
    return OkResult(this.docs.delete(id));
  }
}
