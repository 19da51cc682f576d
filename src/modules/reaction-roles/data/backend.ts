import type { Result } from "@/utils/result";
import type { RoleMessage } from "../domain/types";

/**
 * Durable side of the binding store. Keys are RoleMessage `_id`s
 * (`<guildId>:<messageId>`); every write replaces the whole document.
 */
export interface RoleMessageBackend {
  loadAll(): Promise<Result<RoleMessage[]>>;
  save(message: RoleMessage): Promise<Result<RoleMessage>>;
  remove(id: string): Promise<Result<boolean>>;
}
