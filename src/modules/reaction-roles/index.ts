/**
 * Reaction roles: public surface of the module.
 */
export * from "./domain/types";
export * from "./domain/keys";
export * from "./domain/constants";
export { RoleMessageSchema } from "./domain/schema";
export { migrateRoleMessage, upgradeLegacyData } from "./domain/migrate";
export * from "./errors";
export * from "./ports";
export * from "./views";
export * from "./feedback";
export * from "./config";
export type { EngineLogger } from "./logger";
export type { RoleMessageBackend } from "./data/backend";
export { CachedBindingStore, type BindingStore, type FlushReport } from "./data/store";
export { MemoryRoleMessageBackend } from "./data/memory-backend";
export { MongoRoleMessageBackend } from "./data/mongo-backend";
export { resolve, resolveMenuSelection } from "./engine/resolver";
export {
  deriveComponentIdentities,
  DispatchRegistrar,
  type ComponentIdentity,
  type ComponentInteraction,
} from "./engine/dispatch";
export { startFlushScheduler, stopFlushScheduler } from "./engine/scheduler";
export * from "./service";
