import { Logger } from "seyfert";

/** The slice of seyfert's Logger the engine writes to. */
export interface EngineLogger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export const createDefaultLogger = (): EngineLogger => new Logger({ name: "[ReactionRoles]" });
