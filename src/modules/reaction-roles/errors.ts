/**
 * Error taxonomy for reaction roles.
 *
 * Gate rejections (missing required role, cap reached) are outcomes, not
 * errors; see `Outcome` in domain/types.ts.
 */

export type ConfigurationErrorCode =
  | "unknown_message"
  | "unknown_trigger"
  | "unknown_category"
  | "duplicate_trigger"
  | "duplicate_role"
  | "duplicate_category"
  | "style_mismatch"
  | "invalid_input"
  | "role_not_manageable"
  | "limit_reached";

/** Rejected configuration request. Raised before any platform mutation. */
export class ConfigurationError extends Error {
  constructor(
    public readonly code: ConfigurationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type PlatformErrorCode = "forbidden" | "not_found" | "unknown";

/** A single platform call failed (permissions, hierarchy, missing entity). */
export class PlatformError extends Error {
  constructor(
    public readonly code: PlatformErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PlatformError";
  }
}

/** A backend write failed; the in-memory copy stays authoritative. */
export class PersistenceError extends Error {
  constructor(
    public readonly operation: "save" | "remove" | "load",
    public readonly documentId: string | null,
    options?: { cause?: unknown },
  ) {
    super(
      documentId
        ? `Failed to ${operation} reaction role message ${documentId}`
        : `Failed to ${operation} reaction role messages`,
      options,
    );
    this.name = "PersistenceError";
  }
}
