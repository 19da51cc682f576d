/**
 * Canonical keys for per-guild configuration.
 *
 * Invariants:
 * - Keys are stable public identifiers; renaming breaks stored data.
 * - Each key must be registered with defineConfig (schema + path).
 */
export enum ConfigurableModule {
  ReactionRoles = "reactionRoles",
}
