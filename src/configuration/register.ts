/**
 * Explicit config schema loader.
 *
 * Registration is side-effectful; this file centralizes the imports so the
 * runtime never depends on implicit load order from commands or listeners.
 */
import "@/modules/reaction-roles/config";
