/**
 * Configuration entrypoint.
 *
 * Ensures config schemas are registered via side-effect import and re-exports
 * the public config API. Importing "./store" directly bypasses registration;
 * prefer `import { configStore } from "@/configuration"`.
 */
import "./register";

export * from "./definitions";
export * from "./provider";
export * from "./store";
export * from "./constants";
