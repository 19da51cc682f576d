/**
 * Config registry and typing contract for per-guild configuration.
 *
 * Each config key is paired with a zod schema and a storage path inside the
 * guild config document. Feature modules register themselves and extend
 * `ConfigDefinitions` through module augmentation, so `configStore.get`
 * returns the parsed type for the key it was given.
 *
 * Gotchas:
 * - Registration is side-effectful; modules must be imported (see register.ts).
 * - Registering a key twice overrides the first schema/path.
 */
import { z } from "zod";
import { ConfigurableModule } from "./constants";

export { z };

// biome-ignore lint/suspicious/noEmptyInterface: extended by feature configs.
export interface ConfigDefinitions {}

export type ConfigKey = ConfigurableModule;
export type ConfigOf<K extends ConfigKey> = K extends keyof ConfigDefinitions
  ? ConfigDefinitions[K]
  : never;

export type ConfigSchema<K extends ConfigKey> = z.ZodType<ConfigOf<K>, z.ZodTypeDef, unknown>;

export interface ConfigDefinition<K extends ConfigKey = ConfigKey> {
  key: K;
  schema: ConfigSchema<K>;
  path: string;
}

type Registry = { [K in ConfigKey]?: ConfigDefinition<K> };

const registry: Registry = {};

/**
 * Register a config key with its schema and storage path.
 * `path` defaults to the key itself.
 */
export function defineConfig<K extends ConfigKey>(
  key: K,
  schema: ConfigSchema<K>,
  options: { path?: string } = {},
): ConfigDefinition<K> {
  const definition: ConfigDefinition<K> = { key, schema, path: options.path ?? key };
  registry[key] = definition;
  return definition;
}

export function getConfigDefinition<K extends ConfigKey>(
  key: K,
): ConfigDefinition<K> | undefined {
  return registry[key];
}

export function getSchema<K extends ConfigKey>(key: K): ConfigSchema<K> | undefined {
  return registry[key]?.schema;
}

export function getConfigPath<K extends ConfigKey>(key: K): string | undefined {
  return registry[key]?.path;
}
