import { type ConfigKey, type ConfigOf, getConfigDefinition } from "./definitions";
import { loadEnv } from "./env";
import { type ConfigProvider, MemoryConfigProvider, MongoGuildConfigProvider } from "./provider";

const CACHE_TTL_MS = 30_000;
const MAX_CACHE_ENTRIES = 2_000;

export class ConfigStore {
  constructor(private provider: ConfigProvider) {}

  private readonly cache = new Map<string, { expiresAt: number; value: unknown }>();

  private cacheKey(guildId: string, key: string): string {
    return `${guildId}:${key}`;
  }

  private definition<K extends ConfigKey>(key: K) {
    const definition = getConfigDefinition(key);
    if (!definition) {
      throw new Error(`Config key '${key}' is not defined. Use defineConfig first.`);
    }
    return definition;
  }

  private readCache(guildId: string, key: ConfigKey): unknown {
    const cacheKey = this.cacheKey(guildId, key);
    const entry = this.cache.get(cacheKey);
    if (!entry) return undefined;

    if (entry.expiresAt < Date.now()) {
      this.cache.delete(cacheKey);
      return undefined;
    }
    return entry.value;
  }

  private writeCache(guildId: string, key: ConfigKey, value: unknown): void {
    this.cache.set(this.cacheKey(guildId, key), {
      expiresAt: Date.now() + CACHE_TTL_MS,
      value,
    });

    if (this.cache.size <= MAX_CACHE_ENTRIES) return;
    const overflow = this.cache.size - MAX_CACHE_ENTRIES;
    for (let i = 0; i < overflow; i += 1) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey === undefined) break;
      this.cache.delete(oldestKey);
    }
  }

  /** Parsed config for the key; zod fills in defaults for anything not stored. */
  async get<K extends ConfigKey>(guildId: string, key: K): Promise<ConfigOf<K>> {
    const { schema, path } = this.definition(key);

    // Cached values are re-parsed so callers always get a fresh copy.
    const cached = this.readCache(guildId, key);
    if (cached !== undefined) return schema.parse(cached);

    const raw = await this.provider.getConfig(guildId, path);
    const result = schema.parse(raw ?? {});

    this.writeCache(guildId, key, result);
    return schema.parse(result);
  }

  async set<K extends ConfigKey>(
    guildId: string,
    key: K,
    partial: Partial<ConfigOf<K>>,
  ): Promise<ConfigOf<K>> {
    const { schema, path } = this.definition(key);

    const current = await this.get(guildId, key);
    const validation = schema.safeParse({ ...current, ...partial });
    if (!validation.success) {
      throw new Error(`Invalid configuration update for ${key}: ${validation.error.message}`);
    }

    const changes: Record<string, unknown> = {};
    for (const [subKey, value] of Object.entries(partial)) {
      if (value !== undefined) changes[subKey] = value;
    }
    await this.provider.setConfig(guildId, path, changes);

    this.writeCache(guildId, key, validation.data);
    return validation.data;
  }

  clearCache(): void {
    this.cache.clear();
  }
}

// Global instance; without a database, guild settings live in memory.
export const configStore = new ConfigStore(
  loadEnv().MONGO_URI ? new MongoGuildConfigProvider() : new MemoryConfigProvider(),
);
