/**
 * Bot entrypoint: loads stored role messages, rebuilds the component route
 * table, then connects to the gateway and uploads slash commands.
 */
import "module-alias/register";
import "dotenv/config";

import type { ParseClient } from "seyfert";
import { Client } from "seyfert";

import { createSeyfertPlatform } from "@/adapters/seyfert-platform";
import { loadEnv } from "@/configuration/env";
import { disconnectDb } from "@/db/mongo";
import {
  CachedBindingStore,
  MemoryRoleMessageBackend,
  MongoRoleMessageBackend,
  ReactionRoleEngine,
  startFlushScheduler,
  stopFlushScheduler,
  type RoleMessageBackend,
} from "@/modules/reaction-roles";

import "./events/listeners"; // listeners subscribe to the hooks fed by events/handlers

const env = loadEnv();
const client = new Client<true>();

async function createBackend(): Promise<RoleMessageBackend> {
  if (!env.MONGO_URI) {
    client.logger.warn("[bootstrap] MONGO_URI not set; role messages are kept in memory only");
    return new MemoryRoleMessageBackend();
  }
  const backend = new MongoRoleMessageBackend(client.logger);
  await backend.ensureIndexes();
  return backend;
}

async function bootstrap(): Promise<void> {
  client.logger.info("[bootstrap] Starting bot...");

  const store = new CachedBindingStore(await createBackend(), client.logger);
  client.reactionRoles = new ReactionRoleEngine({
    store,
    platform: createSeyfertPlatform(client),
    logger: client.logger,
  });

  const loaded = await store.load();
  if (loaded.isErr()) throw loaded.error;
  client.reactionRoles.registerAll();
  startFlushScheduler(store, client.logger, env.REACTION_ROLES_FLUSH_INTERVAL_MS);

  await client.start();
  await client.uploadCommands({ cachePath: "./commands.json" });
}

async function shutdown(signal: string): Promise<void> {
  client.logger.info(`[bootstrap] ${signal} received; flushing pending writes`);
  stopFlushScheduler();
  try {
    const report = await client.reactionRoles.flush();
    if (report.failed) {
      client.logger.warn("[bootstrap] writes still pending at shutdown", { failed: report.failed });
    }
  } finally {
    await disconnectDb();
    process.exit(0);
  }
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error) => {
      console.error("[bootstrap] Shutdown failed:", error);
      process.exit(1);
    });
  });
}

bootstrap().catch((error) => {
  console.error("[bootstrap] Failed to start bot:", error);
  process.exit(1);
});

declare module "seyfert" {
  interface UsingClient extends ParseClient<Client<true>> {
    reactionRoles: ReactionRoleEngine;
  }
  interface Client<Ready extends boolean = boolean> {
    reactionRoles: ReactionRoleEngine;
  }
}
