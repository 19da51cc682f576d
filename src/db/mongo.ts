/**
 * Shared MongoDB handle. The first `getDb` call connects; concurrent callers
 * wait on the same connection attempt.
 */
import { type Db, MongoClient } from "mongodb";
import { loadEnv } from "@/configuration/env";

let client: MongoClient | null = null;
let connecting: Promise<Db> | null = null;

async function connect(): Promise<Db> {
  const { MONGO_URI, DB_NAME } = loadEnv();
  if (!MONGO_URI) throw new Error("MONGO_URI is not set; reaction roles cannot use MongoDB.");

  const next = new MongoClient(MONGO_URI);
  await next.connect();
  client = next;
  return next.db(DB_NAME);
}

export function getDb(): Promise<Db> {
  if (!connecting) {
    connecting = connect().catch((error: unknown) => {
      connecting = null;
      throw error;
    });
  }
  return connecting;
}

export async function disconnectDb(): Promise<void> {
  const current = client;
  client = null;
  connecting = null;
  await current?.close();
}
