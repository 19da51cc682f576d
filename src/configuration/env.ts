/**
 * Process-level configuration read from the environment.
 *
 * `dotenv/config` is imported by the entrypoint; this module only validates
 * what ended up in `process.env`. The parsed value is memoized, call
 * `resetEnvCache` in tests that tweak variables.
 */
import { z } from "zod";

const FIVE_MINUTES_MS = 5 * 60_000;

const EnvSchema = z.object({
  BOT_TOKEN: z.string().optional(),
  MONGO_URI: z.string().optional(),
  DB_NAME: z.string().min(1).default("reaction_roles"),
  REACTION_ROLES_FLUSH_INTERVAL_MS: z.coerce
    .number()
    .int()
    .min(1_000)
    .default(FIVE_MINUTES_MS),
});

export type Env = z.infer<typeof EnvSchema>;

let cached: Env | null = null;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (cached) return cached;

  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  cached = parsed.data;
  return cached;
}

export function resetEnvCache(): void {
  cached = null;
}
