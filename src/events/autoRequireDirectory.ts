import { readdirSync } from "node:fs";
import { join, parse } from "node:path";

const LOADABLE = new Set([".ts", ".js"]);

/**
 * Requires every module beside `directory`'s index so their top-level hook
 * subscriptions run. Declaration files and nested directories are skipped.
 * A module that throws while loading is reported and the rest still load.
 *
 * @returns Names of the modules that loaded.
 */
export function autoRequireDirectory(directory: string, label: string): string[] {
  const loaded: string[] = [];

  for (const entry of readdirSync(directory, { withFileTypes: true })) {
    if (!entry.isFile() || entry.name.endsWith(".d.ts")) continue;

    const { name, ext } = parse(entry.name);
    if (!LOADABLE.has(ext) || name === "index") continue;

    try {
      require(join(directory, entry.name));
      loaded.push(name);
    } catch (error) {
      console.error(`[${label}] failed to load ${entry.name}`, error);
    }
  }

  return loaded;
}
