/**
 * Periodic flush of queued binding-store writes, independent of requests.
 */
import type { FlushReport } from "../data/store";
import type { EngineLogger } from "../logger";

export interface Flushable {
  flush(): Promise<FlushReport>;
  pendingCount(): number;
}

let timer: NodeJS.Timeout | null = null;
let ticking = false;

export function startFlushScheduler(
  target: Flushable,
  logger: EngineLogger,
  intervalMs: number,
): void {
  if (timer) return;
  timer = setInterval(() => {
    void sweep(target, logger);
  }, intervalMs);
  timer.unref?.();
}

export function stopFlushScheduler(): void {
  if (!timer) return;
  clearInterval(timer);
  timer = null;
}

/** One flush pass; overlapping calls are skipped. Exported for tests. */
export async function sweep(target: Flushable, logger: EngineLogger): Promise<FlushReport | null> {
  if (ticking || target.pendingCount() === 0) return null;
  ticking = true;

  try {
    return await target.flush();
  } catch (error) {
    logger.error("[reaction-roles] flush sweep failed", { error });
    return null;
  } finally {
    ticking = false;
  }
}
