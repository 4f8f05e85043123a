import { existsSync } from "fs";

/**
 * Resolve once the streamed application signals it is ready by
 * creating readyFile. Resolves immediately when autoInit is set.
 */
export function waitForAppReady(
  readyFile: string,
  autoInit: boolean,
  pollMs = 200,
  exists: (path: string) => boolean = existsSync
): Promise<void> {
  if (autoInit || exists(readyFile)) return Promise.resolve();

  console.log(`[Gateway] Waiting for streaming app ready (${readyFile})`);
  return new Promise((resolve) => {
    const timer = setInterval(() => {
      if (!exists(readyFile)) return;
      clearInterval(timer);
      resolve();
    }, pollMs);
  });
}
