/**
 * Background credential monitors.
 *
 * Periodic monitors poll on a short tick and refresh when the wall
 * clock hits a multiple of their period, so every gateway sharing a
 * TURN server rotates on the same second. The file monitor reloads
 * the RTC JSON file once a write to it has settled.
 *
 * Errors are logged and swallowed here; the schedule carries on.
 */

import { watch, type FSWatcher } from "fs";
import { basename, dirname } from "path";
import { errorMessage } from "../errors.js";
import type { DecodedRtcConfig } from "./descriptor.js";
import { readRtcConfigFile } from "./source.js";

export type RtcConfigHandler = (config: DecodedRtcConfig) => void;

export interface RtcConfigMonitor {
  readonly name: string;
  readonly enabled: boolean;
  readonly running: boolean;
  start(): void;
  stop(): void;
}

export const POLL_TICK_MS = 500;

export interface PeriodicMonitorOptions {
  name: string;
  enabled: boolean;
  periodSeconds: number;
  produce: () => Promise<DecodedRtcConfig> | DecodedRtcConfig;
  onRtcConfig: RtcConfigHandler;
  tickMs?: number;
  now?: () => number;
}

export function createPeriodicMonitor(options: PeriodicMonitorOptions): RtcConfigMonitor {
  const tickMs = options.tickMs ?? POLL_TICK_MS;
  const now = options.now ?? (() => Date.now());
  const period = Math.max(1, Math.floor(options.periodSeconds));

  let timer: ReturnType<typeof setInterval> | null = null;
  let lastFiredSecond = -1;
  let inFlight = false;

  async function refresh(): Promise<void> {
    inFlight = true;
    try {
      const config = await options.produce();
      // Dropped if stop() ran while the fetch was pending
      if (timer) options.onRtcConfig(config);
    } catch (err) {
      console.warn(`[RTC] ${options.name} monitor could not refresh config: ${errorMessage(err)}`);
    } finally {
      inFlight = false;
    }
  }

  function tick(): void {
    const second = Math.floor(now() / 1000);
    if (second % period !== 0 || second === lastFiredSecond) return;
    lastFiredSecond = second;

    if (inFlight) {
      console.warn(`[RTC] ${options.name} monitor skipped a refresh, previous one still pending`);
      return;
    }
    void refresh();
  }

  return {
    name: options.name,
    enabled: options.enabled,
    get running() {
      return timer !== null;
    },

    start() {
      if (!options.enabled || timer) return;
      timer = setInterval(tick, tickMs);
      console.log(`[RTC] ${options.name} monitor started (period ${period}s)`);
    },

    stop() {
      if (!timer) return;
      clearInterval(timer);
      timer = null;
      console.log(`[RTC] ${options.name} monitor stopped`);
    },
  };
}

export interface FileMonitorOptions {
  path: string;
  enabled: boolean;
  onRtcConfig: RtcConfigHandler;
  /** Quiet time after the last change event before the file is read. */
  settleMs?: number;
}

export function createFileMonitor(options: FileMonitorOptions): RtcConfigMonitor {
  const settleMs = options.settleMs ?? 100;
  const fileName = basename(options.path);

  let watcher: FSWatcher | null = null;
  let settleTimer: ReturnType<typeof setTimeout> | null = null;

  async function reload(): Promise<void> {
    console.log(`[RTC] Detected RTC JSON file change: ${options.path}`);
    try {
      const config = await readRtcConfigFile(options.path);
      if (watcher) options.onRtcConfig(config);
    } catch (err) {
      console.warn(`[RTC] Could not read RTC JSON file: ${options.path}: ${errorMessage(err)}`);
    }
  }

  function onChange(_event: string, changed: string | null): void {
    // Watching the directory survives editors that replace the file
    if (changed !== null && changed !== fileName) return;
    if (settleTimer) clearTimeout(settleTimer);
    settleTimer = setTimeout(() => {
      settleTimer = null;
      void reload();
    }, settleMs);
  }

  return {
    name: "file",
    enabled: options.enabled,
    get running() {
      return watcher !== null;
    },

    start() {
      if (!options.enabled || watcher) return;
      watcher = watch(dirname(options.path), { persistent: false }, onChange);
      watcher.on("error", (err) => {
        console.warn(`[RTC] RTC JSON file watch failed: ${err.message}`);
      });
      console.log(`[RTC] Watching RTC JSON file: ${options.path}`);
    },

    stop() {
      if (settleTimer) {
        clearTimeout(settleTimer);
        settleTimer = null;
      }
      if (!watcher) return;
      watcher.close();
      watcher = null;
      console.log("[RTC] RTC config file monitor stopped");
    },
  };
}
