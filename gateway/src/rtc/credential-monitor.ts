/**
 * Owns the three credential monitors and fans their results out.
 *
 * All three monitors exist whatever the source; only the one matching
 * the selected CredentialSource is enabled. Results are queued and
 * handed to subscribers from a microtask, in arrival order, so a
 * subscriber never runs inside a monitor's own timer or fs callback
 * and a subscriber that throws cannot break a monitor.
 */

import { errorMessage } from "../errors.js";
import type { DecodedRtcConfig } from "./descriptor.js";
import {
  createFileMonitor,
  createPeriodicMonitor,
  type RtcConfigHandler,
  type RtcConfigMonitor,
} from "./monitors.js";
import { fetchRestRtcConfig } from "./rest.js";
import {
  generateHmacRtcConfig,
  type CredentialSource,
  type CredentialSourceKind,
} from "./source.js";

export interface CredentialMonitorOptions {
  tickMs?: number;
  now?: () => number;
  settleMs?: number;
  fetchRest?: typeof fetchRestRtcConfig;
}

export interface CredentialMonitor {
  readonly source: CredentialSourceKind;
  readonly monitors: readonly RtcConfigMonitor[];
  /** Latest descriptor: the initial one until a refresh lands. */
  current(): DecodedRtcConfig;
  subscribe(handler: RtcConfigHandler): () => void;
  start(): void;
  stop(): void;
}

const DISABLED_PERIOD_SECONDS = 60;

export function createCredentialMonitor(
  source: CredentialSource,
  initial: DecodedRtcConfig,
  options: CredentialMonitorOptions = {}
): CredentialMonitor {
  const handlers = new Set<RtcConfigHandler>();
  const queue: DecodedRtcConfig[] = [];
  const fetchRest = options.fetchRest ?? fetchRestRtcConfig;
  let latest = initial;
  let draining = false;

  function deliver(config: DecodedRtcConfig): void {
    queue.push(config);
    if (draining) return;
    draining = true;
    queueMicrotask(drain);
  }

  function drain(): void {
    draining = false;
    for (let config = queue.shift(); config; config = queue.shift()) {
      latest = config;
      for (const handler of handlers) {
        try {
          handler(config);
        } catch (err) {
          console.error(`[RTC] RTC config subscriber failed: ${errorMessage(err)}`);
        }
      }
    }
  }

  const hmac = createPeriodicMonitor({
    name: "HMAC",
    enabled: source.kind === "hmac",
    periodSeconds: source.kind === "hmac" ? source.periodSeconds : DISABLED_PERIOD_SECONDS,
    produce: () => {
      if (source.kind !== "hmac") throw new Error("HMAC source not configured");
      return generateHmacRtcConfig(source, options.now ? options.now() : Date.now());
    },
    onRtcConfig: deliver,
    tickMs: options.tickMs,
    now: options.now,
  });

  const rest = createPeriodicMonitor({
    name: "TURN REST",
    enabled: source.kind === "rest",
    periodSeconds: source.kind === "rest" ? source.periodSeconds : DISABLED_PERIOD_SECONDS,
    produce: () => {
      if (source.kind !== "rest") throw new Error("TURN REST source not configured");
      return fetchRest(source.uri, source.username, source.authHeaderName);
    },
    onRtcConfig: deliver,
    tickMs: options.tickMs,
    now: options.now,
  });

  const file = createFileMonitor({
    path: source.kind === "file" ? source.path : "",
    enabled: source.kind === "file",
    onRtcConfig: deliver,
    settleMs: options.settleMs,
  });

  const monitors = [hmac, rest, file];

  return {
    source: source.kind,
    monitors,

    current() {
      return latest;
    },

    subscribe(handler) {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },

    start() {
      for (const monitor of monitors) monitor.start();
    },

    stop() {
      for (const monitor of monitors) monitor.stop();
      queue.length = 0;
    },
  };
}
