/**
 * Gateway configuration loaded from environment variables.
 *
 * The gateway is a client of the signaling relay on the same host;
 * the viewer reaches the relay from outside and both sides meet there.
 */

import { hostname } from "os";
import type { TurnProtocol } from "./rtc/hmac.js";
import type { CredentialParams } from "./rtc/source.js";
import type { PeerIds } from "./session/supervisor.js";

export interface ServerConfig {
  /** WebSocket URL of the signaling relay, e.g. "ws://127.0.0.1:8080/ws" */
  signalingUrl: string;
  basicAuth?: { user: string; password: string };
  ids: PeerIds;
  credentials: CredentialParams;
  /** Resize the host display to the viewer's window */
  enableResize: boolean;
  /** Skip waiting for appReadyFile */
  appAutoInit: boolean;
  appReadyFile: string;
  healthPort: number;
  /** Interval of CPU / memory stats sent to the viewer, 0 disables */
  statsPeriodMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const https = env.ENABLE_HTTPS_WEB === "true";
  const listenPort = parseInt(env.LISTEN_PORT || "8080", 10);
  const signalingUrl = env.SIGNALING_URL || `${https ? "wss" : "ws"}://127.0.0.1:${listenPort}/ws`;

  // Basic auth is on by default, but only enforced once a password is set
  const basicAuthEnabled = (env.ENABLE_BASIC_AUTH || "true") === "true";
  const basicAuthPassword = env.BASIC_AUTH_PASSWORD || "";

  return {
    signalingUrl,
    basicAuth:
      basicAuthEnabled && basicAuthPassword
        ? { user: env.BASIC_AUTH_USER || env.USER || "", password: basicAuthPassword }
        : undefined,
    // Viewer pages connect as 1 (video) and 3 (audio)
    ids: {
      videoLocalId: "0",
      videoPeerId: "1",
      audioLocalId: "2",
      audioPeerId: "3",
    },
    credentials: {
      rtcConfigFile: env.RTC_CONFIG_JSON ?? "/tmp/rtc.json",
      turnHost: env.TURN_HOST || "",
      turnPort: env.TURN_PORT || "",
      turnProtocol: parseTurnProtocol(env.TURN_PROTOCOL),
      turnTls: env.TURN_TLS === "true",
      turnSharedSecret: env.TURN_SHARED_SECRET || "",
      turnUsername: env.TURN_USERNAME || "",
      turnPassword: env.TURN_PASSWORD || "",
      restUri: env.COTURN_WEB_URI || "",
      restUsername: env.COTURN_WEB_USERNAME || `gateway-${hostname()}`,
      restAuthHeaderName: env.COTURN_AUTH_HEADER_NAME || "x-auth-user",
      periodSeconds: parsePositiveInt(env.RTC_REFRESH_PERIOD, 60),
    },
    enableResize: env.WEBRTC_ENABLE_RESIZE === "true",
    appAutoInit: (env.APP_AUTO_INIT || "true") === "true",
    appReadyFile: env.APP_READY_FILE || "/var/run/appconfig/appready",
    healthPort: parseInt(env.HEALTH_PORT || "8081", 10),
    statsPeriodMs: parseInt(env.STATS_PERIOD_MS || "1000", 10),
  };
}

function parseTurnProtocol(value: string | undefined): TurnProtocol {
  return value?.toLowerCase() === "tcp" ? "tcp" : "udp";
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}
