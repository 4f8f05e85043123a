/**
 * TURN REST API ephemeral credentials (coturn "use-auth-secret").
 *
 *   - Username format: "{expiry_unix_timestamp}:{arbitrary}"
 *   - Password: base64(HMAC-SHA1(shared_secret, username))
 *
 * The TURN server recomputes the password from the username it is
 * given, so the expiry travels inside the username. Callers build the
 * username with ephemeralTurnUsername() (or supply their own, already
 * expiry-prefixed) and pass it to encodeHmacRtcConfig(), which never
 * adds or rewrites an expiry itself.
 */

import { createHmac } from "crypto";

export type TurnProtocol = "udp" | "tcp";

export const PUBLIC_STUN_HOST = "stun.l.google.com";
export const PUBLIC_STUN_URL = `stun:${PUBLIC_STUN_HOST}:19302`;

export const DEFAULT_CREDENTIAL_TTL_SECONDS = 24 * 3600;

export function generateTurnPassword(username: string, secret: string): string {
  return createHmac("sha1", secret).update(username).digest("base64");
}

/**
 * "{expiry}:{user}", expiry = now + ttl in unix seconds. Colons in the
 * user part become dashes so the server's split on the first colon
 * still finds the expiry.
 */
export function ephemeralTurnUsername(
  user: string,
  ttlSeconds = DEFAULT_CREDENTIAL_TTL_SECONDS,
  nowMs = Date.now()
): string {
  const expiry = Math.floor(nowMs / 1000) + ttlSeconds;
  return `${expiry}:${user.replace(/:/g, "-")}`;
}

export interface TurnEndpointOptions {
  host: string;
  port: number | string;
  protocol?: TurnProtocol;
  tls?: boolean;
}

export interface HmacRtcConfigOptions extends TurnEndpointOptions {
  secret: string;
  /** Expiry-prefixed username, see ephemeralTurnUsername(). */
  username: string;
  /** Reported as lifetimeDuration; should match the username's expiry. */
  lifetimeSeconds?: number;
}

export function encodeHmacRtcConfig(options: HmacRtcConfigOptions): string {
  return makeTurnRtcConfig({
    ...options,
    password: generateTurnPassword(options.username, options.secret),
  });
}

export interface StaticTurnRtcConfigOptions extends TurnEndpointOptions {
  username: string;
  password: string;
  lifetimeSeconds?: number;
}

/**
 * Descriptor with one STUN entry (the TURN host, plus the public
 * fallback) and one TURN entry carrying fixed credentials.
 */
export function makeTurnRtcConfig(options: StaticTurnRtcConfigOptions): string {
  const protocol = options.protocol ?? "udp";
  const scheme = options.tls ? "turns" : "turn";
  const lifetime = options.lifetimeSeconds ?? DEFAULT_CREDENTIAL_TTL_SECONDS;

  const stunUrls = [`stun:${options.host}:${options.port}`];
  if (options.host !== PUBLIC_STUN_HOST) {
    stunUrls.push(PUBLIC_STUN_URL);
  }

  return JSON.stringify(
    {
      lifetimeDuration: `${lifetime}s`,
      blockStatus: "NOT_BLOCKED",
      iceTransportPolicy: "all",
      iceServers: [
        { urls: stunUrls },
        {
          urls: [`${scheme}:${options.host}:${options.port}?transport=${protocol}`],
          username: options.username,
          credential: options.password,
        },
      ],
    },
    null,
    2
  );
}
