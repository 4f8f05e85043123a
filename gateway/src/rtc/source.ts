/**
 * Credential source selection.
 *
 * Exactly one source supplies ICE servers for the life of the process.
 * It is picked once at startup, in this order:
 *
 *   1. static RTC JSON file, when it exists on disk
 *   2. TURN shared secret (HMAC ephemeral credentials)
 *   3. legacy static TURN username/password
 *   4. TURN REST web service
 *   5. built-in public STUN descriptor
 */

import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { errorMessage } from "../errors.js";
import { DEFAULT_RTC_CONFIG, decodeRtcConfig, type DecodedRtcConfig } from "./descriptor.js";
import {
  DEFAULT_CREDENTIAL_TTL_SECONDS,
  encodeHmacRtcConfig,
  ephemeralTurnUsername,
  makeTurnRtcConfig,
  type TurnProtocol,
} from "./hmac.js";
import { fetchRestRtcConfig } from "./rest.js";

export interface FileSource {
  kind: "file";
  path: string;
}

export interface HmacSource {
  kind: "hmac";
  host: string;
  port: string;
  secret: string;
  /** Plain user name; the expiry prefix is added on every refresh. */
  user: string;
  protocol: TurnProtocol;
  tls: boolean;
  periodSeconds: number;
  ttlSeconds: number;
}

export interface LegacySource {
  kind: "legacy";
  host: string;
  port: string;
  username: string;
  password: string;
  protocol: TurnProtocol;
  tls: boolean;
}

export interface RestSource {
  kind: "rest";
  uri: string;
  username: string;
  authHeaderName: string;
  periodSeconds: number;
}

export interface DefaultSource {
  kind: "default";
}

export type CredentialSource = FileSource | HmacSource | LegacySource | RestSource | DefaultSource;

export type CredentialSourceKind = CredentialSource["kind"];

/** Raw credential parameters as they come from the environment. */
export interface CredentialParams {
  rtcConfigFile: string;
  turnHost: string;
  turnPort: string;
  turnProtocol: TurnProtocol;
  turnTls: boolean;
  turnSharedSecret: string;
  turnUsername: string;
  turnPassword: string;
  restUri: string;
  restUsername: string;
  restAuthHeaderName: string;
  periodSeconds: number;
}

export class CredentialSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CredentialSourceError";
  }
}

export function selectCredentialSource(
  params: CredentialParams,
  fileExists: (path: string) => boolean = existsSync
): CredentialSource {
  if (params.rtcConfigFile && fileExists(params.rtcConfigFile)) {
    return { kind: "file", path: params.rtcConfigFile };
  }

  if (params.turnSharedSecret) {
    requireTurnEndpoint(params);
    return {
      kind: "hmac",
      host: params.turnHost,
      port: params.turnPort,
      secret: params.turnSharedSecret,
      user: params.restUsername,
      protocol: params.turnProtocol,
      tls: params.turnTls,
      periodSeconds: params.periodSeconds,
      ttlSeconds: DEFAULT_CREDENTIAL_TTL_SECONDS,
    };
  }

  if (params.turnUsername && params.turnPassword) {
    requireTurnEndpoint(params);
    return {
      kind: "legacy",
      host: params.turnHost,
      port: params.turnPort,
      username: params.turnUsername,
      password: params.turnPassword,
      protocol: params.turnProtocol,
      tls: params.turnTls,
    };
  }

  if (params.restUri) {
    return {
      kind: "rest",
      uri: params.restUri,
      username: params.restUsername,
      authHeaderName: params.restAuthHeaderName,
      periodSeconds: params.periodSeconds,
    };
  }

  return { kind: "default" };
}

function requireTurnEndpoint(params: CredentialParams): void {
  if (!params.turnHost || !params.turnPort) {
    throw new CredentialSourceError("missing TURN_HOST or TURN_PORT");
  }
}

/** Generate a fresh HMAC descriptor for the current time. */
export function generateHmacRtcConfig(source: HmacSource, nowMs = Date.now()): DecodedRtcConfig {
  return decodeRtcConfig(
    encodeHmacRtcConfig({
      host: source.host,
      port: source.port,
      secret: source.secret,
      username: ephemeralTurnUsername(source.user, source.ttlSeconds, nowMs),
      protocol: source.protocol,
      tls: source.tls,
      lifetimeSeconds: source.ttlSeconds,
    })
  );
}

export async function readRtcConfigFile(path: string): Promise<DecodedRtcConfig> {
  return decodeRtcConfig(await readFile(path));
}

/**
 * Descriptor to start with. Only a failing REST service falls back to
 * the default; file, HMAC and legacy errors are configuration errors
 * and propagate.
 */
export async function resolveInitialRtcConfig(
  source: CredentialSource,
  fetchRest: typeof fetchRestRtcConfig = fetchRestRtcConfig
): Promise<DecodedRtcConfig> {
  switch (source.kind) {
    case "file":
      console.warn(`[RTC] Using file for RTC config: ${source.path}`);
      return readRtcConfigFile(source.path);

    case "hmac":
      return generateHmacRtcConfig(source);

    case "legacy":
      console.warn("[RTC] Using legacy non-HMAC TURN credentials");
      return decodeRtcConfig(
        makeTurnRtcConfig({
          host: source.host,
          port: source.port,
          username: source.username,
          password: source.password,
          protocol: source.protocol,
          tls: source.tls,
        })
      );

    case "rest":
      try {
        return await fetchRest(source.uri, source.username, source.authHeaderName);
      } catch (err) {
        console.warn(`[RTC] Error fetching TURN REST config, using default: ${errorMessage(err)}`);
        return decodeRtcConfig(DEFAULT_RTC_CONFIG);
      }

    case "default":
      return decodeRtcConfig(DEFAULT_RTC_CONFIG);
  }
}
