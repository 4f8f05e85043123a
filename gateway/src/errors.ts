/**
 * Error taxonomy for credential acquisition and signaling.
 *
 * Credential errors are caught inside the monitors that raise them.
 * Signaling errors travel one level up, to the session supervisor.
 */

/** An ICE server descriptor document is malformed. */
export class ConfigFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigFormatError";
  }
}

export interface CredentialFetchDetails {
  status?: number;
  reason?: string;
  body?: string;
}

/** Fetching a descriptor from a TURN REST service failed. */
export class CredentialFetchError extends Error {
  readonly status?: number;
  readonly reason?: string;
  readonly body?: string;

  constructor(message: string, details: CredentialFetchDetails = {}) {
    super(message);
    this.name = "CredentialFetchError";
    this.status = details.status;
    this.reason = details.reason;
    this.body = details.body;
  }
}

/** The relay has no registered peer with the requested id yet. */
export class SignalingPeerAbsent extends Error {
  readonly peerId: string;

  constructor(peerId: string) {
    super(`peer '${peerId}' not found`);
    this.name = "SignalingPeerAbsent";
    this.peerId = peerId;
  }
}

/** Any other signaling failure; ends the current session. */
export class SignalingFatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SignalingFatalError";
  }
}

/** A session event names a peer id no pipeline is registered for. */
export class RoutingError extends Error {
  readonly peerId: string;

  constructor(peerId: string) {
    super(`no pipeline registered for peer id ${peerId}`);
    this.name = "RoutingError";
    this.peerId = peerId;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
