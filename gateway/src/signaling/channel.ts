/**
 * One logical signaling connection, (localId, remotePeerId), bound to
 * the pipeline that serves it.
 *
 * "Peer not found" just means the viewer has not opened its side yet:
 * the channel waits and asks again, forever. Anything else ends this
 * attempt; the session supervisor notices through closed() and starts
 * over.
 */

import { SignalingPeerAbsent, errorMessage } from "../errors.js";
import type {
  IceCandidate,
  SessionDescription,
  SessionMeta,
  SignalingTransport,
  SignalingTransportFactory,
} from "./types.js";

export type ChannelState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "negotiating"
  | "active"
  | "reconnecting";

export interface SignalingSession {
  localId: string;
  remotePeerId: string;
  state: ChannelState;
}

/** The part of a pipeline a channel drives. */
export interface ChannelPipeline {
  stop(): void;
  setSdp(sdp: SessionDescription): void;
  setIce(candidate: IceCandidate): void;
}

export const PEER_RETRY_DELAY_MS = 2000;

export interface SignalingChannelOptions {
  name: string;
  localId: string;
  remotePeerId: string;
  createTransport: SignalingTransportFactory;
  pipeline: ChannelPipeline;
  /** Called for session events addressed to this channel's peer. */
  onSession: (peerId: string, meta?: SessionMeta) => void;
  retryDelayMs?: number;
}

export interface SignalingChannel {
  readonly name: string;
  readonly session: Readonly<SignalingSession>;
  connect(): Promise<void>;
  /** Resolves when the connection ends, for whatever reason. */
  closed(): Promise<void>;
  close(): void;
  sendSdp(sdp: SessionDescription): void;
  sendIce(candidate: IceCandidate): void;
}

export function createSignalingChannel(options: SignalingChannelOptions): SignalingChannel {
  const tag = `[Signal] ${options.name}`;
  const retryDelayMs = options.retryDelayMs ?? PEER_RETRY_DELAY_MS;
  const session: SignalingSession = {
    localId: options.localId,
    remotePeerId: options.remotePeerId,
    state: "disconnected",
  };

  let retryTimer: ReturnType<typeof setTimeout> | null = null;
  let finished = false;
  let resolveClosed: () => void = () => {};
  const closedPromise = new Promise<void>((resolve) => {
    resolveClosed = resolve;
  });

  const transport: SignalingTransport = options.createTransport(
    { localId: options.localId, remotePeerId: options.remotePeerId },
    {
      onConnect() {
        if (finished) return;
        session.state = "negotiating";
        transport.setupCall();
      },

      onDisconnect() {
        // A close event from a socket this channel already gave up on
        if (finished) return;
        options.pipeline.stop();
        finish();
      },

      onError(err) {
        if (finished) return;
        if (err instanceof SignalingPeerAbsent) {
          scheduleRetry();
          return;
        }
        console.error(`${tag} signalling error: ${err.message}`);
        options.pipeline.stop();
        transport.close();
      },

      onSdp(sdp) {
        if (finished) return;
        options.pipeline.setSdp(sdp);
      },

      onIce(candidate) {
        if (finished) return;
        options.pipeline.setIce(candidate);
      },

      onSession(peerId, meta) {
        if (finished) return;
        if (peerId !== options.remotePeerId) {
          console.warn(`${tag} rejected session for peer ${peerId}, expected ${options.remotePeerId}`);
          return;
        }
        session.state = "active";
        options.onSession(peerId, meta);
      },
    }
  );

  function scheduleRetry(): void {
    // One pending retry at most, however many errors arrive meanwhile
    if (retryTimer) return;
    session.state = "reconnecting";
    retryTimer = setTimeout(() => {
      retryTimer = null;
      if (finished) return;
      session.state = "negotiating";
      transport.setupCall();
    }, retryDelayMs);
  }

  function finish(): void {
    if (retryTimer) {
      clearTimeout(retryTimer);
      retryTimer = null;
    }
    session.state = "disconnected";
    if (finished) return;
    finished = true;
    resolveClosed();
  }

  return {
    name: options.name,
    session,

    async connect() {
      session.state = "connecting";
      try {
        await transport.connect();
      } catch (err) {
        console.error(`${tag} connect failed: ${errorMessage(err)}`);
        finish();
        throw err;
      }
      if (session.state === "connecting") session.state = "connected";
    },

    closed() {
      return closedPromise;
    },

    close() {
      transport.close();
      finish();
    },

    sendSdp(sdp) {
      if (finished) return;
      transport.sendSdp(sdp);
    },

    sendIce(candidate) {
      if (finished) return;
      transport.sendIce(candidate);
    },
  };
}
