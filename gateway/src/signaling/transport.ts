/**
 * WebSocket client for the signaling relay.
 *
 * Text protocol, one message per frame:
 *   -> HELLO <localId>              register this peer
 *   <- HELLO                        registered
 *   -> SESSION <remotePeerId>       ask for a session with the viewer
 *   <- SESSION_OK [base64(meta)]    session open, optional viewer metadata
 *   <- ERROR peer '<id>' not found  viewer has not connected yet
 *   <> {"sdp": {type, sdp}}         session description
 *   <> {"ice": {candidate, sdpMLineIndex}}
 */

import WebSocket from "ws";
import { SignalingFatalError, SignalingPeerAbsent, errorMessage } from "../errors.js";
import {
  sessionMetaSchema,
  signalMessageSchema,
  type IceCandidate,
  type SessionDescription,
  type SessionMeta,
  type SignalingEndpoint,
  type SignalingTransport,
  type SignalingTransportEvents,
} from "./types.js";

export interface WebSocketTransportOptions {
  url: string;
  basicAuth?: { user: string; password: string };
  /** Accept self-signed certificates on wss:// (the relay usually runs on localhost). */
  rejectUnauthorized?: boolean;
}

export function createWebSocketTransport(
  options: WebSocketTransportOptions,
  endpoint: SignalingEndpoint,
  events: SignalingTransportEvents
): SignalingTransport {
  const tag = `[Signal] ${endpoint.localId}->${endpoint.remotePeerId}`;
  let ws: WebSocket | null = null;
  let opened = false;
  let disconnected = false;

  function handleMessage(text: string): void {
    if (text === "HELLO") {
      console.log(`${tag} connected`);
      events.onConnect();
      return;
    }

    if (text.startsWith("SESSION_OK")) {
      const meta = parseMeta(text.slice("SESSION_OK".length).trim());
      console.log(`${tag} started session with peer ${endpoint.remotePeerId}, meta: ${JSON.stringify(meta ?? {})}`);
      events.onSession(endpoint.remotePeerId, meta);
      return;
    }

    if (text.startsWith("ERROR")) {
      if (text === `ERROR peer '${endpoint.remotePeerId}' not found`) {
        events.onError(new SignalingPeerAbsent(endpoint.remotePeerId));
      } else {
        events.onError(new SignalingFatalError(`unhandled signalling message: ${text}`));
      }
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      events.onError(new SignalingFatalError(`unparseable signalling message: ${text}`));
      return;
    }

    const parsed = signalMessageSchema.safeParse(json);
    if (!parsed.success) {
      events.onError(new SignalingFatalError(`unknown signalling message: ${text}`));
      return;
    }
    if ("sdp" in parsed.data) {
      events.onSdp(parsed.data.sdp);
    } else {
      events.onIce(parsed.data.ice);
    }
  }

  function parseMeta(token: string): SessionMeta | undefined {
    if (!token) return undefined;
    try {
      const decoded: unknown = JSON.parse(Buffer.from(token, "base64").toString("utf-8"));
      const meta = sessionMetaSchema.safeParse(decoded);
      if (meta.success) return meta.data;
      console.warn(`${tag} ignoring malformed session metadata`);
    } catch (err) {
      console.warn(`${tag} could not decode session metadata: ${errorMessage(err)}`);
    }
    return undefined;
  }

  function safeSend(data: string): void {
    if (ws?.readyState === WebSocket.OPEN) {
      ws.send(data);
    } else {
      console.warn(`${tag} dropped message, socket not open`);
    }
  }

  function disconnect(): void {
    if (disconnected) return;
    disconnected = true;
    console.log(`${tag} disconnected`);
    events.onDisconnect();
  }

  return {
    connect() {
      const headers: Record<string, string> = {};
      if (options.basicAuth) {
        const token = Buffer.from(`${options.basicAuth.user}:${options.basicAuth.password}`).toString("base64");
        headers.Authorization = `Basic ${token}`;
      }

      console.log(`${tag} connecting to ${options.url}...`);
      const socket = new WebSocket(options.url, {
        headers,
        rejectUnauthorized: options.rejectUnauthorized ?? false,
      });
      ws = socket;

      return new Promise<void>((resolve, reject) => {
        socket.on("open", () => {
          opened = true;
          socket.send(`HELLO ${endpoint.localId}`);
          resolve();
        });

        socket.on("message", (data) => {
          handleMessage(data.toString());
        });

        socket.on("error", (err) => {
          if (!opened) {
            reject(new SignalingFatalError(`could not connect to ${options.url}: ${err.message}`));
            return;
          }
          console.error(`${tag} WebSocket error: ${err.message}`);
        });

        socket.on("close", () => {
          ws = null;
          if (opened) disconnect();
        });
      });
    },

    setupCall() {
      console.log(`${tag} setting up call`);
      safeSend(`SESSION ${endpoint.remotePeerId}`);
    },

    sendSdp(sdp: SessionDescription) {
      console.log(`${tag} sending ${sdp.type} SDP`);
      safeSend(JSON.stringify({ sdp: { type: sdp.type, sdp: sdp.sdp } }));
    },

    sendIce(candidate: IceCandidate) {
      safeSend(
        JSON.stringify({
          ice: { candidate: candidate.candidate, sdpMLineIndex: candidate.sdpMLineIndex },
        })
      );
    },

    close() {
      if (ws) {
        ws.close();
      }
    },
  };
}
