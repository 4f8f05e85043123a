import { z } from "zod";

export interface SessionDescription {
  type: string;
  sdp: string;
}

export interface IceCandidate {
  candidate: string;
  sdpMLineIndex: number;
}

/** Viewer metadata sent along with SESSION_OK. */
export const sessionMetaSchema = z
  .object({
    res: z.string().optional(),
    scale: z.number().optional(),
  })
  .passthrough();

export type SessionMeta = z.infer<typeof sessionMetaSchema>;

export const signalMessageSchema = z.union([
  z.object({
    sdp: z.object({ type: z.string(), sdp: z.string() }),
  }),
  z.object({
    ice: z.object({ candidate: z.string(), sdpMLineIndex: z.number() }),
  }),
]);

export type SignalMessage = z.infer<typeof signalMessageSchema>;

export interface SignalingEndpoint {
  localId: string;
  remotePeerId: string;
}

/** Event sinks a transport reports into, supplied when it is created. */
export interface SignalingTransportEvents {
  onConnect(): void;
  onDisconnect(): void;
  onError(err: Error): void;
  onSdp(sdp: SessionDescription): void;
  onIce(candidate: IceCandidate): void;
  onSession(peerId: string, meta?: SessionMeta): void;
}

export interface SignalingTransport {
  /** Resolves once the connection is open and this peer has said HELLO. */
  connect(): Promise<void>;
  /** Ask the relay to open a session with the remote peer. */
  setupCall(): void;
  sendSdp(sdp: SessionDescription): void;
  sendIce(candidate: IceCandidate): void;
  close(): void;
}

export type SignalingTransportFactory = (
  endpoint: SignalingEndpoint,
  events: SignalingTransportEvents
) => SignalingTransport;
