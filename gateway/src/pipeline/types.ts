/**
 * Media pipeline as seen from the negotiation layer. The encoder and
 * WebRTC transport behind it live elsewhere.
 */

import type { IceCandidate, SessionDescription } from "../signaling/types.js";

export type MediaKind = "video" | "audio";

/** What a pipeline reports back while negotiating. */
export interface PipelineEvents {
  onLocalSdp(sdp: SessionDescription): void;
  onLocalIce(candidate: IceCandidate): void;
}

export interface PipelineHandle {
  start(audioOnly?: boolean): void;
  stop(): void;
  /** Server list for the next start(); does not touch a running pipeline. */
  setIceServers(stunServers: string[], turnServers: string[]): void;
  /** Additive relay update for a running pipeline. */
  addTurnServer(uri: string): void;
  setSdp(sdp: SessionDescription): void;
  setIce(candidate: IceCandidate): void;
  setVideoBitrate(bitrate: number): void;
  setAudioBitrate(bitrate: number): void;
  setFramerate(fps: number): void;
  sendRemoteResolution(resolution: string): void;
  sendCursorData(data: unknown): void;
  sendGpuStats(load: number, memoryTotal: number, memoryUsed: number): void;
  sendSystemStats(cpuPercent: number, memoryTotal: number, memoryUsed: number): void;
  sendPing(timestamp: number): void;
  sendLatency(latencyMs: number): void;
}

export type PipelineFactory = (kind: MediaKind, events: PipelineEvents) => PipelineHandle;
