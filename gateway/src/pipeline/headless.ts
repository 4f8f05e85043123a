/**
 * Pipeline used when no media backend is attached: it keeps the state
 * the negotiation layer hands it and logs every command, which is
 * enough to exercise signaling and credential rotation end to end.
 */

import type { IceCandidate, SessionDescription } from "../signaling/types.js";
import type { MediaKind, PipelineEvents, PipelineHandle } from "./types.js";

export interface HeadlessPipeline extends PipelineHandle {
  readonly kind: MediaKind;
  readonly running: boolean;
  readonly stunServers: readonly string[];
  readonly turnServers: readonly string[];
}

export function createHeadlessPipeline(kind: MediaKind, _events: PipelineEvents): HeadlessPipeline {
  const tag = `[Pipeline] ${kind}`;
  let running = false;
  let stunServers: string[] = [];
  let turnServers: string[] = [];

  return {
    kind,
    get running() {
      return running;
    },
    get stunServers() {
      return stunServers;
    },
    get turnServers() {
      return turnServers;
    },

    start(audioOnly = false) {
      running = true;
      console.log(
        `${tag} started${audioOnly ? " (audio only)" : ""} with ${stunServers.length} STUN / ${turnServers.length} TURN servers`
      );
    },

    stop() {
      if (!running) return;
      running = false;
      console.log(`${tag} stopped`);
    },

    setIceServers(stun, turn) {
      stunServers = [...stun];
      turnServers = [...turn];
    },

    addTurnServer(uri) {
      turnServers.push(uri);
      console.log(`${tag} added TURN server (${turnServers.length} total)`);
    },

    setSdp(sdp: SessionDescription) {
      console.log(`${tag} remote ${sdp.type} SDP received`);
    },

    setIce(candidate: IceCandidate) {
      console.log(`${tag} remote ICE candidate for m-line ${candidate.sdpMLineIndex}`);
    },

    setVideoBitrate(bitrate) {
      console.log(`${tag} video bitrate ${bitrate}`);
    },

    setAudioBitrate(bitrate) {
      console.log(`${tag} audio bitrate ${bitrate}`);
    },

    setFramerate(fps) {
      console.log(`${tag} framerate ${fps}`);
    },

    sendRemoteResolution(resolution) {
      console.log(`${tag} remote resolution ${resolution}`);
    },

    sendCursorData() {},

    sendGpuStats() {},

    sendSystemStats() {},

    sendPing() {},

    sendLatency() {},
  };
}
