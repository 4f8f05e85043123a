/**
 * Session supervisor.
 *
 * Runs the negotiation cycle for the video and audio channels over and
 * over: connect both, wait for the video connection to end, stop both
 * pipelines, start again. A viewer leaving therefore resets both
 * sessions together and nothing from the old session survives into
 * the next one.
 *
 *   idle -> negotiating -> active -> restarting -> negotiating ...
 *                                  \-> stopped (stop() or iteration cap)
 */

import { RoutingError, errorMessage } from "../errors.js";
import {
  createDisplayScaler,
  createHeadlessDisplay,
  type DisplayController,
} from "../display/scaling.js";
import type { MediaKind, PipelineFactory, PipelineHandle } from "../pipeline/types.js";
import type { DecodedRtcConfig } from "../rtc/descriptor.js";
import { createSignalingChannel, type ChannelState, type SignalingChannel } from "../signaling/channel.js";
import type { SessionMeta, SignalingTransportFactory } from "../signaling/types.js";

export type SupervisorState = "idle" | "negotiating" | "active" | "restarting" | "stopped";

export interface PeerIds {
  videoLocalId: string;
  videoPeerId: string;
  audioLocalId: string;
  audioPeerId: string;
}

export interface SessionSupervisorOptions {
  ids: PeerIds;
  createPipeline: PipelineFactory;
  createTransport: SignalingTransportFactory;
  initialRtcConfig: DecodedRtcConfig;
  enableResize: boolean;
  display?: DisplayController;
  /** Backoff between session setup attempts while the viewer is absent. */
  retryDelayMs?: number;
  /** Pause before the next cycle when connecting to the relay failed. */
  restartDelayMs?: number;
  /** Stop after this many cycles; unbounded when omitted. */
  maxIterations?: number;
}

export interface SupervisorStats {
  state: SupervisorState;
  iterations: number;
  video: ChannelState;
  audio: ChannelState;
}

export interface SessionSupervisor {
  readonly state: SupervisorState;
  readonly pipelines: Readonly<Record<MediaKind, PipelineHandle>>;
  run(): Promise<void>;
  /** Stop both pipelines and refuse new sessions; channels stay open. */
  stopPipelines(): void;
  /** stopPipelines(), then close the signaling channels. */
  stop(): void;
  routeSession(peerId: string, meta?: SessionMeta): Promise<void>;
  applyRtcConfig(config: DecodedRtcConfig): void;
  stats(): SupervisorStats;
}

export const DEFAULT_RESTART_DELAY_MS = 1000;

const KINDS: readonly MediaKind[] = ["video", "audio"];

interface PipelineSlot {
  handle: PipelineHandle;
  running: boolean;
  /** Set once stop() went out this cycle; cleared by start or a new cycle. */
  stopIssued: boolean;
}

export function createSessionSupervisor(options: SessionSupervisorOptions): SessionSupervisor {
  const { ids } = options;
  const restartDelayMs = options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS;

  let state: SupervisorState = "idle";
  let stopped = false;
  let iterations = 0;
  let channels: Record<MediaKind, SignalingChannel> | null = null;
  let iceServers = {
    stun: options.initialRtcConfig.stunServers,
    turn: options.initialRtcConfig.turnServers,
  };
  let wakeRestart: (() => void) | null = null;

  function makeSlot(kind: MediaKind): PipelineSlot {
    const handle = options.createPipeline(kind, {
      onLocalSdp: (sdp) => channels?.[kind].sendSdp(sdp),
      onLocalIce: (candidate) => channels?.[kind].sendIce(candidate),
    });
    return { handle, running: false, stopIssued: false };
  }

  const slots: Record<MediaKind, PipelineSlot> = {
    video: makeSlot("video"),
    audio: makeSlot("audio"),
  };

  const scaler = createDisplayScaler(options.display ?? createHeadlessDisplay(), slots.video.handle);

  function startPipeline(kind: MediaKind): void {
    const slot = slots[kind];
    slot.handle.setIceServers(iceServers.stun, iceServers.turn);
    console.log(`[Session] starting ${kind} pipeline`);
    slot.handle.start(kind === "audio");
    slot.running = true;
    slot.stopIssued = false;
    state = "active";
  }

  function stopPipeline(kind: MediaKind): void {
    const slot = slots[kind];
    if (slot.stopIssued) return;
    slot.stopIssued = true;
    slot.running = false;
    slot.handle.stop();
  }

  function createChannel(kind: MediaKind): SignalingChannel {
    const slot = slots[kind];
    const cycle = iterations;
    return createSignalingChannel({
      name: kind,
      localId: kind === "video" ? ids.videoLocalId : ids.audioLocalId,
      remotePeerId: kind === "video" ? ids.videoPeerId : ids.audioPeerId,
      createTransport: options.createTransport,
      retryDelayMs: options.retryDelayMs,
      pipeline: {
        // Only while the cycle that created this channel is current
        stop: () => {
          if (cycle === iterations) stopPipeline(kind);
        },
        setSdp: (sdp) => slot.handle.setSdp(sdp),
        setIce: (candidate) => slot.handle.setIce(candidate),
      },
      onSession: (peerId, meta) => {
        void routeSession(peerId, meta);
      },
    });
  }

  async function runIteration(): Promise<boolean> {
    for (const kind of KINDS) slots[kind].stopIssued = false;

    const video = createChannel("video");
    const audio = createChannel("audio");
    channels = { video, audio };

    let connected = true;
    try {
      await video.connect();
      await audio.connect();
      // The audio channel keeps running on its own; the cycle follows video
      await video.closed();
    } catch (err) {
      connected = false;
      console.error(`[Session] negotiation cycle failed: ${errorMessage(err)}`);
    }

    if (!stopped) state = "restarting";
    stopPipeline("video");
    stopPipeline("audio");
    video.close();
    audio.close();
    await audio.closed();
    channels = null;
    scaler.reset();
    return connected;
  }

  function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        wakeRestart = null;
        resolve();
      }, ms);
      wakeRestart = () => {
        clearTimeout(timer);
        wakeRestart = null;
        resolve();
      };
    });
  }

  function stopPipelines(): void {
    stopped = true;
    state = "stopped";
    stopPipeline("video");
    stopPipeline("audio");
  }

  function stop(): void {
    stopPipelines();
    channels?.video.close();
    channels?.audio.close();
    wakeRestart?.();
  }

  async function routeSession(peerId: string, meta?: SessionMeta): Promise<void> {
    if (stopped) return;
    console.log(`[Session] starting session for peer id ${peerId} with meta: ${JSON.stringify(meta ?? {})}`);

    if (peerId === ids.videoPeerId) {
      const cycle = iterations;
      if (meta && options.enableResize) {
        try {
          if (meta.res) await scaler.resize(meta.res);
          if (meta.scale) await scaler.scale(meta.scale);
        } catch (err) {
          console.error(`[Session] display update failed: ${errorMessage(err)}`);
        }
        // The session may have ended while the display was changing
        if (stopped || cycle !== iterations) return;
      }
      startPipeline("video");
      return;
    }

    if (peerId === ids.audioPeerId) {
      startPipeline("audio");
      return;
    }

    console.error("[Session] failed to start pipeline:", new RoutingError(peerId));
  }

  return {
    get state() {
      return state;
    },

    pipelines: {
      video: slots.video.handle,
      audio: slots.audio.handle,
    },

    async run() {
      try {
        while (!stopped && (options.maxIterations === undefined || iterations < options.maxIterations)) {
          iterations++;
          state = "negotiating";
          const connected = await runIteration();
          if (!connected && !stopped) await sleep(restartDelayMs);
        }
      } catch (err) {
        stop();
        throw err;
      }
      state = stopped ? "stopped" : "idle";
    },

    stopPipelines,
    stop,
    routeSession,

    applyRtcConfig(config) {
      iceServers = { stun: config.stunServers, turn: config.turnServers };
      for (const kind of KINDS) {
        const slot = slots[kind];
        if (!slot.running) continue;
        for (const uri of config.turnServers) {
          slot.handle.addTurnServer(uri);
        }
      }
    },

    stats() {
      return {
        state,
        iterations,
        video: channels?.video.session.state ?? "disconnected",
        audio: channels?.audio.session.state ?? "disconnected",
      };
    },
  };
}
