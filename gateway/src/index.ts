/**
 * Streaming gateway - negotiation layer
 *
 * 1. Picks one credential source and builds the initial RTC config
 * 2. Keeps STUN/TURN credentials fresh in the background
 * 3. Negotiates a video and an audio session with the viewer through
 *    the signaling relay, restarting both whenever the viewer leaves
 * 4. Serves health and the current RTC config over HTTP
 */

import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createStatusServer } from "./health.js";
import { createHeadlessPipeline } from "./pipeline/headless.js";
import { waitForAppReady } from "./ready.js";
import { createCredentialMonitor } from "./rtc/credential-monitor.js";
import {
  CredentialSourceError,
  resolveInitialRtcConfig,
  selectCredentialSource,
  type CredentialSource,
} from "./rtc/source.js";
import { createSessionSupervisor } from "./session/supervisor.js";
import { createWebSocketTransport } from "./signaling/transport.js";
import { createSystemMonitor } from "./telemetry/system-monitor.js";

async function main() {
  // ── Configuration ────────────────────────────────────────────────

  const config = loadConfig();

  await waitForAppReady(config.appReadyFile, config.appAutoInit);

  // ── Credentials ──────────────────────────────────────────────────

  let source: CredentialSource;
  try {
    source = selectCredentialSource(config.credentials);
  } catch (err) {
    if (err instanceof CredentialSourceError) {
      console.error(`[Gateway] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const initial = await resolveInitialRtcConfig(source);
  console.log(`[Gateway] Initial RTC config (${source.kind}): ${initial.rtcConfig}`);

  const credentials = createCredentialMonitor(source, initial);

  // ── Session supervisor ───────────────────────────────────────────

  const supervisor = createSessionSupervisor({
    ids: config.ids,
    createPipeline: createHeadlessPipeline,
    createTransport: (endpoint, events) =>
      createWebSocketTransport(
        { url: config.signalingUrl, basicAuth: config.basicAuth },
        endpoint,
        events
      ),
    initialRtcConfig: initial,
    enableResize: config.enableResize,
  });

  credentials.subscribe((rtc) => supervisor.applyRtcConfig(rtc));

  // ── Telemetry ────────────────────────────────────────────────────

  const systemMonitor = createSystemMonitor({
    periodMs: config.statsPeriodMs,
    onStats(stats, timestamp) {
      const video = supervisor.pipelines.video;
      video.sendSystemStats(stats.cpuPercent, stats.memoryTotal, stats.memoryUsed);
      video.sendPing(timestamp);
    },
  });

  // ── Health + RTC config ──────────────────────────────────────────

  const statusServer = createStatusServer({
    port: config.healthPort,
    getStats: () => ({ ...supervisor.stats(), credentialSource: credentials.source }),
    getRtcConfig: () => credentials.current().rtcConfig,
    onError(err) {
      console.error("[Gateway] Fatal: status server failed:", err);
      shutdown();
      process.exit(1);
    },
  });

  // Pipelines first, then background tasks, then signaling; late
  // callbacks must not reach a pipeline that is being torn down
  let shuttingDown = false;
  function shutdown(): void {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log("[Gateway] Shutting down...");
    supervisor.stopPipelines();
    systemMonitor.stop();
    credentials.stop();
    supervisor.stop();
    statusServer.close();
  }

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);

  // ── Startup banner ───────────────────────────────────────────────

  console.log(`[Gateway] Signaling: ${config.signalingUrl}`);
  console.log(`[Gateway] Credential source: ${source.kind}`);
  console.log(`[Gateway] Basic auth: ${config.basicAuth ? "set" : "disabled"}`);
  console.log(`[Gateway] Resize: ${config.enableResize ? "enabled" : "disabled"}`);

  credentials.start();
  if (config.statsPeriodMs > 0) systemMonitor.start();

  try {
    await supervisor.run();
  } catch (err) {
    shutdown();
    throw err;
  }

  shutdown();
  console.log("[Gateway] Shutdown complete");
  process.exit(0);
}

main().catch((err) => {
  console.error(`[Gateway] Fatal: ${errorMessage(err)}`);
  process.exit(1);
});
