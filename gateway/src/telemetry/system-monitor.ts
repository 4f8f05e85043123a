/**
 * Periodic host CPU / memory sampling, pushed to the video pipeline
 * together with a ping timestamp the viewer echoes back for latency.
 */

import { cpus, freemem, totalmem, type CpuInfo } from "os";
import { errorMessage } from "../errors.js";

export interface SystemStats {
  cpuPercent: number;
  memoryTotal: number;
  memoryUsed: number;
}

export interface SystemMonitorOptions {
  periodMs?: number;
  onStats: (stats: SystemStats, timestamp: number) => void;
  /** Injected for tests. */
  readCpus?: () => CpuInfo[];
  readMemory?: () => { total: number; free: number };
}

export interface SystemMonitor {
  readonly running: boolean;
  start(): void;
  stop(): void;
}

interface CpuTotals {
  idle: number;
  total: number;
}

function sumCpuTimes(infos: CpuInfo[]): CpuTotals {
  let idle = 0;
  let total = 0;
  for (const info of infos) {
    const { user, nice, sys, irq } = info.times;
    idle += info.times.idle;
    total += user + nice + sys + irq + info.times.idle;
  }
  return { idle, total };
}

/** Busy share of CPU time between two samples, 0..100. */
export function cpuPercentBetween(previous: CpuTotals, current: CpuTotals): number {
  const total = current.total - previous.total;
  if (total <= 0) return 0;
  const busy = total - (current.idle - previous.idle);
  return Math.min(100, Math.max(0, (busy / total) * 100));
}

export function createSystemMonitor(options: SystemMonitorOptions): SystemMonitor {
  const periodMs = options.periodMs ?? 1000;
  const readCpus = options.readCpus ?? cpus;
  const readMemory = options.readMemory ?? (() => ({ total: totalmem(), free: freemem() }));

  let timer: ReturnType<typeof setInterval> | null = null;
  let previous: CpuTotals | null = null;

  function sample(): void {
    try {
      const current = sumCpuTimes(readCpus());
      const cpuPercent = previous ? cpuPercentBetween(previous, current) : 0;
      previous = current;
      const memory = readMemory();
      options.onStats(
        { cpuPercent, memoryTotal: memory.total, memoryUsed: memory.total - memory.free },
        Date.now()
      );
    } catch (err) {
      console.warn(`[Telemetry] system stats failed: ${errorMessage(err)}`);
    }
  }

  return {
    get running() {
      return timer !== null;
    },

    start() {
      if (timer) return;
      previous = sumCpuTimes(readCpus());
      timer = setInterval(sample, periodMs);
    },

    stop() {
      if (!timer) return;
      clearInterval(timer);
      timer = null;
      console.log("[Telemetry] system monitor stopped");
    },
  };
}
