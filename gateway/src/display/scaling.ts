/**
 * Match the host display to the viewer's viewport: resolution from
 * the viewer's window size, DPI and cursor size from its pixel ratio.
 */

import { errorMessage } from "../errors.js";
import type { PipelineHandle } from "../pipeline/types.js";

export interface DisplayController {
  /** Current mode as "WIDTHxHEIGHT". */
  getResolution(): string;
  resize(resolution: string): Promise<boolean>;
  setDpi(dpi: number): Promise<boolean>;
  setCursorSize(size: number): Promise<boolean>;
}

export const MIN_SCALE = 0.75;
export const MAX_SCALE = 2.5;
export const BASE_DPI = 96;
export const BASE_CURSOR_SIZE = 16;

/** In-memory display for hosts without a controllable screen. */
export function createHeadlessDisplay(initial = "1920x1080"): DisplayController {
  let resolution = initial;
  return {
    getResolution: () => resolution,
    async resize(next) {
      resolution = next;
      return true;
    },
    async setDpi() {
      return true;
    },
    async setCursorSize() {
      return true;
    },
  };
}

/**
 * Parse "WxH" and round both sides down to even numbers, which most
 * encoders require. Returns null for anything else.
 */
export function normalizeResolution(resolution: string): string | null {
  const match = /^(\d+)x(\d+)$/.exec(resolution.trim());
  if (!match) return null;
  const width = Math.floor(parseInt(match[1], 10) / 2) * 2;
  const height = Math.floor(parseInt(match[2], 10) / 2) * 2;
  if (width <= 0 || height <= 0) return null;
  return `${width}x${height}`;
}

export interface DisplayScaler {
  readonly lastResizeFailed: boolean;
  resize(resolution: string): Promise<void>;
  scale(ratio: number): Promise<void>;
  /** Forget a failed resize so the next session may try again. */
  reset(): void;
}

export function createDisplayScaler(
  display: DisplayController,
  pipeline: Pick<PipelineHandle, "sendRemoteResolution">
): DisplayScaler {
  let lastResizeFailed = false;

  return {
    get lastResizeFailed() {
      return lastResizeFailed;
    },

    async resize(resolution) {
      const target = normalizeResolution(resolution);
      if (!target) {
        console.error(`[Display] invalid resolution requested: ${resolution}`);
        return;
      }

      const current = display.getResolution();
      if (current === target) return;
      if (lastResizeFailed) {
        console.warn("[Display] skipping resize because last resize failed");
        return;
      }

      console.warn(`[Display] resizing display from ${current} to ${target}`);
      let ok = false;
      try {
        ok = await display.resize(target);
      } catch (err) {
        console.error(`[Display] resize to ${target} failed: ${errorMessage(err)}`);
      }
      lastResizeFailed = !ok;
      if (ok) pipeline.sendRemoteResolution(target);
    },

    async scale(ratio) {
      if (!(ratio >= MIN_SCALE && ratio <= MAX_SCALE)) {
        console.error(`[Display] requested scale ratio out of bounds: ${ratio}`);
        return;
      }

      const dpi = Math.floor(BASE_DPI * ratio);
      console.log(`[Display] setting DPI to ${dpi}`);
      if (!(await display.setDpi(dpi))) {
        console.error(`[Display] failed to set DPI to ${dpi}`);
      }

      const cursorSize = Math.floor(BASE_CURSOR_SIZE * ratio);
      console.log(`[Display] setting cursor size to ${cursorSize}`);
      if (!(await display.setCursorSize(cursorSize))) {
        console.error(`[Display] failed to set cursor size to ${cursorSize}`);
      }
    },

    reset() {
      lastResizeFailed = false;
    },
  };
}
