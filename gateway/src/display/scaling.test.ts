import { beforeEach, describe, expect, it, vi } from "vitest";
import { createDisplayScaler, createHeadlessDisplay, normalizeResolution, type DisplayController } from "./scaling.js";

function display(resizeResult: boolean | Error = true): DisplayController {
  return {
    getResolution: () => "1920x1080",
    resize: vi.fn(async () => {
      if (resizeResult instanceof Error) throw resizeResult;
      return resizeResult;
    }),
    setDpi: vi.fn(async () => true),
    setCursorSize: vi.fn(async () => true),
  };
}

describe("normalizeResolution", () => {
  it("rounds both sides down to even numbers", () => {
    expect(normalizeResolution("1281x721")).toBe("1280x720");
    expect(normalizeResolution(" 1920x1080 ")).toBe("1920x1080");
  });

  it("rejects malformed or empty sizes", () => {
    expect(normalizeResolution("1280*720")).toBeNull();
    expect(normalizeResolution("1x720")).toBeNull();
    expect(normalizeResolution("")).toBeNull();
  });
});

describe("createDisplayScaler", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("resizes and reports the new resolution", async () => {
    const screen = display();
    const pipeline = { sendRemoteResolution: vi.fn() };
    const scaler = createDisplayScaler(screen, pipeline);

    await scaler.resize("1280x720");

    expect(screen.resize).toHaveBeenCalledWith("1280x720");
    expect(pipeline.sendRemoteResolution).toHaveBeenCalledWith("1280x720");
    expect(scaler.lastResizeFailed).toBe(false);
  });

  it("does nothing when the resolution already matches", async () => {
    const screen = display();
    const pipeline = { sendRemoteResolution: vi.fn() };

    await createDisplayScaler(screen, pipeline).resize("1921x1081");

    expect(screen.resize).not.toHaveBeenCalled();
    expect(pipeline.sendRemoteResolution).not.toHaveBeenCalled();
  });

  it("skips further resizes after one failed until reset", async () => {
    const screen = display(false);
    const scaler = createDisplayScaler(screen, { sendRemoteResolution: vi.fn() });

    await scaler.resize("1280x720");
    await scaler.resize("1024x768");
    expect(screen.resize).toHaveBeenCalledTimes(1);
    expect(scaler.lastResizeFailed).toBe(true);

    scaler.reset();
    await scaler.resize("1024x768");
    expect(screen.resize).toHaveBeenCalledTimes(2);
  });

  it("treats a throwing resize as failed", async () => {
    const screen = display(new Error("xrandr missing"));
    const pipeline = { sendRemoteResolution: vi.fn() };
    const scaler = createDisplayScaler(screen, pipeline);

    await scaler.resize("1280x720");

    expect(scaler.lastResizeFailed).toBe(true);
    expect(pipeline.sendRemoteResolution).not.toHaveBeenCalled();
  });

  it("derives DPI and cursor size from the scale", async () => {
    const screen = display();

    await createDisplayScaler(screen, { sendRemoteResolution: vi.fn() }).scale(1.5);

    expect(screen.setDpi).toHaveBeenCalledWith(144);
    expect(screen.setCursorSize).toHaveBeenCalledWith(24);
  });

  it("ignores scales outside the supported range", async () => {
    const screen = display();
    const scaler = createDisplayScaler(screen, { sendRemoteResolution: vi.fn() });

    await scaler.scale(0.5);
    await scaler.scale(3);
    await scaler.scale(Number.NaN);

    expect(screen.setDpi).not.toHaveBeenCalled();
    expect(screen.setCursorSize).not.toHaveBeenCalled();
  });

  it("accepts the range bounds", async () => {
    const screen = display();
    const scaler = createDisplayScaler(screen, { sendRemoteResolution: vi.fn() });

    await scaler.scale(0.75);
    await scaler.scale(2.5);

    expect(screen.setDpi).toHaveBeenNthCalledWith(1, 72);
    expect(screen.setDpi).toHaveBeenNthCalledWith(2, 240);
    expect(screen.setCursorSize).toHaveBeenNthCalledWith(1, 12);
    expect(screen.setCursorSize).toHaveBeenNthCalledWith(2, 40);
  });
});

describe("createHeadlessDisplay", () => {
  it("remembers the last resolution", async () => {
    const screen = createHeadlessDisplay("800x600");
    expect(await screen.resize("1024x768")).toBe(true);
    expect(screen.getResolution()).toBe("1024x768");
  });
});
