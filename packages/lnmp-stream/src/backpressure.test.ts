import { describe, expect, it } from "vitest";
import { BackpressureController, DEFAULT_WINDOW_SIZE } from "./backpressure.ts";
import { silentLogger } from "./logging.ts";

function controller(windowSize?: number): BackpressureController {
  return new BackpressureController(windowSize, silentLogger);
}

describe("BackpressureController", () => {
  it("defaults to a 64 KiB window", () => {
    const bp = controller();
    expect(bp.windowSize).toBe(DEFAULT_WINDOW_SIZE);
    expect(bp.windowSize).toBe(65536);
    expect(bp.bytesInFlight).toBe(0);
    expect(bp.canSend()).toBe(true);
  });

  it("accumulates sent bytes", () => {
    const bp = controller(1000);
    for (let i = 0; i < 4; i++) bp.onChunkSent(100);
    expect(bp.bytesInFlight).toBe(400);
    expect(bp.availableWindow()).toBe(600);
  });

  it("closes once the next chunk would overflow the window", () => {
    const bp = controller(300);
    bp.onChunkSent(100);
    bp.onChunkSent(100);
    expect(bp.canSend(100)).toBe(true);
    bp.onChunkSent(100);
    expect(bp.canSend(100)).toBe(false);
    expect(bp.canSend()).toBe(false);

    bp.onChunkAcked(100);
    expect(bp.canSend(100)).toBe(true);
    expect(bp.canSend()).toBe(true);
  });

  it("stays open while below the window without a size", () => {
    const bp = controller(100);
    bp.onChunkSent(99);
    expect(bp.canSend()).toBe(true);
    expect(bp.canSend(2)).toBe(false);
  });

  it("lets bytes in flight exceed the window", () => {
    const bp = controller(100);
    bp.onChunkSent(150);
    expect(bp.bytesInFlight).toBe(150);
    expect(bp.availableWindow()).toBe(0);
  });

  it("floors acks at zero", () => {
    const bp = controller(100);
    bp.onChunkSent(30);
    bp.onChunkAcked(50);
    expect(bp.bytesInFlight).toBe(0);
  });

  it("resets", () => {
    const bp = controller(100);
    bp.onChunkSent(100);
    bp.reset();
    expect(bp.bytesInFlight).toBe(0);
    expect(bp.canSend(100)).toBe(true);
  });

  it("rejects negative and fractional sizes", () => {
    const bp = controller(100);
    expect(() => bp.onChunkSent(-1)).toThrow(RangeError);
    expect(() => bp.onChunkAcked(1.5)).toThrow("size must be a non-negative integer, got 1.5");
    expect(() => bp.canSend(-3)).toThrow(RangeError);
    expect(() => controller(-1)).toThrow(RangeError);
  });
});
