// Credit accounting for in-flight chunks.

import { createLogger, LogNamespace, type Logger } from "./logging.ts";

export const DEFAULT_WINDOW_SIZE = 65536;

function checkSize(what: string, size: number): void {
  if (!Number.isInteger(size) || size < 0) {
    throw new RangeError(`${what} must be a non-negative integer, got ${size}`);
  }
}

/**
 * Tracks bytes sent but not yet acknowledged against a fixed window.
 *
 * Pure bookkeeping: the caller polls `canSend` before writing and
 * reports sends and acks. Nothing here waits.
 */
export class BackpressureController {
  readonly windowSize: number;
  private inFlight = 0;
  private readonly log: Logger;

  constructor(windowSize = DEFAULT_WINDOW_SIZE, logger?: Logger) {
    checkSize("windowSize", windowSize);
    this.windowSize = windowSize;
    this.log = logger ?? createLogger(LogNamespace.Backpressure);
  }

  get bytesInFlight(): number {
    return this.inFlight;
  }

  /**
   * Without `size`: whether the window has any room left. With `size`:
   * whether a chunk of that many bytes fits.
   */
  canSend(size?: number): boolean {
    if (size === undefined) return this.inFlight < this.windowSize;
    checkSize("size", size);
    return this.inFlight + size <= this.windowSize;
  }

  availableWindow(): number {
    return Math.max(0, this.windowSize - this.inFlight);
  }

  onChunkSent(size: number): void {
    checkSize("size", size);
    const wasOpen = this.canSend();
    this.inFlight += size;
    if (wasOpen && !this.canSend()) {
      this.log.debug("window full", { bytesInFlight: this.inFlight, windowSize: this.windowSize });
    }
  }

  /** Release acknowledged bytes. Acks beyond what is in flight floor at zero. */
  onChunkAcked(size: number): void {
    checkSize("size", size);
    if (size > this.inFlight) {
      this.log.warn("ack exceeds bytes in flight", { size, bytesInFlight: this.inFlight });
    }
    const wasOpen = this.canSend();
    this.inFlight = Math.max(0, this.inFlight - size);
    if (!wasOpen && this.canSend()) {
      this.log.debug("window open", { bytesInFlight: this.inFlight, windowSize: this.windowSize });
    }
  }

  reset(): void {
    this.inFlight = 0;
  }
}
