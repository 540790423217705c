// Receiving side of one stream.

import { ByteReadError, concat, decodeUtf8 } from "@lnmp/binary";
import { createLogger, LogNamespace, type Logger } from "../logging.ts";
import { decodeStreamingFrame, hasFlag, verifyChecksum, type StreamingFrame } from "./frame.ts";
import {
  DecoderState,
  FrameType,
  StreamFlags,
  StreamingError,
  resolveStreamingConfig,
  type Sequence,
  type StreamEvent,
  type StreamId,
  type StreamingConfig,
} from "./types.ts";

export interface StreamingDecoderOptions extends Partial<Omit<StreamingConfig, "streamId" | "chunkSize">> {
  logger?: Logger;
}

/**
 * Reassembles one stream from its frames.
 *
 * States: WaitingBegin → Accumulating → Complete | Errored. Any failure
 * while waiting or accumulating moves to Errored and drops what was
 * buffered; `getCompletePayload()` only ever returns a whole payload.
 * Frames after Complete are refused without disturbing the payload.
 */
export class StreamingDecoder {
  readonly config: Omit<StreamingConfig, "streamId" | "chunkSize">;
  private _state: DecoderState = DecoderState.WaitingBegin;
  private streamId: StreamId | undefined;
  private nextSequence: Sequence = 0n;
  private chunks: Uint8Array[] = [];
  private totalBytes = 0;
  private payload: Uint8Array | undefined;
  private readonly log: Logger;

  constructor(options: StreamingDecoderOptions = {}) {
    const { enableChecksums, maxPayloadSize } = resolveStreamingConfig({
      enableChecksums: options.enableChecksums,
      maxPayloadSize: options.maxPayloadSize,
    });
    this.config = { enableChecksums, maxPayloadSize };
    this.log = options.logger ?? createLogger(LogNamespace.Stream);
  }

  get state(): DecoderState {
    return this._state;
  }

  /** Stream id taken from BEGIN, once one has arrived. */
  get activeStreamId(): StreamId | undefined {
    return this.streamId;
  }

  /** Bytes buffered so far. */
  get bufferedBytes(): number {
    return this.totalBytes;
  }

  /** Parse and apply one encoded frame. */
  feedFrame(bytes: Uint8Array): StreamEvent {
    this.ensureLive();
    let frame: StreamingFrame;
    try {
      frame = decodeStreamingFrame(bytes);
    } catch (e) {
      throw this.fail(e);
    }
    return this.apply(frame);
  }

  /** Apply a frame that was parsed elsewhere. */
  feed(frame: StreamingFrame): StreamEvent {
    this.ensureLive();
    return this.apply(frame);
  }

  /** The reassembled payload; undefined in every state but Complete. */
  getCompletePayload(): Uint8Array | undefined {
    return this._state === DecoderState.Complete ? this.payload : undefined;
  }

  reset(): void {
    this._state = DecoderState.WaitingBegin;
    this.streamId = undefined;
    this.nextSequence = 0n;
    this.chunks = [];
    this.totalBytes = 0;
    this.payload = undefined;
  }

  private ensureLive(): void {
    if (this._state === DecoderState.Complete) throw StreamingError.alreadyComplete();
    if (this._state === DecoderState.Errored) throw StreamingError.errored();
  }

  private apply(frame: StreamingFrame): StreamEvent {
    try {
      return this.handle(frame);
    } catch (e) {
      throw this.fail(e);
    }
  }

  /** Move to Errored and drop the buffer; returns the error to rethrow. */
  private fail(e: unknown): unknown {
    this._state = DecoderState.Errored;
    this.chunks = [];
    this.totalBytes = 0;
    this.payload = undefined;
    if (e instanceof Error) {
      this.log.warn("stream failed", { streamId: this.streamId, error: { name: e.name, message: e.message } });
    }
    return e;
  }

  private handle(frame: StreamingFrame): StreamEvent {
    if (frame.type === FrameType.Error) return this.handleError(frame);

    if (this._state === DecoderState.WaitingBegin) {
      if (frame.type !== FrameType.Begin) throw StreamingError.notStarted();
      return this.handleBegin(frame);
    }

    this.checkPlacement(frame);
    switch (frame.type) {
      case FrameType.Chunk:
        return this.handleChunk(frame);
      case FrameType.End:
        return this.handleEnd(frame);
      default:
        throw StreamingError.unexpectedFrame(frame.type, this._state);
    }
  }

  /** Stream id and sequence of a frame after BEGIN. */
  private checkPlacement(frame: StreamingFrame): void {
    if (this.streamId !== undefined && frame.streamId !== this.streamId) {
      throw StreamingError.streamMismatch(this.streamId, frame.streamId);
    }
    if (frame.sequence !== this.nextSequence) throw StreamingError.outOfOrder(this.nextSequence, frame.sequence);
    this.nextSequence += 1n;
  }

  private handleBegin(frame: StreamingFrame): StreamEvent {
    if (frame.sequence !== 0n) throw StreamingError.outOfOrder(0n, frame.sequence);
    if (frame.payload.length > 0) throw StreamingError.malformedFrame("BEGIN carries a payload");
    this.streamId = frame.streamId;
    this.nextSequence = 1n;
    this._state = DecoderState.Accumulating;
    this.log.debug("begin", { streamId: frame.streamId });
    return { tag: "StreamStarted", streamId: frame.streamId };
  }

  private handleChunk(frame: StreamingFrame): StreamEvent {
    if (hasFlag(frame, StreamFlags.CHECKSUM)) {
      const { ok, computed } = verifyChecksum(frame);
      if (!ok) throw StreamingError.checksumMismatch(frame.sequence, frame.checksum ?? 0, computed);
    } else if (this.config.enableChecksums) {
      throw StreamingError.checksumMissing(frame.sequence);
    }
    const total = this.totalBytes + frame.payload.length;
    if (total > this.config.maxPayloadSize) {
      throw StreamingError.payloadTooLarge(total, this.config.maxPayloadSize);
    }
    const bytes = frame.payload.slice();
    this.chunks.push(bytes);
    this.totalBytes = total;
    this.log.debug("chunk", { streamId: frame.streamId, sequence: frame.sequence, size: bytes.length });
    return { tag: "ChunkReceived", streamId: frame.streamId, sequence: frame.sequence, bytes };
  }

  private handleEnd(frame: StreamingFrame): StreamEvent {
    if (frame.payload.length > 0) throw StreamingError.malformedFrame("END carries a payload");
    this.payload = concat(...this.chunks);
    this.chunks = [];
    this._state = DecoderState.Complete;
    this.log.debug("complete", { streamId: frame.streamId, totalBytes: this.totalBytes });
    return { tag: "StreamComplete", streamId: frame.streamId, totalBytes: this.totalBytes };
  }

  /** The sender gave up; report why and stop. */
  private handleError(frame: StreamingFrame): StreamEvent {
    if (this._state === DecoderState.Accumulating) this.checkPlacement(frame);
    let message: string;
    try {
      message = decodeUtf8(frame.payload);
    } catch (e) {
      if (e instanceof ByteReadError) throw StreamingError.malformedFrame("ERROR message is not UTF-8");
      throw e;
    }
    this.fail(undefined);
    this.log.warn("peer error", { streamId: frame.streamId, message });
    return { tag: "StreamError", streamId: frame.streamId, message };
  }
}
