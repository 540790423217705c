// Sending side of one stream.

import { encodeUtf8 } from "@lnmp/binary";
import { createLogger, LogNamespace, type Logger } from "../logging.ts";
import { encodeStreamingFrame } from "./frame.ts";
import {
  EncoderState,
  FrameType,
  StreamFlags,
  StreamingError,
  resolveStreamingConfig,
  type Sequence,
  type StreamingConfig,
} from "./types.ts";

export interface StreamingEncoderOptions extends Partial<StreamingConfig> {
  logger?: Logger;
}

/**
 * Turns one payload into BEGIN, CHUNK*, END frames.
 *
 * States: Idle → Started (beginStream) → Streaming (writeChunk)*
 * → Ended (endStream) | Errored (errorFrame). Calls outside that order
 * throw and leave the state unchanged.
 *
 * @example
 * ```typescript
 * const frames = new StreamingEncoder({ chunkSize: 1024 }).encodePayload(bytes);
 * for (const frame of frames) transport.send(frame);
 * ```
 */
export class StreamingEncoder {
  readonly config: StreamingConfig;
  private _state: EncoderState = EncoderState.Idle;
  private sequence: Sequence = 0n;
  private readonly log: Logger;

  constructor(options: StreamingEncoderOptions = {}) {
    this.config = resolveStreamingConfig(options);
    this.log = options.logger ?? createLogger(LogNamespace.Stream);
  }

  get state(): EncoderState {
    return this._state;
  }

  private nextSequence(): Sequence {
    const seq = this.sequence;
    this.sequence += 1n;
    return seq;
  }

  /** Fail unless a BEGIN has been sent and the stream is still open. */
  private ensureOpen(): void {
    switch (this._state) {
      case EncoderState.Idle:
        throw StreamingError.notStarted();
      case EncoderState.Ended:
        throw StreamingError.alreadyComplete();
      case EncoderState.Errored:
        throw StreamingError.errored();
      default:
        return;
    }
  }

  beginStream(): Uint8Array {
    if (this._state !== EncoderState.Idle) throw StreamingError.unexpectedFrame(FrameType.Begin, this._state);
    const frame = encodeStreamingFrame({
      type: FrameType.Begin,
      flags: 0,
      streamId: this.config.streamId,
      sequence: this.nextSequence(),
      payload: new Uint8Array(0),
    });
    this._state = EncoderState.Started;
    this.log.debug("begin", { streamId: this.config.streamId });
    return frame;
  }

  /**
   * One CHUNK frame. `hasMore` sets HAS_MORE, telling the receiver more
   * chunks follow.
   */
  writeChunk(chunk: Uint8Array, hasMore = false): Uint8Array {
    this.ensureOpen();
    if (chunk.length > this.config.chunkSize) {
      throw StreamingError.chunkSizeExceeded(chunk.length, this.config.chunkSize);
    }
    let flags = hasMore ? StreamFlags.HAS_MORE : 0;
    if (this.config.enableChecksums) flags |= StreamFlags.CHECKSUM;
    const sequence = this.nextSequence();
    const frame = encodeStreamingFrame({
      type: FrameType.Chunk,
      flags,
      streamId: this.config.streamId,
      sequence,
      payload: chunk,
    });
    this._state = EncoderState.Streaming;
    this.log.debug("chunk", { streamId: this.config.streamId, sequence, size: chunk.length });
    return frame;
  }

  endStream(): Uint8Array {
    this.ensureOpen();
    const frame = encodeStreamingFrame({
      type: FrameType.End,
      flags: 0,
      streamId: this.config.streamId,
      sequence: this.nextSequence(),
      payload: new Uint8Array(0),
    });
    this._state = EncoderState.Ended;
    this.log.debug("end", { streamId: this.config.streamId, frames: this.sequence });
    return frame;
  }

  /** Abort the stream, telling the receiver why. */
  errorFrame(message: string): Uint8Array {
    if (this._state === EncoderState.Ended) throw StreamingError.alreadyComplete();
    if (this._state === EncoderState.Errored) throw StreamingError.errored();
    const frame = encodeStreamingFrame({
      type: FrameType.Error,
      flags: 0,
      streamId: this.config.streamId,
      sequence: this.nextSequence(),
      payload: encodeUtf8(message),
    });
    this._state = EncoderState.Errored;
    this.log.warn("error frame", { streamId: this.config.streamId, message });
    return frame;
  }

  /**
   * Every frame for `payload`: BEGIN, one CHUNK per `chunkSize` slice
   * (HAS_MORE on all but the last), END. Requires an Idle encoder.
   */
  encodePayload(payload: Uint8Array): Uint8Array[] {
    const frames = [this.beginStream()];
    const size = this.config.chunkSize;
    for (let off = 0; off < payload.length; off += size) {
      const end = Math.min(off + size, payload.length);
      frames.push(this.writeChunk(payload.subarray(off, end), end < payload.length));
    }
    frames.push(this.endStream());
    return frames;
  }

  /** Back to Idle, sequence 0, for the next stream. */
  reset(): void {
    this._state = EncoderState.Idle;
    this.sequence = 0n;
  }
}
