import { TypedEventEmitter } from "./typedEmitter";
import type { OutboundFrame } from "./transport/connection";

interface FrameDecoderEvents {
  frame: OutboundFrame;
  error: Error;
}

export interface FrameDecoderOptions {
  maxFrameLength?: number;
}

// u32 BE body length; the body starts with a kind byte.
const HEADER_LENGTH = 4;
const KIND_STREAM = 0;
const KIND_TAG = 1;
const TAG_LENGTH = 8;
const DEFAULT_MAX_FRAME_LENGTH = 64 * 1024 * 1024; // 64 MiB

export function encodeFrame(frame: OutboundFrame): Buffer {
  const prefix = frame.kind === "tag" ? 1 + TAG_LENGTH : 1;
  const header = Buffer.allocUnsafe(HEADER_LENGTH + prefix);
  header.writeUInt32BE(prefix + frame.data.byteLength, 0);
  if (frame.kind === "tag") {
    header.writeUInt8(KIND_TAG, HEADER_LENGTH);
    header.writeBigUInt64LE(frame.tag, HEADER_LENGTH + 1);
  } else {
    header.writeUInt8(KIND_STREAM, HEADER_LENGTH);
  }
  return Buffer.concat([header, frame.data]);
}

export class FrameDecoder extends TypedEventEmitter<FrameDecoderEvents> {
  private readonly maxFrameLength: number;
  private buffer: Buffer = Buffer.alloc(0);

  constructor(options?: FrameDecoderOptions) {
    super();
    this.maxFrameLength = options?.maxFrameLength ?? DEFAULT_MAX_FRAME_LENGTH;
  }

  push(chunk: Buffer): void {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    while (this.buffer.length >= HEADER_LENGTH) {
      const bodyLength = this.buffer.readUInt32BE(0);
      if (bodyLength > this.maxFrameLength || bodyLength === 0) {
        this.buffer = Buffer.alloc(0);
        this.emit(
          "error",
          new Error(`Frame length ${bodyLength} outside (0, ${this.maxFrameLength}]`),
        );
        return;
      }

      if (this.buffer.length < HEADER_LENGTH + bodyLength) break;

      const body = this.buffer.subarray(HEADER_LENGTH, HEADER_LENGTH + bodyLength);
      this.buffer = this.buffer.subarray(HEADER_LENGTH + bodyLength);
      const frame = this.decodeBody(body);
      if (!frame) return;
      this.emit("frame", frame);
    }
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }

  private decodeBody(body: Buffer): OutboundFrame | undefined {
    const kind = body.readUInt8(0);
    // Copy out: the socket may reuse the chunk's memory.
    if (kind === KIND_STREAM) {
      return { kind: "stream", data: new Uint8Array(body.subarray(1)) };
    }
    if (kind === KIND_TAG && body.length >= 1 + TAG_LENGTH) {
      return {
        kind: "tag",
        tag: body.readBigUInt64LE(1),
        data: new Uint8Array(body.subarray(1 + TAG_LENGTH)),
      };
    }
    this.buffer = Buffer.alloc(0);
    this.emit("error", new Error(`Unknown frame kind ${kind}`));
    return undefined;
  }
}
