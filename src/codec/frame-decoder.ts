/**
 * Incremental SSE frame decoder.
 *
 * Bytes arrive in arbitrary chunks that may split a frame, a line, a `\r\n`
 * pair, or a multi-byte UTF-8 character. The decoder keeps the unframed
 * residue between calls and only emits an event once its terminating blank
 * line has been seen, so feeding a payload byte by byte yields exactly the
 * events that feeding it in one call does.
 */

import { FrameTooLargeError } from "../errors.js";
import { DEFAULT_EVENT_TYPE, type SseEvent } from "../types/sse-event.js";

export const MAX_SSE_BUFFER_SIZE = 10 * 1024 * 1024; // 10 MB

export interface FrameDecoderOptions {
  /** Largest unframed residue (in characters) tolerated before failing. */
  maxBufferSize?: number;
}

export class FrameDecoder {
  private buffer = "";
  private scanFrom = 0;
  private trailingCR = false;
  private decoder = new TextDecoder("utf-8", { fatal: false });
  private readonly maxBufferSize: number;

  constructor(options: FrameDecoderOptions = {}) {
    this.maxBufferSize = options.maxBufferSize ?? MAX_SSE_BUFFER_SIZE;
  }

  /**
   * Feed raw bytes or text. Returns every event completed by this chunk, in
   * wire order; an empty array means more input is needed.
   * Throws {@link FrameTooLargeError} when the residue outgrows the limit.
   */
  feed(chunk: string | Uint8Array): SseEvent[] {
    const text = typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });
    this.buffer += this.normalize(text);

    const events: SseEvent[] = [];
    let start = 0;
    let boundary = this.buffer.indexOf("\n\n", this.scanFrom);
    while (boundary !== -1) {
      events.push(parseFrame(this.buffer.slice(start, boundary)));
      start = boundary + 2;
      boundary = this.buffer.indexOf("\n\n", start);
    }

    if (start > 0) this.buffer = this.buffer.slice(start);
    // A boundary may still straddle the last retained character and the next chunk.
    this.scanFrom = Math.max(0, this.buffer.length - 1);

    if (this.buffer.length > this.maxBufferSize) {
      throw new FrameTooLargeError(this.maxBufferSize);
    }
    return events;
  }

  /**
   * Decode whatever is left as a final, unterminated frame (end of stream).
   * Returns null when the residue holds nothing but whitespace. Resets the decoder.
   */
  flush(): SseEvent | null {
    const tail = this.normalize(this.decoder.decode());
    const remaining = this.buffer + tail;
    this.reset();
    if (remaining.trim().length === 0) return null;
    return parseFrame(remaining);
  }

  /** Discard any buffered residue. */
  reset(): void {
    this.buffer = "";
    this.scanFrom = 0;
    this.trailingCR = false;
    this.decoder = new TextDecoder("utf-8", { fatal: false });
  }

  /** Characters received but not yet resolved into a frame. */
  get pendingSize(): number {
    return this.buffer.length;
  }

  // Normalize \r\n and lone \r to \n, remembering a \r that ended the
  // previous chunk so a \r\n split across chunks is one line break, not two.
  private normalize(text: string): string {
    let chunk = text;
    if (chunk.length === 0) return chunk;
    if (this.trailingCR && chunk.startsWith("\n")) {
      chunk = chunk.slice(1);
    }
    this.trailingCR = text.endsWith("\r");
    return chunk.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
  }
}

/** Decode a complete payload in one go, including an unterminated last frame. */
export function decodeFrames(payload: string | Uint8Array): SseEvent[] {
  const decoder = new FrameDecoder({ maxBufferSize: Number.POSITIVE_INFINITY });
  const events = decoder.feed(payload);
  const last = decoder.flush();
  if (last) events.push(last);
  return events;
}

// ---------------------------------------------------------------------------
// Frame parser
// ---------------------------------------------------------------------------

function parseFrame(block: string): SseEvent {
  let id: string | undefined;
  let type: string | undefined;
  let retry: number | undefined;
  const dataLines: string[] = [];

  for (const line of block.split("\n")) {
    if (line === "" || line.startsWith(":")) continue;

    const colon = line.indexOf(":");
    // Not `key: value` and not a comment: skip the line, keep the frame.
    if (colon === -1) continue;

    const field = line.slice(0, colon).trim().toLowerCase();
    let value = line.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);

    switch (field) {
      case "data":
        dataLines.push(value);
        break;
      case "event":
        type = value.trim();
        break;
      case "id":
        id = value.trim();
        break;
      case "retry": {
        const trimmed = value.trim();
        if (/^\d+$/.test(trimmed)) retry = Number.parseInt(trimmed, 10);
        break;
      }
      default:
        break;
    }
  }

  const event: SseEvent = {
    event: type ? type : DEFAULT_EVENT_TYPE,
    data: dataLines.join("\n"),
  };
  if (id) event.id = id;
  if (retry !== undefined) event.retry = retry;
  return event;
}
