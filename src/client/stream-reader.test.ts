import { describe, expect, it, vi } from "vitest";
import { FrameTooLargeError, StreamReadError, StreamTimeoutError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { ByteSource } from "../interfaces/transport.js";
import { createMemorySource } from "../testing/memory-source.js";
import type { SseEvent } from "../types/sse-event.js";
import { readEventStream, type StreamOutcome } from "./stream-reader.js";

function failureOf(outcome: StreamOutcome) {
  if (outcome.ok) throw new Error(`expected a failed outcome, got ${outcome.reason}`);
  return outcome.error;
}

async function collect(
  chunks: string[],
  options: { skipEmpty?: boolean; maxBufferSize?: number } = {},
): Promise<{ events: SseEvent[]; outcome: StreamOutcome }> {
  const events: SseEvent[] = [];
  const outcome = await readEventStream(
    createMemorySource(chunks),
    (event) => {
      events.push(event);
    },
    { readTimeoutMs: 1000, ...options },
  );
  return { events, outcome };
}

describe("readEventStream", () => {
  it("delivers events in wire order and reports end of stream", async () => {
    const { events, outcome } = await collect(["event: a\ndata: 1\n\n", "data: 2\n\n"]);

    expect(events).toEqual([
      { event: "a", data: "1" },
      { event: "message", data: "2" },
    ]);
    expect(outcome).toEqual({ ok: true, reason: "eof", events: 2 });
  });

  it("reports the id of the most recent event that carried one", async () => {
    const { outcome } = await collect(["id: 1\ndata: a\n\n", "id: 2\ndata: b\n\ndata: c\n\n"]);

    expect(outcome).toEqual({ ok: true, reason: "eof", events: 3, lastEventId: "2" });
  });

  it("keeps the last event id on a failed outcome", async () => {
    const outcome = await readEventStream(
      createMemorySource(["id: evt-7\ndata: early\n\n"], { stall: true }),
      () => {},
      { readTimeoutMs: 250 },
    );

    expect(outcome.ok).toBe(false);
    expect(outcome.lastEventId).toBe("evt-7");
    expect(outcome.events).toBe(1);
  });

  it("reassembles frames split across reads", async () => {
    const { events } = await collect(["data: hel", "lo\n", "\n"]);
    expect(events).toEqual([{ event: "message", data: "hello" }]);
  });

  it("surfaces a trailing frame without a blank line at end of stream", async () => {
    const { events, outcome } = await collect(["data: a\n\ndata: tail"]);

    expect(events.map((e) => e.data)).toEqual(["a", "tail"]);
    expect(outcome).toEqual({ ok: true, reason: "eof", events: 2 });
  });

  it("delivers keep-alive comments as empty events unless skipped", async () => {
    const payload = [": ping\n\ndata: x\n\n"];

    expect((await collect(payload)).events).toEqual([
      { event: "message", data: "" },
      { event: "message", data: "x" },
    ]);
    expect((await collect(payload, { skipEmpty: true })).events).toEqual([
      { event: "message", data: "x" },
    ]);
  });

  it("stops when the callback returns false and releases the source", async () => {
    const source = createMemorySource(["data: 1\n\ndata: 2\n\n", "data: 3\n\n"]);
    const seen: string[] = [];

    const outcome = await readEventStream(
      source,
      (event) => {
        seen.push(event.data);
        return false;
      },
      { readTimeoutMs: 1000 },
    );

    expect(outcome).toEqual({ ok: true, reason: "stopped", events: 1 });
    expect(seen).toEqual(["1"]);
    expect(source.cancelled).toBe(true);
    expect(source.reads).toBe(1);
  });

  it("honours an asynchronous stop", async () => {
    const outcome = await readEventStream(
      createMemorySource(["data: 1\n\ndata: 2\n\n"]),
      async (event) => event.data !== "2",
      { readTimeoutMs: 1000 },
    );
    expect(outcome).toEqual({ ok: true, reason: "stopped", events: 2 });
  });

  it("reports a timeout after delivering what arrived before it", async () => {
    const source = createMemorySource(["data: early\n\n"], { stall: true });
    const seen: string[] = [];

    const outcome = await readEventStream(source, (event) => void seen.push(event.data), {
      readTimeoutMs: 250,
    });

    const error = failureOf(outcome);
    expect(error).toBeInstanceOf(StreamTimeoutError);
    expect(error.code).toBe("TIMEOUT");
    expect(error.message).toBe("No data received within 250ms");
    expect(outcome.events).toBe(1);
    expect(seen).toEqual(["early"]);
    expect(source.cancelled).toBe(true);
  });

  it("wraps a read failure in StreamReadError", async () => {
    const cause = new Error("ECONNRESET");
    const outcome = await readEventStream(
      createMemorySource([], { failWith: cause }),
      () => {},
      { readTimeoutMs: 1000 },
    );

    const error = failureOf(outcome);
    expect(error).toBeInstanceOf(StreamReadError);
    expect(error.code).toBe("READ_FAILED");
    expect(error.message).toBe("SSE read failed: ECONNRESET");
    expect(error.cause).toBe(cause);
  });

  it("reports an oversized frame as FrameTooLargeError", async () => {
    const { outcome } = await collect(["data: this frame never ends"], { maxBufferSize: 8 });

    const error = failureOf(outcome);
    expect(error).toBeInstanceOf(FrameTooLargeError);
    expect(error.code).toBe("FRAME_TOO_LARGE");
  });

  it("propagates a throwing callback after releasing the source", async () => {
    const source = createMemorySource(["data: boom\n\n"]);

    await expect(
      readEventStream(
        source,
        () => {
          throw new Error("handler bug");
        },
        { readTimeoutMs: 1000 },
      ),
    ).rejects.toThrow("handler bug");
    expect(source.cancelled).toBe(true);
  });

  it("logs a failed release without changing the outcome", async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
    const source: ByteSource = {
      read: async () => ({ done: true }),
      cancel: () => {
        throw new Error("already released");
      },
    };

    const outcome = await readEventStream(source, () => {}, { readTimeoutMs: 1000, logger });

    expect(outcome).toEqual({ ok: true, reason: "eof", events: 0 });
    expect(logger.warn).toHaveBeenCalledWith("Failed to release SSE source", {
      error: "already released",
    });
  });
});
