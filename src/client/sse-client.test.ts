import { describe, expect, it, vi } from "vitest";
import { HttpStatusError, StreamReadError, StreamTimeoutError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { SseEvent } from "../types/sse-event.js";
import { subscribe, type SubscribeOutcome } from "./sse-client.js";

const encoder = new TextEncoder();

const SSE_HEADERS = { "Content-Type": "text/event-stream", "Cache-Control": "no-cache" };

function streamOf(...chunks: string[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      controller.close();
    },
  });
}

function failureOf(outcome: SubscribeOutcome) {
  if (outcome.ok) throw new Error(`expected a failed outcome, got ${outcome.reason}`);
  return outcome.error;
}

function createSpyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

describe("subscribe", () => {
  it("opens the stream with SSE request headers and delivers events", async () => {
    const fetchMock = vi.fn<typeof fetch>(
      async () => new Response(streamOf("event: welcome\ndata: hi\n\n"), { headers: SSE_HEADERS }),
    );
    const events: SseEvent[] = [];

    const outcome = await subscribe("http://127.0.0.1:8080/events", (e) => void events.push(e), {
      fetch: fetchMock,
      headers: { Authorization: "Bearer test-token" },
    });

    expect(outcome).toEqual({ ok: true, reason: "eof", events: 1 });
    expect(events).toEqual([{ event: "welcome", data: "hi" }]);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://127.0.0.1:8080/events");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({
      Accept: "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
      Authorization: "Bearer test-token",
    });
  });

  it("reports a non-2xx status as HttpStatusError", async () => {
    const fetchMock = vi.fn<typeof fetch>(
      async () => new Response("busy", { status: 503, statusText: "Service Unavailable" }),
    );
    const onEvent = vi.fn();

    const outcome = await subscribe("http://127.0.0.1/events", onEvent, { fetch: fetchMock });

    const error = failureOf(outcome);
    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error.message).toBe("Unexpected HTTP status 503 Service Unavailable");
    expect(onEvent).not.toHaveBeenCalled();
  });

  it("logs a response that does not look like SSE and reads it anyway", async () => {
    const logger = createSpyLogger();
    const fetchMock = vi.fn<typeof fetch>(
      async () =>
        new Response(streamOf("data: x\n\n"), { headers: { "Content-Type": "text/plain" } }),
    );
    const events: SseEvent[] = [];

    const outcome = await subscribe("http://127.0.0.1/events", (e) => void events.push(e), {
      fetch: fetchMock,
      logger,
    });

    expect(outcome.ok).toBe(true);
    expect(events).toEqual([{ event: "message", data: "x" }]);
    expect(logger.warn).toHaveBeenCalledWith("Invalid SSE response", {
      contentType: "text/plain",
      cacheControl: undefined,
    });
  });

  it("fails with StreamReadError when the response has no body", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response(null, { headers: SSE_HEADERS }));

    const outcome = await subscribe("http://127.0.0.1/events", () => {}, { fetch: fetchMock });

    const error = failureOf(outcome);

    expect(error).toBeInstanceOf(StreamReadError);
    expect(error.message).toBe("SSE response has no body");
  });

  it("wraps a rejected request in StreamReadError", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw new TypeError("connection refused");
    });

    const outcome = await subscribe("http://127.0.0.1/events", () => {}, { fetch: fetchMock });

    const error = failureOf(outcome);

    expect(error).toBeInstanceOf(StreamReadError);
    expect(error.message).toBe("SSE request failed: connection refused");
  });

  it("gives up when response headers do not arrive within the connect timeout", async () => {
    const fetchMock = vi.fn<typeof fetch>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );

    const error = failureOf(
      await subscribe("http://127.0.0.1/events", () => {}, {
        fetch: fetchMock,
        connectTimeoutMs: 20,
      }),
    );

    expect(error).toBeInstanceOf(StreamTimeoutError);
    expect(error.message).toBe("No data received within 20ms");
  });
});
