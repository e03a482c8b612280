import { errorMessage, StreamReadError, StreamTimeoutError } from "../errors.js";
import type { ByteSource, ReadChunk } from "../interfaces/transport.js";

/**
 * Adapt a WHATWG `ReadableStream` (e.g. a `fetch` response body) to a
 * {@link ByteSource}. Each read races the stream against its own timer.
 */
export function webStreamSource(body: ReadableStream<Uint8Array>): ByteSource {
  const reader = body.getReader();

  return {
    async read(timeoutMs: number): Promise<ReadChunk> {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new StreamTimeoutError(timeoutMs)), timeoutMs);
      });

      try {
        const result = await Promise.race([reader.read(), timeout]);
        return result.done ? { done: true } : { done: false, value: result.value };
      } catch (err) {
        if (err instanceof StreamTimeoutError) throw err;
        throw new StreamReadError(`SSE read failed: ${errorMessage(err)}`, { cause: err });
      } finally {
        clearTimeout(timer);
      }
    },

    async cancel(): Promise<void> {
      await reader.cancel();
    },
  };
}
