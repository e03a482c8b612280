/**
 * Runtime-agnostic transport capabilities. The server side writes text frames
 * into an {@link SseTransport}; the client side pulls bytes from a
 * {@link ByteSource}.
 * @module
 */

/** Sink for one push connection. Only the methods the writer actually uses. */
export interface SseTransport {
  /**
   * Emit the response status line and headers. Called at most once, before
   * any `send`. Returns false when the peer is already gone.
   */
  start?(status: number, headers: Readonly<Record<string, string>>): boolean;
  /** Deliver one chunk of already-framed text; false (or a rejection) means the peer is unusable. */
  send(chunk: string): boolean | Promise<boolean>;
  close(): void;
}

export type ReadChunk = { done: false; value: Uint8Array } | { done: true };

/** Pull-based byte stream, e.g. an HTTP response body. */
export interface ByteSource {
  /** Resolves the next chunk, or rejects on I/O failure or when `timeoutMs` elapses first. */
  read(timeoutMs: number): Promise<ReadChunk>;
  /** Abandon the stream and release the underlying connection. */
  cancel?(): void | Promise<void>;
}
