import type { SseTransport } from "../interfaces/transport.js";

export interface MockFn<A extends unknown[], R> {
  (...args: A): R;
  readonly calls: A[];
  mockImplementation(impl: (...args: A) => R): MockFn<A, R>;
  mockClear(): void;
}

// Simple mock function implementation (no vitest dependency for public API)
function createMockFn<A extends unknown[], R>(fallback: (...args: A) => R): MockFn<A, R> {
  const calls: A[] = [];
  let impl = fallback;
  const fn = (...args: A): R => {
    calls.push(args);
    return impl(...args);
  };
  const mock: MockFn<A, R> = Object.assign(fn, {
    calls,
    mockImplementation(next: (...args: A) => R): MockFn<A, R> {
      impl = next;
      return mock;
    },
    mockClear(): void {
      calls.length = 0;
    },
  });
  return mock;
}

export interface MockTransport extends SseTransport {
  start: MockFn<[status: number, headers: Readonly<Record<string, string>>], boolean>;
  send: MockFn<[chunk: string], boolean | Promise<boolean>>;
  close: MockFn<[], void>;
  /** Every chunk handed to `send`, in order. */
  readonly sentChunks: string[];
  /** Concatenation of `sentChunks`, i.e. the bytes a peer would have seen. */
  readonly written: string;
  readonly closed: boolean;
}

/** In-memory {@link SseTransport} that accepts everything until told otherwise. */
export function createMockTransport(): MockTransport {
  const start = createMockFn(
    (_status: number, _headers: Readonly<Record<string, string>>): boolean => true,
  );
  const send = createMockFn((_chunk: string): boolean | Promise<boolean> => true);
  const close = createMockFn((): void => {});

  return {
    start,
    send,
    close,
    get sentChunks(): string[] {
      return send.calls.map(([chunk]) => chunk);
    },
    get written(): string {
      return send.calls.map(([chunk]) => chunk).join("");
    },
    get closed(): boolean {
      return close.calls.length > 0;
    },
  };
}
