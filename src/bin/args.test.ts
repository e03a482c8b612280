import { describe, expect, it } from "vitest";
import { CliUsageError, DEFAULT_TICK_MS, parseArgs } from "./args.js";

describe("parseArgs", () => {
  it("shows help without a command", () => {
    expect(parseArgs([])).toEqual({ command: "help" });
    expect(parseArgs(["-h"])).toEqual({ command: "help" });
    expect(parseArgs(["--version"])).toEqual({ command: "version" });
  });

  describe("serve", () => {
    it("uses defaults when no options are given", () => {
      expect(parseArgs(["serve"])).toEqual({
        command: "serve",
        config: {},
        tickMs: DEFAULT_TICK_MS,
        apiKey: undefined,
        verbose: false,
      });
    });

    it("maps flags onto the config", () => {
      const parsed = parseArgs([
        "serve",
        "--port",
        "9000",
        "--path",
        "/stream",
        "--interval",
        "250",
        "--heartbeat",
        "0",
        "--retry",
        "3000",
        "--strict",
        "-v",
      ]);

      expect(parsed).toEqual({
        command: "serve",
        config: {
          port: 9000,
          path: "/stream",
          heartbeatIntervalMs: 0,
          retryMs: 3000,
          strictProtocol: true,
        },
        tickMs: 250,
        apiKey: undefined,
        verbose: true,
      });
    });

    it("takes the API key from the environment unless given explicitly", () => {
      const env = { EVENTWIRE_API_KEY: "test-secret" };
      expect(parseArgs(["serve"], env)).toMatchObject({ apiKey: "test-secret" });
      expect(parseArgs(["serve", "--api-key", "other-secret"], env)).toMatchObject({
        apiKey: "other-secret",
      });
    });

    it("rejects malformed numbers", () => {
      expect(() => parseArgs(["serve", "--port", "abc"])).toThrow(
        new CliUsageError('--port requires a non-negative integer, got "abc"'),
      );
      expect(() => parseArgs(["serve", "--interval", "0"])).toThrow(CliUsageError);
    });

    it("rejects a flag without its value", () => {
      expect(() => parseArgs(["serve", "--path"])).toThrow("--path requires a value");
      expect(() => parseArgs(["serve", "--port", "--strict"])).toThrow("--port requires a value");
    });

    it("rejects unknown options", () => {
      expect(() => parseArgs(["serve", "--tunnel"])).toThrow("Unknown option: --tunnel");
    });

    it("maps event default flags onto the config", () => {
      expect(parseArgs(["serve", "--auto-id", "--event-type", "update"])).toMatchObject({
        config: { autoEventId: true, defaultEventType: "update" },
      });
    });

    it("rejects values the config schema refuses", () => {
      expect(() => parseArgs(["serve", "--port", "70000"])).toThrow(/^--port: /);
      expect(() => parseArgs(["serve", "--path", "events"])).toThrow(
        "--path: must start with /",
      );
    });
  });

  describe("listen", () => {
    it("parses the URL and client settings", () => {
      expect(
        parseArgs([
          "listen",
          "http://127.0.0.1:8080/events",
          "--timeout",
          "500",
          "--connect-timeout",
          "2000",
          "--max-buffer",
          "4096",
        ]),
      ).toEqual({
        command: "listen",
        url: "http://127.0.0.1:8080/events",
        config: { readTimeoutMs: 500, connectTimeoutMs: 2000, maxBufferSize: 4096 },
        verbose: false,
      });
    });

    it("leaves unset client settings to the defaults", () => {
      expect(parseArgs(["listen", "http://127.0.0.1/events"])).toEqual({
        command: "listen",
        url: "http://127.0.0.1/events",
        config: {},
        verbose: false,
      });
    });

    it("rejects a zero read timeout", () => {
      expect(() => parseArgs(["listen", "http://127.0.0.1/events", "--timeout", "0"])).toThrow(
        CliUsageError,
      );
      expect(() => parseArgs(["listen", "http://127.0.0.1/events", "--timeout", "0"])).toThrow(
        /^--timeout: /,
      );
    });

    it("rejects a zero connect timeout or buffer size", () => {
      expect(() =>
        parseArgs(["listen", "http://127.0.0.1/events", "--connect-timeout", "0"]),
      ).toThrow(/^--connect-timeout: /);
      expect(() => parseArgs(["listen", "http://127.0.0.1/events", "--max-buffer", "0"])).toThrow(
        /^--max-buffer: /,
      );
    });

    it("requires a valid URL", () => {
      expect(() => parseArgs(["listen"])).toThrow("listen requires a URL");
      expect(() => parseArgs(["listen", "not a url"])).toThrow("Invalid URL: not a url");
    });

    it("rejects a second positional argument", () => {
      expect(() => parseArgs(["listen", "http://a/", "http://b/"])).toThrow(
        "Unknown option: http://b/",
      );
    });
  });

  it("rejects unknown commands", () => {
    const error = (() => {
      try {
        parseArgs(["publish"]);
      } catch (err) {
        return err;
      }
    })();
    expect(error).toBeInstanceOf(CliUsageError);
    expect(error).toHaveProperty("code", "USAGE");
  });
});
