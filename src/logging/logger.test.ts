import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, formatLogLine, parseLogLevel, serializeError } from "./logger.js";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("parses levels, falling back to info", () => {
    expect(parseLogLevel(" WARN ")).toBe("warn");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });

  it("writes bigints as decimal strings", () => {
    const line = JSON.parse(formatLogLine("info", "PERP_POSITION_OPENED", { value: 1000n }));
    expect(line).toMatchObject({ level: "info", event: "PERP_POSITION_OPENED", value: "1000" });
  });

  it("keeps the error code when serializing a coded error", () => {
    const err = Object.assign(new Error("nope"), { code: "PositionNotOpen" });
    expect(serializeError(err)).toEqual({ name: "Error", message: "nope", code: "PositionNotOpen" });
    expect(serializeError("plain")).toEqual({ message: "plain" });
  });

  it("drops entries below the threshold and sends warnings to stderr", () => {
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const log = createLogger("info");

    log.debug("HIDDEN");
    log.info("SHOWN");
    log.warn("WARNED");

    expect(stdout).toHaveBeenCalledTimes(1);
    expect(String(stdout.mock.calls[0]?.[0])).toContain('"event":"SHOWN"');
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0]?.[0])).toContain('"event":"WARNED"');
  });
});
