import { afterEach, describe, expect, it, vi } from "vitest";
import { ConsoleLogger } from "./console-logger.js";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses default prefix", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new ConsoleLogger();

    logger.info("hello");
    expect(spy).toHaveBeenCalledWith("[ws-proxy] hello");
  });

  it("uses custom prefix", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new ConsoleLogger("edge-proxy");

    logger.info("test");
    expect(spy).toHaveBeenCalledWith("[edge-proxy] test");
  });

  it("debug() calls console.debug when verbose", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = new ConsoleLogger();

    logger.debug("debug msg");
    expect(spy).toHaveBeenCalledWith("[ws-proxy] debug msg");
  });

  it("debug() is silent when not verbose", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = new ConsoleLogger("ws-proxy", { verbose: false });

    logger.debug("debug msg");
    expect(spy).not.toHaveBeenCalled();
  });

  it("warn() and error() use the matching console methods", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new ConsoleLogger();

    logger.warn("warn msg");
    logger.error("error msg");
    expect(warn).toHaveBeenCalledWith("[ws-proxy] warn msg");
    expect(error).toHaveBeenCalledWith("[ws-proxy] error msg");
  });

  it("passes context object when provided", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new ConsoleLogger();
    const ctx = { clientId: "abc", code: 1011 };

    logger.warn("with context", ctx);
    expect(spy).toHaveBeenCalledWith("[ws-proxy] with context", ctx);
  });

  it("child() extends the prefix and keeps verbosity", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const child = new ConsoleLogger("ws-proxy", { verbose: false }).child("backend");

    child.info("dialing", { attempt: 1 });
    child.debug("hidden");

    expect(log).toHaveBeenCalledWith("[ws-proxy:backend] dialing", { attempt: 1 });
    expect(debug).not.toHaveBeenCalled();
  });
});
