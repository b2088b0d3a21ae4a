import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { registerSignalHandlers } from "./signal-handler.js";

describe("registerSignalHandlers", () => {
  let exitSpy: MockInstance<typeof process.exit>;
  let unregister: (() => void) | null = null;

  beforeEach(() => {
    vi.useFakeTimers();
    exitSpy = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);
  });

  afterEach(() => {
    unregister?.();
    unregister = null;
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  /** Register and return the listener that was added for `signal`. */
  function register(
    cleanup: () => Promise<void>,
    options?: Parameters<typeof registerSignalHandlers>[1],
    signal: NodeJS.Signals = "SIGTERM",
  ): (signal: NodeJS.Signals) => void {
    const before = process.listeners(signal);
    unregister = registerSignalHandlers(cleanup, options);
    const added = process.listeners(signal).find((listener) => !before.includes(listener));
    if (!added) throw new Error(`no handler registered for ${signal}`);
    return (sig) => {
      added(sig);
    };
  }

  it("registers SIGTERM and SIGINT handlers", () => {
    const beforeTerm = process.listenerCount("SIGTERM");
    const beforeInt = process.listenerCount("SIGINT");
    unregister = registerSignalHandlers(vi.fn().mockResolvedValue(undefined));

    expect(process.listenerCount("SIGTERM")).toBe(beforeTerm + 1);
    expect(process.listenerCount("SIGINT")).toBe(beforeInt + 1);
  });

  it("calls cleanup and then process.exit(0)", async () => {
    const cleanup = vi.fn().mockResolvedValue(undefined);
    const handler = register(cleanup);

    handler("SIGTERM");
    await vi.advanceTimersByTimeAsync(0);

    expect(cleanup).toHaveBeenCalledOnce();
    expect(exitSpy).toHaveBeenCalledWith(0);
  });

  it("calls process.exit(0) even when cleanup throws", async () => {
    const error = vi.fn();
    const cleanup = vi.fn().mockRejectedValue(new Error("cleanup failed"));
    const handler = register(cleanup, { logger: { info: vi.fn(), warn: vi.fn(), error } });

    handler("SIGTERM");
    await vi.advanceTimersByTimeAsync(0);

    expect(error).toHaveBeenCalledWith("Shutdown cleanup failed", expect.anything());
    expect(exitSpy).toHaveBeenCalledWith(0);
  });

  it("force-exits with code 1 when cleanup stalls", async () => {
    const cleanup = vi.fn().mockReturnValue(new Promise<void>(() => {}));
    const handler = register(cleanup, { timeoutMs: 5_000 });

    handler("SIGTERM");
    await vi.advanceTimersByTimeAsync(5_000);

    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("ignores a second signal while shutting down", async () => {
    const cleanup = vi.fn().mockReturnValue(new Promise<void>(() => {}));
    const handler = register(cleanup);

    handler("SIGTERM");
    handler("SIGINT");
    await vi.advanceTimersByTimeAsync(0);

    expect(cleanup).toHaveBeenCalledOnce();
  });

  it("returned function removes the handlers", () => {
    const before = process.listenerCount("SIGTERM");
    const remove = registerSignalHandlers(vi.fn().mockResolvedValue(undefined));

    remove();

    expect(process.listenerCount("SIGTERM")).toBe(before);
  });
});
