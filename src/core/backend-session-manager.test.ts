import { describe, expect, it } from "vitest";
import { DialError } from "../errors.js";
import type { BackendDialer } from "../interfaces/backend-dialer.js";
import { FakeDialer } from "../testing/fake-dialer.js";
import { createMockLogger } from "../testing/mock-logger.js";
import { MockSocket } from "../testing/mock-socket.js";
import { BackendSessionManager } from "./backend-session-manager.js";

function setup(dialer: BackendDialer = new FakeDialer()) {
  const logger = createMockLogger();
  const manager = new BackendSessionManager({ dialer, logger, now: () => 42 });
  return { manager, logger };
}

describe("BackendSessionManager", () => {
  it("ensure dials once and then reuses the session", async () => {
    const dialer = new FakeDialer();
    const backendSocket = dialer.succeedWith();
    const { manager } = setup(dialer);

    const first = await manager.ensure();
    const second = await manager.ensure();

    expect(first.created).toBe(true);
    expect(first.session.socket).toBe(backendSocket);
    expect(first.session.connectedAt).toBe(42);
    expect(second.created).toBe(false);
    expect(second.session).toBe(first.session);
    expect(dialer.dialCount).toBe(1);
    expect(manager.stats).toEqual({ dialAttempts: 1, dialFailures: 0 });
  });

  it("leaves no session behind when the dial fails", async () => {
    const dialer = new FakeDialer();
    dialer.failNext("connect ECONNREFUSED");
    const { manager, logger } = setup(dialer);

    await expect(manager.ensure()).rejects.toBeInstanceOf(DialError);

    expect(manager.current).toBeNull();
    expect(manager.stats).toEqual({ dialAttempts: 1, dialFailures: 1 });
    expect(logger.warn).toHaveBeenCalledWith(
      "Backend dial failed",
      expect.objectContaining({ address: "ws://backend.test/stream" }),
    );
  });

  it("wraps foreign dial errors in DialError with the cause", async () => {
    const cause = new Error("boom");
    const dialer: BackendDialer = {
      address: "ws://other.test/",
      dial: () => Promise.reject(cause),
    };
    const { manager } = setup(dialer);

    const error = await manager.dial().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DialError);
    expect(error instanceof DialError && error.address).toBe("ws://other.test/");
    expect(error instanceof Error && error.cause).toBe(cause);
  });

  it("drop closes the socket with the given frame and clears the slot", async () => {
    const dialer = new FakeDialer();
    const backendSocket = dialer.succeedWith(new MockSocket("backend"));
    const { manager } = setup(dialer);
    const { session } = await manager.ensure();

    expect(manager.drop(1000, "No active clients")).toBe(session);

    expect(manager.current).toBeNull();
    expect(backendSocket.closedWith).toEqual({ code: 1000, reason: "No active clients" });
    expect(manager.drop()).toBeNull();
  });

  it("invalidate only clears the session it was given", async () => {
    const { manager } = setup();
    const { session: old } = await manager.ensure();
    manager.drop();
    const { session: fresh } = await manager.ensure();

    expect(manager.invalidate(old, "stale report")).toBe(false);
    expect(manager.current).toBe(fresh);

    expect(manager.invalidate(fresh, "closed with code 1006")).toBe(true);
    expect(manager.current).toBeNull();
  });
});
