import { describe, expect, it, vi } from "vitest";
import { createMockLogger } from "../testing/mock-logger.js";
import { MockSocket } from "../testing/mock-socket.js";
import type { BackendSession } from "./backend-session-manager.js";
import { MessageForwarder } from "./message-forwarder.js";
import { type ClientSession, SessionRegistry } from "./session-registry.js";

function setup(clientCount = 2) {
  const backendSocket = new MockSocket("backend");
  const backend: BackendSession = { id: "backend-1", socket: backendSocket, connectedAt: 0 };
  const registry = new SessionRegistry(() => 0);
  const clients = Array.from({ length: clientCount }, (_, i) =>
    registry.register(new MockSocket(`client-${i}`)),
  );
  const onDeliveryFailed = vi.fn<(client: ClientSession, err: unknown) => void>();
  const onBackendLost = vi.fn<(backend: BackendSession, reason: string) => void>();
  const logger = createMockLogger();
  const forwarder = new MessageForwarder({
    backend,
    recipients: () => registry.list(),
    onDeliveryFailed,
    onBackendLost,
    logger,
  });
  return {
    backend,
    backendSocket,
    registry,
    clients,
    forwarder,
    onDeliveryFailed,
    onBackendLost,
    logger,
  };
}

function socketOf(client: ClientSession): MockSocket {
  const { socket } = client;
  if (!(socket instanceof MockSocket)) throw new Error("expected a MockSocket");
  return socket;
}

async function flush(): Promise<void> {
  await new Promise((resolve) => setImmediate(resolve));
}

describe("MessageForwarder", () => {
  it("relays each backend frame to every registered client", async () => {
    const { backendSocket, clients, forwarder } = setup(3);
    forwarder.start();

    backendSocket.receive("tick-1");
    await flush();

    for (const client of clients) {
      expect(socketOf(client).sentText).toEqual(["tick-1"]);
    }
    expect(forwarder.forwardedCount).toBe(1);
  });

  it("preserves the frame type", async () => {
    const { backendSocket, clients, forwarder } = setup(1);
    forwarder.start();

    backendSocket.receive(Buffer.from([0x01, 0x02]));
    await flush();

    expect(socketOf(clients[0]).sent).toEqual([{ data: Buffer.from([0x01, 0x02]), binary: true }]);
  });

  it("reports a failed delivery and still reaches the other clients", async () => {
    const { clients, forwarder, onDeliveryFailed } = setup(2);
    const broken = new Error("client-0 write failed");
    socketOf(clients[0]).breakWrites(broken);

    await forwarder.broadcast({ data: Buffer.from("update"), binary: false });

    expect(onDeliveryFailed).toHaveBeenCalledWith(clients[0], broken);
    expect(socketOf(clients[1]).sentText).toEqual(["update"]);
  });

  it("reads the recipient list when each frame arrives", async () => {
    const { registry, clients, forwarder } = setup(1);
    const late = registry.register(new MockSocket("late"));

    await forwarder.broadcast({ data: Buffer.from("hello"), binary: false });

    expect(socketOf(clients[0]).sentText).toEqual(["hello"]);
    expect(socketOf(late).sentText).toEqual(["hello"]);
  });

  it("reports backend loss once with the close code and reason", () => {
    const { backend, backendSocket, forwarder, onBackendLost } = setup();
    forwarder.start();

    backendSocket.disconnect(1006, "abnormal");

    expect(onBackendLost).toHaveBeenCalledTimes(1);
    expect(onBackendLost).toHaveBeenCalledWith(backend, "closed with code 1006: abnormal");
    expect(forwarder.isActive).toBe(false);
  });

  it("logs backend errors while active", () => {
    const { backendSocket, forwarder, logger, onBackendLost } = setup();
    forwarder.start();

    backendSocket.fail(new Error("ECONNRESET"));

    expect(logger.warn).toHaveBeenCalledWith("Backend socket error", {
      backendId: "backend-1",
      error: expect.any(Error),
    });
    expect(onBackendLost).toHaveBeenCalledWith(expect.anything(), "closed with code 1006");
  });

  it("ignores the backend after stop", async () => {
    const { backendSocket, clients, forwarder, onBackendLost } = setup(1);
    forwarder.start();
    forwarder.stop();

    backendSocket.receive("late frame");
    backendSocket.close(1000, "No active clients");
    await flush();

    expect(socketOf(clients[0]).sent).toEqual([]);
    expect(onBackendLost).not.toHaveBeenCalled();
  });
});
