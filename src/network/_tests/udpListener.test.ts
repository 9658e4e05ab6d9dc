import { describe, it, expect, vi, afterEach } from "vitest";
import { UdpListener } from "../udpListener";
import { SocketBindError } from "../../errors";
import { logger } from "../../logger";
import { FakeUdpSocket, flush } from "../../test-utils/fakes";

function makeListener(dispatch = vi.fn(async (_packet: Uint8Array) => {})) {
  const socket = new FakeUdpSocket();
  const listener = new UdpListener({ dispatch }, { host: "127.0.0.1", port: 12101, createSocket: () => socket.asSocket() });
  return { socket, listener, dispatch };
}

describe("network/UdpListener", () => {
  afterEach(() => { vi.restoreAllMocks(); });

  it("binds on the configured address and port", async () => {
    vi.spyOn(logger, "info").mockImplementation(() => {});
    const { listener } = makeListener();
    const addr = await listener.listen();
    expect(addr).toEqual({ address: "127.0.0.1", port: 12101, family: "IPv4" });
    await listener.close();
  });

  it("dispatches an independent copy of each datagram", async () => {
    vi.spyOn(logger, "info").mockImplementation(() => {});
    const { socket, listener, dispatch } = makeListener();
    await listener.listen();
    const data = Buffer.from("/midi-payload");
    socket.emit("message", data, { address: "127.0.0.1", port: 50000, family: "IPv4", size: data.length });
    data.fill(0);
    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(Buffer.from(dispatch.mock.calls[0][0]).toString()).toBe("/midi-payload");
    expect(listener.receivedCount()).toBe(1);
  });

  it("truncates a datagram to 1024 bytes and logs what it received", async () => {
    vi.spyOn(logger, "info").mockImplementation(() => {});
    const debug = vi.spyOn(logger, "debug").mockImplementation(() => {});
    const { socket, listener, dispatch } = makeListener();
    await listener.listen();
    socket.receive("/osc " + "x".repeat(1995), { address: "10.0.0.7", port: 41000 });
    expect(dispatch).toHaveBeenCalledTimes(1);
    const packet = dispatch.mock.calls[0][0];
    expect(packet.length).toBe(1024);
    expect(Buffer.from(packet).toString()).toBe("/osc " + "x".repeat(1019));
    expect(debug).toHaveBeenCalledWith(`Received /osc ${"x".repeat(1019)} from 10.0.0.7:41000`);
  });

  it("does not wait for a dispatch before handling the next datagram", async () => {
    vi.spyOn(logger, "info").mockImplementation(() => {});
    const dispatch = vi.fn((_packet: Uint8Array) => new Promise<void>(() => {}));
    const { socket, listener } = makeListener(dispatch);
    await listener.listen();
    socket.receive("/a");
    socket.receive("/b");
    socket.receive("/c");
    expect(dispatch).toHaveBeenCalledTimes(3);
  });

  it("keeps receiving after a socket error", async () => {
    vi.spyOn(logger, "info").mockImplementation(() => {});
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => {});
    const { socket, listener, dispatch } = makeListener();
    await listener.listen();
    socket.emit("error", new Error("ECONNREFUSED"));
    socket.receive("/midi");
    expect(warn).toHaveBeenCalledTimes(1);
    expect(socket.closed).toBe(false);
    expect(dispatch).toHaveBeenCalledTimes(1);
  });

  it("logs a failed dispatch", async () => {
    vi.spyOn(logger, "info").mockImplementation(() => {});
    const error = vi.spyOn(logger, "error").mockImplementation(() => {});
    const dispatch = vi.fn(async (_packet: Uint8Array): Promise<void> => { throw new Error("boom"); });
    const { socket, listener } = makeListener(dispatch);
    await listener.listen();
    socket.receive("/midi");
    await flush();
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toBe("Dispatch échoué (127.0.0.1:50000):");
  });

  it("fails with SocketBindError when the port cannot be bound", async () => {
    const { socket, listener } = makeListener();
    socket.bindError = new Error("EADDRINUSE");
    await expect(listener.listen()).rejects.toBeInstanceOf(SocketBindError);
    expect(socket.closed).toBe(true);
  });

  it("close closes the socket once", async () => {
    vi.spyOn(logger, "info").mockImplementation(() => {});
    const { socket, listener } = makeListener();
    await listener.listen();
    await listener.close();
    expect(socket.closed).toBe(true);
    await expect(listener.close()).resolves.toBeUndefined();
  });
});
