import type { IncomingMessage } from "http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import WebSocket, { WebSocketServer } from "ws";
import { SignalingFatalError, SignalingPeerAbsent } from "../errors.js";
import { createWebSocketTransport } from "./transport.js";
import type { SignalingTransport, SignalingTransportEvents } from "./types.js";

let wss: WebSocketServer | null = null;
let relaySocket: WebSocket | null = null;
let upgradeRequest: IncomingMessage | null = null;
const received: string[] = [];

async function startRelay(): Promise<string> {
  const server = new WebSocketServer({ port: 0, host: "127.0.0.1" });
  wss = server;
  server.on("connection", (socket, req) => {
    relaySocket = socket;
    upgradeRequest = req;
    socket.on("message", (data) => received.push(data.toString()));
  });
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (typeof address === "string") throw new Error("relay has no port");
  return `ws://127.0.0.1:${address.port}/ws`;
}

function relay(): WebSocket {
  if (!relaySocket) throw new Error("no client connected");
  return relaySocket;
}

function makeEvents() {
  return {
    onConnect: vi.fn(),
    onDisconnect: vi.fn(),
    onError: vi.fn<(err: Error) => void>(),
    onSdp: vi.fn(),
    onIce: vi.fn(),
    onSession: vi.fn(),
  } satisfies SignalingTransportEvents;
}

describe("createWebSocketTransport", () => {
  let transport: SignalingTransport | null = null;

  beforeEach(() => {
    received.length = 0;
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    transport?.close();
    transport = null;
    relaySocket = null;
    upgradeRequest = null;
    const server = wss;
    wss = null;
    if (server) {
      for (const client of server.clients) client.terminate();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });

  it("registers with HELLO and asks for a session", async () => {
    const url = await startRelay();
    const events = makeEvents();
    transport = createWebSocketTransport({ url }, { localId: "0", remotePeerId: "1" }, events);

    await transport.connect();
    await vi.waitFor(() => expect(received).toEqual(["HELLO 0"]));

    relay().send("HELLO");
    await vi.waitFor(() => expect(events.onConnect).toHaveBeenCalledTimes(1));

    transport.setupCall();
    await vi.waitFor(() => expect(received).toEqual(["HELLO 0", "SESSION 1"]));
  });

  it("sends basic auth credentials", async () => {
    const url = await startRelay();
    transport = createWebSocketTransport(
      { url, basicAuth: { user: "viewer", password: "test-secret" } },
      { localId: "0", remotePeerId: "1" },
      makeEvents()
    );

    await transport.connect();

    expect(upgradeRequest?.headers.authorization).toBe(
      `Basic ${Buffer.from("viewer:test-secret").toString("base64")}`
    );
  });

  it("decodes session metadata", async () => {
    const url = await startRelay();
    const events = makeEvents();
    transport = createWebSocketTransport({ url }, { localId: "0", remotePeerId: "1" }, events);
    await transport.connect();
    await vi.waitFor(() => expect(received).toHaveLength(1));

    const meta = Buffer.from(JSON.stringify({ res: "1280x720", scale: 1.5 })).toString("base64");
    relay().send(`SESSION_OK ${meta}`);

    await vi.waitFor(() => expect(events.onSession).toHaveBeenCalledWith("1", { res: "1280x720", scale: 1.5 }));
  });

  it("reports a session without metadata", async () => {
    const url = await startRelay();
    const events = makeEvents();
    transport = createWebSocketTransport({ url }, { localId: "2", remotePeerId: "3" }, events);
    await transport.connect();
    await vi.waitFor(() => expect(received).toHaveLength(1));

    relay().send("SESSION_OK");

    await vi.waitFor(() => expect(events.onSession).toHaveBeenCalledWith("3", undefined));
  });

  it("reports an absent peer separately from other errors", async () => {
    const url = await startRelay();
    const events = makeEvents();
    transport = createWebSocketTransport({ url }, { localId: "0", remotePeerId: "1" }, events);
    await transport.connect();
    await vi.waitFor(() => expect(received).toHaveLength(1));

    relay().send("ERROR peer '1' not found");
    relay().send("ERROR something else");

    await vi.waitFor(() => expect(events.onError).toHaveBeenCalledTimes(2));
    const [absent, fatal] = events.onError.mock.calls.map(([err]) => err);
    expect(absent).toBeInstanceOf(SignalingPeerAbsent);
    expect(fatal).toBeInstanceOf(SignalingFatalError);
    expect(fatal?.message).toBe("unhandled signalling message: ERROR something else");
  });

  it("exchanges SDP and ICE as JSON", async () => {
    const url = await startRelay();
    const events = makeEvents();
    transport = createWebSocketTransport({ url }, { localId: "0", remotePeerId: "1" }, events);
    await transport.connect();
    await vi.waitFor(() => expect(received).toHaveLength(1));

    relay().send(JSON.stringify({ sdp: { type: "answer", sdp: "v=0" } }));
    relay().send(JSON.stringify({ ice: { candidate: "candidate:1", sdpMLineIndex: 0 } }));
    transport.sendSdp({ type: "offer", sdp: "v=0" });
    transport.sendIce({ candidate: "candidate:2", sdpMLineIndex: 1 });

    await vi.waitFor(() => expect(events.onIce).toHaveBeenCalledTimes(1));
    expect(events.onSdp).toHaveBeenCalledWith({ type: "answer", sdp: "v=0" });
    expect(events.onIce).toHaveBeenCalledWith({ candidate: "candidate:1", sdpMLineIndex: 0 });
    await vi.waitFor(() => expect(received).toHaveLength(3));
    expect(received.slice(1)).toEqual([
      '{"sdp":{"type":"offer","sdp":"v=0"}}',
      '{"ice":{"candidate":"candidate:2","sdpMLineIndex":1}}',
    ]);
  });

  it("treats unknown messages as fatal", async () => {
    const url = await startRelay();
    const events = makeEvents();
    transport = createWebSocketTransport({ url }, { localId: "0", remotePeerId: "1" }, events);
    await transport.connect();
    await vi.waitFor(() => expect(received).toHaveLength(1));

    relay().send("BOGUS");

    await vi.waitFor(() => expect(events.onError).toHaveBeenCalledTimes(1));
    expect(events.onError.mock.calls[0]?.[0]).toBeInstanceOf(SignalingFatalError);
  });

  it("reports a disconnect once", async () => {
    const url = await startRelay();
    const events = makeEvents();
    transport = createWebSocketTransport({ url }, { localId: "0", remotePeerId: "1" }, events);
    await transport.connect();
    await vi.waitFor(() => expect(received).toHaveLength(1));

    relay().close();

    await vi.waitFor(() => expect(events.onDisconnect).toHaveBeenCalledTimes(1));
    transport.close();
    expect(events.onDisconnect).toHaveBeenCalledTimes(1);
  });

  it("rejects connect when the relay is unreachable", async () => {
    const url = await startRelay();
    const server = wss;
    wss = null;
    if (server) await new Promise<void>((resolve) => server.close(() => resolve()));

    transport = createWebSocketTransport({ url }, { localId: "0", remotePeerId: "1" }, makeEvents());

    await expect(transport.connect()).rejects.toBeInstanceOf(SignalingFatalError);
  });
});
