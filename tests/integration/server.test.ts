import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from "vitest";
import { WebSocket } from "ws";
import { startRelayServer } from "../../src/server.js";
import type { RelayServer } from "../../src/server.js";
import { toBuffer } from "../../src/services/message-decoder.js";
import type { AppConfig } from "../../src/types.js";

const config: AppConfig = {
  port: 0,
  host: "127.0.0.1",
  wsPath: "/walkie",
  healthPath: "/health",
  talkPolicy: "open",
  recording: { enabled: false, directory: "recordings", sampleRate: 16000 },
};

interface TestClient {
  ws: WebSocket;
  messages: unknown[];
  frames: Buffer[];
}

async function waitFor(predicate: () => boolean, timeoutMs = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error("Timed out waiting for condition");
    await new Promise((r) => setTimeout(r, 10));
  }
}

describe("Relay server (real server)", () => {
  let relay: RelayServer;
  let clients: TestClient[] = [];

  async function connect(): Promise<TestClient> {
    const ws = new WebSocket(`ws://127.0.0.1:${relay.port}/walkie`);
    const client: TestClient = { ws, messages: [], frames: [] };
    ws.on("message", (data, isBinary) => {
      const buf = toBuffer(data);
      if (isBinary) {
        client.frames.push(buf);
      } else {
        client.messages.push(JSON.parse(buf.toString("utf8")));
      }
    });
    await new Promise<void>((resolve, reject) => {
      ws.once("open", () => resolve());
      ws.once("error", reject);
    });
    clients.push(client);
    // welcome
    await waitFor(() => client.messages.length >= 1);
    return client;
  }

  async function register(client: TestClient, device: string): Promise<void> {
    client.ws.send(JSON.stringify({ type: "register", device }));
    await waitFor(() =>
      client.messages.some(
        (m) => typeof m === "object" && m !== null && "type" in m && m.type === "registered",
      ),
    );
  }

  beforeAll(async () => {
    relay = await startRelayServer(config);
  });

  afterEach(async () => {
    for (const { ws } of clients) ws.close();
    await waitFor(() => relay.hub.registry.size === 0);
    clients = [];
  });

  afterAll(async () => {
    await relay.close();
  });

  it("should respond to the health probe with OK", async () => {
    const res = await fetch(`http://127.0.0.1:${relay.port}/health`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("OK");
  });

  it("should serve the banner on other paths", async () => {
    const res = await fetch(`http://127.0.0.1:${relay.port}/`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("Push-to-talk relay server");
  });

  it("should report status as JSON", async () => {
    await connect();
    const res = await fetch(`http://127.0.0.1:${relay.port}/status`);
    expect(await res.json()).toEqual({
      clients: 1,
      transmitter: null,
      policy: "open",
    });
  });

  it("should welcome a new connection", async () => {
    const a = await connect();
    expect(a.messages[0]).toEqual({
      type: "welcome",
      message: "Connected to push-to-talk relay",
      clients: 1,
    });
  });

  it("should reject upgrades on other paths", async () => {
    const ws = new WebSocket(`ws://127.0.0.1:${relay.port}/elsewhere`);
    const failed = await new Promise<boolean>((resolve) => {
      ws.on("open", () => resolve(false));
      ws.on("error", () => resolve(true));
    });
    expect(failed).toBe(true);
  });

  it("should relay a binary frame to the peer but not back to the sender", async () => {
    const a = await connect();
    const b = await connect();
    await register(a, "Alice");
    await register(b, "Bob");

    const frame = Buffer.alloc(512, 0x11);
    a.ws.send(frame);

    await waitFor(() => b.frames.length === 1);
    await new Promise((r) => setTimeout(r, 100));
    expect(b.frames[0]).toEqual(frame);
    expect(a.frames).toEqual([]);
  });

  it("should notify peers and keep frame order across a transmission", async () => {
    const a = await connect();
    const b = await connect();
    const c = await connect();
    await register(a, "Alice");

    a.ws.send(JSON.stringify({ type: "start_transmission" }));
    const frames = Array.from({ length: 10 }, (_, i) => Buffer.alloc(32, i));
    for (const frame of frames) a.ws.send(frame);
    a.ws.send(JSON.stringify({ type: "end_transmission" }));

    for (const peer of [b, c]) {
      await waitFor(() => peer.messages.length === 3);
      expect(peer.messages.slice(1)).toEqual([
        { type: "transmission_started", device: "Alice" },
        { type: "transmission_ended", device: "Alice" },
      ]);
      expect(peer.frames).toEqual(frames);
    }
    expect(a.frames).toEqual([]);
  });

  it("should clear the transmitter when it disconnects mid-transmission", async () => {
    const a = await connect();
    const b = await connect();
    a.ws.send(JSON.stringify({ type: "start_transmission" }));
    await waitFor(() => relay.hub.tracker.getTransmitter() !== null);

    a.ws.close();
    await waitFor(() => relay.hub.registry.size === 1);

    expect(relay.hub.tracker.isIdle()).toBe(true);
    b.ws.send(JSON.stringify({ type: "start_transmission" }));
    await waitFor(() => relay.hub.tracker.getTransmitter() !== null);
    expect(relay.hub.getStatus().transmitter).toBe("unknown");
  });

  it("should keep the connection open after invalid JSON", async () => {
    const a = await connect();
    const b = await connect();

    a.ws.send("not valid json");
    a.ws.send(Buffer.from([1, 2, 3]));

    await waitFor(() => b.frames.length === 1);
    expect(b.frames[0]).toEqual(Buffer.from([1, 2, 3]));
    expect(a.ws.readyState).toBe(WebSocket.OPEN);
    expect(relay.hub.registry.size).toBe(2);
  });

  it("should drop a session whose socket errors", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const a = await connect();
    const b = await connect();

    // The server rejects unmasked client frames with a protocol error
    a.ws.send(Buffer.from([1, 2]), { mask: false });

    await waitFor(() => relay.hub.registry.size === 1);
    expect(error).toHaveBeenCalledWith(
      expect.stringContaining("Invalid WebSocket frame: MASK must be set"),
    );
    expect(b.frames).toEqual([]);
    error.mockRestore();
  });
});
