import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { RCONClient } from "./client";
import { FakeRCONServer } from "./fake-server";

describe("RCONClient", () => {
  let server: FakeRCONServer;
  let client: RCONClient;
  let port: number;

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    server = new FakeRCONServer({ handler: (command) => `echo:${command}` });
    port = await server.listen();
    client = new RCONClient({ host: "127.0.0.1", port, password: "test-secret", maxRetries: 1, retryDelayMs: 1 });
  });

  afterEach(async () => {
    await client.disconnect();
    await server.close();
    vi.restoreAllMocks();
  });

  test("should authenticate and return the command output", async () => {
    await client.connect();
    expect(client.isConnected()).toBe(true);

    const response = await client.sendCommand("/time");
    expect(response).toEqual({ success: true, data: "echo:/time" });
    expect(server.commands).toEqual(["/time"]);
  });

  test("should connect lazily on the first command", async () => {
    const response = await client.sendCommand("/version");
    expect(response.data).toBe("echo:/version");
  });

  test("should reject a wrong password", async () => {
    const intruder = new RCONClient({ host: "127.0.0.1", port, password: "wrong", maxRetries: 1 });
    await expect(intruder.connect()).rejects.toThrow(
      "Failed to connect after 1 attempts: Authentication failed - invalid password"
    );
    await intruder.disconnect();
  });

  test("should reassemble replies that arrive byte by byte", async () => {
    const slow = new FakeRCONServer({ trickle: true, handler: () => "{\"ok\":true}" });
    const slowPort = await slow.listen();
    const slowClient = new RCONClient({ host: "127.0.0.1", port: slowPort, password: "test-secret", maxRetries: 1 });

    const response = await slowClient.sendCommand("/sc rcon.print(1)");
    expect(response).toEqual({ success: true, data: "{\"ok\":true}" });

    await slowClient.disconnect();
    await slow.close();
  });

  test("should answer concurrent commands in submission order", async () => {
    const [first, second, third] = await Promise.all([
      client.sendCommand("a"),
      client.sendCommand("b"),
      client.sendCommand("c"),
    ]);

    expect([first.data, second.data, third.data]).toEqual(["echo:a", "echo:b", "echo:c"]);
    expect(server.commands).toEqual(["a", "b", "c"]);
  });

  test("should time out when the server never replies", async () => {
    server.setHandler(() => undefined);
    await client.connect();

    const response = await client.sendCommand("/hang", 50);
    expect(response).toEqual({ success: false, data: "", error: "Command timeout after 50ms" });
  });

  test("should reconnect after the server drops the connection", async () => {
    await client.connect();
    server.dropConnections();
    await vi.waitFor(() => expect(client.isConnected()).toBe(false));

    const response = await client.sendCommand("/again");
    expect(response).toEqual({ success: true, data: "echo:/again" });
  });

  test("should fail the pending command on an oversized frame and recover", async () => {
    const oversized = Buffer.alloc(12);
    oversized.writeInt32LE(2 * 1024 * 1024, 0);
    server.setHandler(() => oversized);
    await client.connect();

    const response = await client.sendCommand("/huge");
    expect(response).toEqual({ success: false, data: "", error: "Invalid RCON packet length: 2097152" });
    await vi.waitFor(() => expect(client.isConnected()).toBe(false));

    server.setHandler((command) => `echo:${command}`);
    await expect(client.sendCommand("/after")).resolves.toEqual({ success: true, data: "echo:/after" });
  });

  test("should explain how to enable RCON when the port is closed", async () => {
    const closed = new FakeRCONServer();
    const closedPort = await closed.listen();
    await closed.close();

    const orphan = new RCONClient({ host: "127.0.0.1", port: closedPort, password: "test-secret", maxRetries: 1 });
    await expect(orphan.connect()).rejects.toThrow(`Cannot connect to Factorio RCON (127.0.0.1:${closedPort})`);
    await orphan.disconnect();
  });

  test("should report a failed reconnect as an unsuccessful response", async () => {
    await server.close();

    const response = await client.sendCommand("/time");
    expect(response.success).toBe(false);
    expect(response.error).toContain("Not connected and reconnect failed");
  });
});
