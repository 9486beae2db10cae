/**
 * In-process stand-in for a Factorio RCON endpoint, used by tests.
 *
 * Speaks the same framing as the real server: an empty response value
 * followed by the auth response on login, then one response packet per
 * command carrying the request id.
 */

import * as net from "net";
import { PacketDecoder, encodePacket } from "./packet";
import { PacketType } from "./types";

// A Buffer reply is written as-is, without framing.
export type CommandHandler = (command: string) => string | Buffer | undefined;

export interface FakeRCONServerOptions {
  password?: string;
  handler?: CommandHandler;
  // Write every reply one byte at a time.
  trickle?: boolean;
}

export class FakeRCONServer {
  readonly commands: string[] = [];
  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();
  private readonly password: string;
  private handler: CommandHandler;
  private readonly trickle: boolean;

  constructor(options: FakeRCONServerOptions = {}) {
    this.password = options.password ?? "test-secret";
    this.handler = options.handler ?? (() => "");
    this.trickle = options.trickle ?? false;
    this.server = net.createServer((socket) => this.accept(socket));
  }

  setHandler(handler: CommandHandler): void {
    this.handler = handler;
  }

  listen(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(0, "127.0.0.1", () => {
        const address = this.server.address();
        if (address && typeof address === "object") {
          resolve(address.port);
        } else {
          reject(new Error("Server has no TCP address"));
        }
      });
    });
  }

  // Drop every open connection without stopping the listener.
  dropConnections(): void {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();
  }

  close(): Promise<void> {
    this.dropConnections();
    return new Promise((resolve) => this.server.close(() => resolve()));
  }

  private accept(socket: net.Socket): void {
    this.sockets.add(socket);
    socket.on("close", () => this.sockets.delete(socket));
    socket.on("error", () => socket.destroy());

    const decoder = new PacketDecoder();
    socket.on("data", (chunk: Buffer) => {
      for (const packet of decoder.push(chunk)) {
        if (packet.type === PacketType.Auth) {
          const ok = packet.payload === this.password;
          this.send(socket, encodePacket(packet.id, PacketType.Response, ""));
          this.send(socket, encodePacket(ok ? packet.id : -1, PacketType.AuthResponse, ""));
          continue;
        }

        this.commands.push(packet.payload);
        const reply = this.handler(packet.payload);
        if (Buffer.isBuffer(reply)) {
          this.send(socket, reply);
        } else if (reply !== undefined) {
          this.send(socket, encodePacket(packet.id, PacketType.Response, reply));
        }
      }
    });
  }

  private send(socket: net.Socket, packet: Buffer): void {
    if (!this.trickle) {
      socket.write(packet);
      return;
    }
    for (let i = 0; i < packet.length; i++) {
      socket.write(packet.subarray(i, i + 1));
    }
  }
}
