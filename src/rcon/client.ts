import { Socket } from "net";
import { PacketDecoder, encodePacket } from "./packet";
import { PacketType, type RCONConfig, type RCONPacket, type RCONResponse } from "./types";
import { backoffDelay, sleep } from "../utils/connection";
import { errorMessage, log } from "../utils/log";

type PendingCommand = (result: RCONResponse) => void;

interface PendingAuth {
  id: number;
  resolve: () => void;
  reject: (error: Error) => void;
}

export class RCONClient {
  private socket: Socket | null = null;
  private connected = false;
  private readonly config: RCONConfig;
  private requestId = 1;
  private readonly commandTimeout: number;
  private readonly decoder = new PacketDecoder();
  private readonly pending = new Map<number, PendingCommand>();
  private pendingAuth: PendingAuth | null = null;
  // Factorio handles one command at a time per connection.
  private queue: Promise<unknown> = Promise.resolve();

  constructor(config: RCONConfig) {
    this.config = config;
    this.commandTimeout = config.commandTimeoutMs ?? 5000;
  }

  async connect(): Promise<void> {
    const maxRetries = this.config.maxRetries ?? 3;
    const retryDelay = this.config.retryDelayMs ?? 1000;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        await this.connectOnce();
        log.debug(`RCON connected on attempt ${attempt}`);
        return;
      } catch (error) {
        const errorMsg = errorMessage(error);
        log.error(`RCON connection attempt ${attempt} failed:`, errorMsg);

        if (attempt === maxRetries) {
          if (errorMsg.includes("ECONNREFUSED")) {
            throw new Error(
              `Cannot connect to Factorio RCON (${this.config.host}:${this.config.port})\n\n` +
              `Start the server with RCON enabled, for example:\n` +
              `  factorio --start-server <save> --rcon-port ${this.config.port} --rcon-password <password>\n` +
              `or host a multiplayer game with local-rcon-socket/local-rcon-password set in config.ini.\n\n` +
              `Original error: ${errorMsg}`
            );
          }
          throw new Error(`Failed to connect after ${maxRetries} attempts: ${errorMsg}`);
        }

        await sleep(backoffDelay(attempt, retryDelay));
      }
    }
  }

  private connectOnce(): Promise<void> {
    this.teardown();

    return new Promise((resolve, reject) => {
      const socket = new Socket();
      this.socket = socket;
      this.decoder.reset();

      const timeout = setTimeout(() => {
        socket.destroy();
        reject(new Error("Connection timeout"));
      }, this.commandTimeout);

      socket.on("data", (chunk: Buffer) => this.onData(chunk));

      socket.once("connect", () => {
        this.authenticate()
          .then(() => {
            clearTimeout(timeout);
            this.connected = true;
            resolve();
          })
          .catch((error: Error) => {
            clearTimeout(timeout);
            socket.destroy();
            reject(error);
          });
      });

      socket.on("error", (err) => {
        clearTimeout(timeout);
        this.failAll(err.message);
        reject(err);
      });

      socket.on("close", () => {
        if (this.socket === socket) {
          this.connected = false;
          this.failAll("Connection closed");
        }
      });

      socket.connect(this.config.port, this.config.host);
    });
  }

  private authenticate(): Promise<void> {
    const id = this.requestId++;
    return new Promise((resolve, reject) => {
      if (!this.socket) return reject(new Error("Socket not initialized"));
      this.pendingAuth = { id, resolve, reject };
      this.socket.write(encodePacket(id, PacketType.Auth, this.config.password));
    });
  }

  private onData(chunk: Buffer): void {
    let packets: RCONPacket[];
    try {
      packets = this.decoder.push(chunk);
    } catch (error) {
      this.failAll(errorMessage(error));
      this.socket?.destroy();
      return;
    }

    for (const packet of packets) {
      this.dispatch(packet);
    }
  }

  private dispatch(packet: RCONPacket): void {
    const auth = this.pendingAuth;
    if (auth && packet.type === PacketType.AuthResponse) {
      this.pendingAuth = null;
      if (packet.id === -1) {
        auth.reject(new Error("Authentication failed - invalid password"));
      } else {
        auth.resolve();
      }
      return;
    }

    const finish = this.pending.get(packet.id);
    if (finish) {
      finish({ success: true, data: packet.payload });
    } else {
      log.debug(`Dropping unmatched RCON packet id=${packet.id}`);
    }
  }

  private failAll(error: string): void {
    if (this.pendingAuth) {
      this.pendingAuth.reject(new Error(error));
      this.pendingAuth = null;
    }
    for (const finish of [...this.pending.values()]) {
      finish({ success: false, data: "", error });
    }
  }

  sendCommand(command: string, timeoutMs?: number): Promise<RCONResponse> {
    const run = this.queue.then(() => this.execute(command, timeoutMs ?? this.commandTimeout));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async execute(command: string, timeoutMs: number): Promise<RCONResponse> {
    if (!this.connected) {
      try {
        await this.connect();
      } catch (error) {
        return { success: false, data: "", error: `Not connected and reconnect failed: ${errorMessage(error)}` };
      }
    }

    const socket = this.socket;
    if (!socket) {
      return { success: false, data: "", error: "Socket not initialized" };
    }

    const id = this.requestId++;

    return new Promise((resolve) => {
      const timeout = setTimeout(() => {
        finish({ success: false, data: "", error: `Command timeout after ${timeoutMs}ms` });
      }, timeoutMs);

      const finish = (result: RCONResponse) => {
        if (!this.pending.has(id)) return;
        this.pending.delete(id);
        clearTimeout(timeout);
        resolve(result);
      };

      this.pending.set(id, finish);
      socket.write(encodePacket(id, PacketType.Command, command));
    });
  }

  isConnected(): boolean {
    return this.connected;
  }

  private teardown(): void {
    if (this.socket) {
      const socket = this.socket;
      this.socket = null;
      this.connected = false;
      socket.destroy();
    }
  }

  async disconnect(): Promise<void> {
    this.teardown();
    this.failAll("Disconnected");
  }
}
