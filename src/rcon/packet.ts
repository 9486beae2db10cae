import type { RCONPacket } from "./types";

// id + type + two NUL terminators
const HEADER_OVERHEAD = 10;
export const MAX_PACKET_LENGTH = 1024 * 1024;

export function encodePacket(id: number, type: number, payload: string): Buffer {
  const payloadBuffer = Buffer.from(payload, "utf8");
  const length = payloadBuffer.length + HEADER_OVERHEAD;

  const packet = Buffer.alloc(length + 4);
  packet.writeInt32LE(length, 0);
  packet.writeInt32LE(id, 4);
  packet.writeInt32LE(type, 8);
  payloadBuffer.copy(packet, 12);
  packet.writeInt8(0, packet.length - 2);
  packet.writeInt8(0, packet.length - 1);

  return packet;
}

/**
 * Reassembles packets from a TCP stream. Chunks may split a packet or carry
 * several at once, so bytes are buffered until a full frame is available.
 */
export class PacketDecoder {
  private pending: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): RCONPacket[] {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    const packets: RCONPacket[] = [];

    while (this.pending.length >= 4) {
      const length = this.pending.readInt32LE(0);
      if (length < HEADER_OVERHEAD || length > MAX_PACKET_LENGTH) {
        this.pending = Buffer.alloc(0);
        throw new Error(`Invalid RCON packet length: ${length}`);
      }
      if (this.pending.length < length + 4) break;

      const frame = this.pending.subarray(0, length + 4);
      packets.push({
        id: frame.readInt32LE(4),
        type: frame.readInt32LE(8),
        payload: frame.toString("utf8", 12, frame.length - 2),
      });
      this.pending = this.pending.subarray(length + 4);
    }

    return packets;
  }

  get buffered(): number {
    return this.pending.length;
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
  }
}
