import { describe, test, expect } from "vitest";
import { MAX_PACKET_LENGTH, PacketDecoder, encodePacket } from "./packet";

describe("RCON packets", () => {
  test("should frame a command with length, id, type and two terminators", () => {
    const packet = encodePacket(7, 2, "/time");

    expect(packet.length).toBe(19);
    expect(packet.readInt32LE(0)).toBe(15);
    expect(packet.readInt32LE(4)).toBe(7);
    expect(packet.readInt32LE(8)).toBe(2);
    expect(packet.toString("utf8", 12, 17)).toBe("/time");
    expect(packet[17]).toBe(0);
    expect(packet[18]).toBe(0);
  });

  test("should count payload length in bytes, not characters", () => {
    const packet = encodePacket(1, 2, "é");
    expect(packet.readInt32LE(0)).toBe(12);
  });

  test("should hold a partial packet until the rest arrives", () => {
    const decoder = new PacketDecoder();
    const packet = encodePacket(3, 0, "pong");

    expect(decoder.push(packet.subarray(0, 6))).toEqual([]);
    expect(decoder.buffered).toBe(6);
    expect(decoder.push(packet.subarray(6))).toEqual([{ id: 3, type: 0, payload: "pong" }]);
    expect(decoder.buffered).toBe(0);
  });

  test("should split several packets delivered in one chunk", () => {
    const decoder = new PacketDecoder();
    const chunk = Buffer.concat([encodePacket(1, 0, ""), encodePacket(1, 2, ""), encodePacket(2, 0, "{}")]);

    expect(decoder.push(chunk)).toEqual([
      { id: 1, type: 0, payload: "" },
      { id: 1, type: 2, payload: "" },
      { id: 2, type: 0, payload: "{}" },
    ]);
  });

  test("should decode the -1 id of a rejected login", () => {
    const decoder = new PacketDecoder();
    expect(decoder.push(encodePacket(-1, 2, ""))).toEqual([{ id: -1, type: 2, payload: "" }]);
  });

  test("should reject an impossible length and drop buffered bytes", () => {
    const decoder = new PacketDecoder();
    const bogus = Buffer.alloc(8);
    bogus.writeInt32LE(3, 0);

    expect(() => decoder.push(bogus)).toThrow("Invalid RCON packet length: 3");
    expect(decoder.buffered).toBe(0);
  });

  test("should accept a reply right at the size limit", () => {
    const decoder = new PacketDecoder();
    const payload = "x".repeat(MAX_PACKET_LENGTH - 10);

    const [packet] = decoder.push(encodePacket(4, 0, payload));
    expect(packet?.payload.length).toBe(MAX_PACKET_LENGTH - 10);
  });

  test("should reject a declared length above 1 MiB before it is buffered", () => {
    const decoder = new PacketDecoder();
    const header = Buffer.alloc(12);
    header.writeInt32LE(MAX_PACKET_LENGTH + 1, 0);

    expect(() => decoder.push(header)).toThrow(`Invalid RCON packet length: ${MAX_PACKET_LENGTH + 1}`);
    expect(decoder.buffered).toBe(0);
  });
});
