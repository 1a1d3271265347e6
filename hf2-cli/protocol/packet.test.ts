import { describe, it, expect } from "vitest";
import {
  Packet,
  PacketKind,
  MalformedLengthError,
  SizeMismatchError,
  packetKindOf,
  packetKindFromName,
  isCommandKind,
  isStreamKind,
  decodePacket,
  encodePacket,
  buildPacket,
} from "./index.js";

describe("packetKindOf", () => {
  it("maps the top two bits to a kind", () => {
    expect(packetKindOf(0x00)).toBe(PacketKind.CommandInner);
    expect(packetKindOf(0x40)).toBe(PacketKind.CommandFinal);
    expect(packetKindOf(0x80)).toBe(PacketKind.StdOut);
    expect(packetKindOf(0xc0)).toBe(PacketKind.StdErr);
  });

  it("ignores the length bits", () => {
    expect(packetKindOf(0x3f)).toBe(PacketKind.CommandInner);
    expect(packetKindOf(0x7f)).toBe(PacketKind.CommandFinal);
    expect(packetKindOf(0x85)).toBe(PacketKind.StdOut);
    expect(packetKindOf(0xff)).toBe(PacketKind.StdErr);
  });
});

describe("packetKindFromName", () => {
  it("matches names case-insensitively", () => {
    expect(packetKindFromName("CommandFinal")).toBe(PacketKind.CommandFinal);
    expect(packetKindFromName("stdout")).toBe(PacketKind.StdOut);
    expect(packetKindFromName("STDERR")).toBe(PacketKind.StdErr);
  });

  it("returns null for unknown names", () => {
    expect(packetKindFromName("stdin")).toBeNull();
  });
});

describe("isCommandKind / isStreamKind", () => {
  it("splits command fragments from stream data", () => {
    expect(isCommandKind(PacketKind.CommandInner)).toBe(true);
    expect(isCommandKind(PacketKind.CommandFinal)).toBe(true);
    expect(isCommandKind(PacketKind.StdOut)).toBe(false);
    expect(isStreamKind(PacketKind.StdOut)).toBe(true);
    expect(isStreamKind(PacketKind.StdErr)).toBe(true);
    expect(isStreamKind(PacketKind.CommandFinal)).toBe(false);
  });
});

describe("Packet.fromBytes", () => {
  it("decodes each kind from the header byte", () => {
    expect(Packet.fromBytes(Buffer.from([0x00, 0xff, 0xff])).kind).toBe(PacketKind.CommandInner);
    expect(Packet.fromBytes(Buffer.from([0x40, 0xff, 0xff])).kind).toBe(PacketKind.CommandFinal);
    expect(Packet.fromBytes(Buffer.from([0x80, 0xff, 0xff])).kind).toBe(PacketKind.StdOut);
    expect(Packet.fromBytes(Buffer.from([0xc0, 0xff, 0xff])).kind).toBe(PacketKind.StdErr);
  });

  it("decodes a stdout frame with trailing padding", () => {
    const packet = Packet.fromBytes(Buffer.from([0x83, 0x01, 0x02, 0x03, 0xab, 0xff, 0xff, 0xff]));
    expect(packet.kind).toBe(PacketKind.StdOut);
    expect(packet.length).toBe(3);
    expect([...packet.payload]).toEqual([0x01, 0x02, 0x03]);
    expect([...packet.bytes]).toEqual([0x83, 0x01, 0x02, 0x03]);
  });

  it("decodes a frame that is exactly header plus payload", () => {
    const packet = Packet.fromBytes(Buffer.from([0x85, 0x04, 0x05, 0x06, 0x07, 0x08]));
    expect(packet.kind).toBe(PacketKind.StdOut);
    expect(packet.length).toBe(5);
    expect([...packet.payload]).toEqual([0x04, 0x05, 0x06, 0x07, 0x08]);
  });

  it("decodes an empty payload", () => {
    const packet = Packet.fromBytes(Buffer.from([0x80, 0xde, 0x42, 0x42, 0x42, 0x42, 0xff, 0xff]));
    expect(packet.kind).toBe(PacketKind.StdOut);
    expect(packet.length).toBe(0);
    expect(packet.payload.length).toBe(0);
  });

  it("decodes a 16-byte stderr payload", () => {
    const frame = Buffer.from([
      0xd0, 0x09, 0x0a, 0x0b, 0x0c, 0x0d, 0x0e, 0x0f, 0x10, 0x11, 0x12, 0x13, 0x14, 0x15, 0x16, 0x17, 0xff,
      0xff, 0xff,
    ]);
    const packet = Packet.fromBytes(frame);
    expect(packet.kind).toBe(PacketKind.StdErr);
    expect(packet.length).toBe(16);
    expect([...packet.payload]).toEqual([
      0x09, 0x0a, 0x0b, 0x0c, 0x0d, 0x0e, 0x0f, 0x10, 0x11, 0x12, 0x13, 0x14, 0x15, 0x16, 0x17, 0xff,
    ]);
  });

  it("decodes a single header byte", () => {
    const packet = Packet.fromBytes(Buffer.from([0x40]));
    expect(packet.kind).toBe(PacketKind.CommandFinal);
    expect(packet.length).toBe(0);
  });

  it("accepts a full 64-byte frame", () => {
    const frame = Buffer.alloc(64, 0x11);
    frame[0] = 0x7f;
    const packet = Packet.fromBytes(frame);
    expect(packet.kind).toBe(PacketKind.CommandFinal);
    expect(packet.length).toBe(63);
    expect(packet.payload.length).toBe(63);
  });

  it("shares memory with the caller's buffer", () => {
    const frame = Buffer.from([0x02, 0xaa, 0xbb]);
    const packet = Packet.fromBytes(frame);
    frame[1] = 0xcc;
    expect(packet.payload[0]).toBe(0xcc);
  });

  it("rejects an empty frame", () => {
    expect(() => Packet.fromBytes(Buffer.alloc(0))).toThrow(MalformedLengthError);
  });

  it("rejects a frame longer than 64 bytes", () => {
    expect(() => Packet.fromBytes(Buffer.alloc(65))).toThrow(MalformedLengthError);
    expect(() => Packet.fromBytes(Buffer.alloc(65))).toThrow("Frame must be 1..64 bytes, got 65");
  });

  it("rejects a frame shorter than its declared payload", () => {
    expect(() => Packet.fromBytes(Buffer.from([0x05, 0x01, 0x02]))).toThrow(
      "Frame declares 5 payload bytes but carries 2",
    );
  });

  it("is also available as decodePacket", () => {
    expect(decodePacket(Buffer.from([0x41, 0x7e])).length).toBe(1);
  });
});

describe("encodePacket", () => {
  it("writes the header byte and payload", () => {
    const dest = Buffer.alloc(4);
    const written = encodePacket(dest, PacketKind.StdOut, Buffer.from([0x01, 0x02, 0x03]));
    expect(written).toBe(4);
    expect([...dest]).toEqual([0x83, 0x01, 0x02, 0x03]);
  });

  it("leaves the rest of a larger buffer untouched", () => {
    const dest = Buffer.alloc(64, 0xee);
    const written = encodePacket(dest, PacketKind.CommandInner, Buffer.from([0x10, 0x20]));
    expect(written).toBe(3);
    expect([...dest.subarray(0, 4)]).toEqual([0x02, 0x10, 0x20, 0xee]);
  });

  it("rejects payloads longer than 63 bytes", () => {
    expect(() => encodePacket(Buffer.alloc(64), PacketKind.CommandFinal, Buffer.alloc(64))).toThrow(
      MalformedLengthError,
    );
  });

  it("rejects an undersized destination without writing", () => {
    const dest = Buffer.from([0xaa, 0xaa]);
    expect(() => encodePacket(dest, PacketKind.StdErr, Buffer.from([1, 2]))).toThrow(SizeMismatchError);
    expect([...dest]).toEqual([0xaa, 0xaa]);
  });
});

describe("buildPacket", () => {
  it("round-trips kind and payload for every kind", () => {
    const payload = Buffer.from("hello");
    for (const kind of [PacketKind.CommandInner, PacketKind.CommandFinal, PacketKind.StdOut, PacketKind.StdErr]) {
      const packet = Packet.fromBytes(buildPacket(kind, payload));
      expect(packet.kind).toBe(kind);
      expect(packet.payload.toString()).toBe("hello");
    }
  });

  it("builds a maximal frame", () => {
    const frame = buildPacket(PacketKind.CommandFinal, Buffer.alloc(63, 0x5a));
    expect(frame.length).toBe(64);
    expect(frame[0]).toBe(0x7f);
  });

  it("builds a header-only frame for an empty payload", () => {
    expect([...buildPacket(PacketKind.StdErr, Buffer.alloc(0))]).toEqual([0xc0]);
  });
});
