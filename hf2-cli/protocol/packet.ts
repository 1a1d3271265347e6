/**
 * HF2 packet framing.
 *
 * ```
 * byte 0:       bits 7-6 = kind (00 inner, 01 final, 10 stdout, 11 stderr)
 *               bits 5-0 = payload length L (0..63)
 * bytes 1..1+L: payload
 * ```
 *
 * Anything after the payload is transport padding and is ignored.
 */

import { MalformedLengthError, SizeMismatchError } from "./errors.js";
import { MAX_FRAME_SIZE, MAX_PAYLOAD_SIZE, PacketKind } from "./types.js";

const KIND_MASK = 0xc0;
const LENGTH_MASK = 0x3f;

/**
 * Kind encoded in a packet header byte. Total over all byte values.
 */
export function packetKindOf(header: number): PacketKind {
  switch (header & KIND_MASK) {
    case 0x00:
      return PacketKind.CommandInner;
    case 0x40:
      return PacketKind.CommandFinal;
    case 0x80:
      return PacketKind.StdOut;
    default:
      return PacketKind.StdErr;
  }
}

/** Command fragments are reassembled into a command buffer. */
export function isCommandKind(kind: PacketKind): boolean {
  return kind === PacketKind.CommandInner || kind === PacketKind.CommandFinal;
}

/** Stream data goes straight to a stdout/stderr sink. */
export function isStreamKind(kind: PacketKind): boolean {
  return kind === PacketKind.StdOut || kind === PacketKind.StdErr;
}

/**
 * Packet view over one transport frame. Never copies the frame.
 */
export class Packet {
  private constructor(private readonly frame: Buffer) {}

  /**
   * Wrap a raw transport frame.
   * @throws MalformedLengthError if the frame is empty, longer than 64 bytes,
   *   or shorter than its declared payload
   */
  static fromBytes(frame: Buffer): Packet {
    if (frame.length < 1 || frame.length > MAX_FRAME_SIZE) {
      throw new MalformedLengthError(
        `Frame must be 1..${MAX_FRAME_SIZE} bytes, got ${frame.length}`,
        frame.length,
        MAX_FRAME_SIZE,
      );
    }

    const length = frame[0] & LENGTH_MASK;
    if (length + 1 > frame.length) {
      throw new MalformedLengthError(
        `Frame declares ${length} payload bytes but carries ${frame.length - 1}`,
        frame.length - 1,
        length,
      );
    }

    return new Packet(frame.subarray(0, length + 1));
  }

  get header(): number {
    return this.frame[0];
  }

  get kind(): PacketKind {
    return packetKindOf(this.header);
  }

  /** Payload length, header byte excluded. */
  get length(): number {
    return this.header & LENGTH_MASK;
  }

  get payload(): Buffer {
    return this.frame.subarray(1, this.length + 1);
  }

  /** Header byte plus payload, without padding. */
  get bytes(): Buffer {
    return this.frame;
  }
}

export function decodePacket(frame: Buffer): Packet {
  return Packet.fromBytes(frame);
}

/**
 * Write a packet into `dest` and return the number of bytes written.
 * Bytes of `dest` after the packet are left as they are.
 */
export function encodePacket(dest: Buffer, kind: PacketKind, payload: Uint8Array): number {
  if (payload.length > MAX_PAYLOAD_SIZE) {
    throw new MalformedLengthError(
      `Payload must be at most ${MAX_PAYLOAD_SIZE} bytes, got ${payload.length}`,
      payload.length,
      MAX_PAYLOAD_SIZE,
    );
  }
  if (dest.length < payload.length + 1) {
    throw new SizeMismatchError(dest.length, payload.length + 1);
  }

  dest[0] = kind | payload.length;
  dest.set(payload, 1);
  return payload.length + 1;
}

/**
 * Allocate a frame of exactly `payload.length + 1` bytes.
 */
export function buildPacket(kind: PacketKind, payload: Uint8Array): Buffer {
  const frame = Buffer.alloc(Math.min(payload.length + 1, MAX_FRAME_SIZE));
  encodePacket(frame, kind, payload);
  return frame;
}

const PACKET_KINDS = [
  PacketKind.CommandInner,
  PacketKind.CommandFinal,
  PacketKind.StdOut,
  PacketKind.StdErr,
] as const;

/**
 * Case-insensitive lookup of a packet kind by name. Returns null for unknown names.
 */
export function packetKindFromName(name: string): PacketKind | null {
  const lower = name.toLowerCase();
  return PACKET_KINDS.find((kind) => PacketKind[kind].toLowerCase() === lower) ?? null;
}
