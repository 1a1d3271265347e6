/**
 * HF2 protocol types and constants.
 */

/** Largest transport frame carrying one packet */
export const MAX_FRAME_SIZE = 64;

/** Largest packet payload: 6-bit length field */
export const MAX_PAYLOAD_SIZE = 0x3f;

/** Command id (4) + tag (2) + reserved (2) */
export const REQUEST_HEADER_SIZE = 8;

/** Tag (2) + status (1) + status info (1) */
export const RESPONSE_HEADER_SIZE = 4;

/**
 * Packet kind, stored in the top two bits of the packet header byte.
 */
export enum PacketKind {
  CommandInner = 0x00,
  CommandFinal = 0x40,
  StdOut = 0x80,
  StdErr = 0xc0,
}

/** Command codes defined by the protocol */
export const COMMAND_CODES = {
  BinInfo: 0x0001,
  Info: 0x0002,
  ResetIntoApp: 0x0003,
  ResetIntoBootloader: 0x0004,
  StartFlash: 0x0005,
  WriteFlashPage: 0x0006,
  ChecksumPages: 0x0007,
  ReadWords: 0x0008,
  WriteWords: 0x0009,
  Dmesg: 0x0010,
} as const;

export type CommandName = keyof typeof COMMAND_CODES;

/** Request command, with `Other` for vendor-defined codes */
export type Command = { name: CommandName } | { name: "Other"; code: number };

/** Status codes defined by the protocol */
export const STATUS_CODES = {
  Success: 0x00,
  Unknown: 0x01,
  Error: 0x02,
} as const;

export type StatusName = keyof typeof STATUS_CODES;

/** Response status, with `Other` for any other byte */
export type Status = { name: StatusName } | { name: "Other"; code: number };

/** Fields written into a request buffer */
export interface RequestFields {
  command: Command;
  tag: number;
  /** Bytes 6-7, carried through untouched. Defaults to 0. */
  reserved?: number;
  data: Uint8Array;
}

/** Fields written into a response buffer */
export interface ResponseFields {
  tag: number;
  status: Status;
  statusInfo: number;
  data: Uint8Array;
}
