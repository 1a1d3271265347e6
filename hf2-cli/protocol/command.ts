/**
 * HF2 command layer: request/response headers inside a reassembled command buffer.
 *
 * ```
 * Request                         Response
 * [0-3] command id (uint32 LE)    [0-1] tag (uint16 LE)
 * [4-5] tag (uint16 LE)           [2]   status
 * [6-7] reserved                  [3]   status info
 * [8..] data                      [4..] data
 * ```
 */

import { FieldRangeError, SizeMismatchError, UndersizedHeaderError } from "./errors.js";
import {
  COMMAND_CODES,
  REQUEST_HEADER_SIZE,
  RESPONSE_HEADER_SIZE,
  STATUS_CODES,
  type Command,
  type CommandName,
  type RequestFields,
  type ResponseFields,
  type Status,
  type StatusName,
} from "./types.js";

const UINT8_MAX = 0xff;
const UINT16_MAX = 0xffff;
const UINT32_MAX = 0xffffffff;

function isCommandName(name: string): name is CommandName {
  return Object.hasOwn(COMMAND_CODES, name);
}

function isStatusName(name: string): name is StatusName {
  return Object.hasOwn(STATUS_CODES, name);
}

const COMMAND_NAMES: readonly CommandName[] = Object.keys(COMMAND_CODES).filter(isCommandName);
const STATUS_NAMES: readonly StatusName[] = Object.keys(STATUS_CODES).filter(isStatusName);

function checkRange(field: string, value: number, limit: number): void {
  if (!Number.isInteger(value) || value < 0 || value > limit) {
    throw new FieldRangeError(field, value, limit);
  }
}

function hex(value: number, width: number): string {
  return `0x${value.toString(16).padStart(width, "0")}`;
}

// =============================================================================
// Command / Status mapping
// =============================================================================

export function commandFromCode(code: number): Command {
  const name = COMMAND_NAMES.find((n) => COMMAND_CODES[n] === code);
  return name ? { name } : { name: "Other", code };
}

export function commandToCode(command: Command): number {
  if (command.name === "Other") {
    checkRange("Command code", command.code, UINT32_MAX);
    return command.code;
  }
  return COMMAND_CODES[command.name];
}

export function statusFromCode(code: number): Status {
  const name = STATUS_NAMES.find((n) => STATUS_CODES[n] === code);
  return name ? { name } : { name: "Other", code };
}

export function statusToCode(status: Status): number {
  if (status.name === "Other") {
    checkRange("Status code", status.code, UINT8_MAX);
    return status.code;
  }
  return STATUS_CODES[status.name];
}

export function commandName(command: Command): string {
  return command.name === "Other" ? `Other(${hex(command.code, 8)})` : command.name;
}

export function statusName(status: Status): string {
  return status.name === "Other" ? `Other(${hex(status.code, 2)})` : status.name;
}

// =============================================================================
// Request
// =============================================================================

/**
 * Request view over a reassembled command buffer. `data` is a view, not a copy.
 */
export class Request implements RequestFields {
  readonly command: Command;
  readonly tag: number;
  readonly reserved: number;
  readonly data: Buffer;

  private constructor(buf: Buffer) {
    this.command = commandFromCode(buf.readUInt32LE(0));
    this.tag = buf.readUInt16LE(4);
    this.reserved = buf.readUInt16LE(6);
    this.data = buf.subarray(REQUEST_HEADER_SIZE);
  }

  /**
   * @throws UndersizedHeaderError if `buf` is shorter than 8 bytes
   */
  static fromBytes(buf: Buffer): Request {
    if (buf.length < REQUEST_HEADER_SIZE) {
      throw new UndersizedHeaderError(buf.length, REQUEST_HEADER_SIZE);
    }
    return new Request(buf);
  }

  toString(): string {
    return `Request(${commandName(this.command)}, tag=${hex(this.tag, 4)}, ${this.data.length} bytes)`;
  }
}

export function decodeRequest(buf: Buffer): Request {
  return Request.fromBytes(buf);
}

/**
 * Write a request into `dest`, which must be exactly `8 + data.length` bytes.
 * Every check runs before the first write.
 */
export function encodeRequest(dest: Buffer, fields: RequestFields): void {
  const { tag, reserved = 0, data } = fields;
  const expected = REQUEST_HEADER_SIZE + data.length;
  if (dest.length !== expected) {
    throw new SizeMismatchError(dest.length, expected);
  }
  const code = commandToCode(fields.command);
  checkRange("Tag", tag, UINT16_MAX);
  checkRange("Reserved", reserved, UINT16_MAX);

  dest.writeUInt32LE(code, 0);
  dest.writeUInt16LE(tag, 4);
  dest.writeUInt16LE(reserved, 6);
  dest.set(data, REQUEST_HEADER_SIZE);
}

export function buildRequest(fields: RequestFields): Buffer {
  const buf = Buffer.alloc(REQUEST_HEADER_SIZE + fields.data.length);
  encodeRequest(buf, fields);
  return buf;
}

// =============================================================================
// Response
// =============================================================================

/**
 * Response view over a reassembled command buffer. `data` is a view, not a copy.
 */
export class Response implements ResponseFields {
  readonly tag: number;
  readonly status: Status;
  readonly statusInfo: number;
  readonly data: Buffer;

  private constructor(buf: Buffer) {
    this.tag = buf.readUInt16LE(0);
    this.status = statusFromCode(buf[2]);
    this.statusInfo = buf[3];
    this.data = buf.subarray(RESPONSE_HEADER_SIZE);
  }

  /**
   * @throws UndersizedHeaderError if `buf` is shorter than 4 bytes
   */
  static fromBytes(buf: Buffer): Response {
    if (buf.length < RESPONSE_HEADER_SIZE) {
      throw new UndersizedHeaderError(buf.length, RESPONSE_HEADER_SIZE);
    }
    return new Response(buf);
  }

  /** Whether this response answers the request carrying `tag` */
  matches(tag: number): boolean {
    return this.tag === tag;
  }

  toString(): string {
    return `Response(${statusName(this.status)}, tag=${hex(this.tag, 4)}, info=${hex(this.statusInfo, 2)}, ${this.data.length} bytes)`;
  }
}

export function decodeResponse(buf: Buffer): Response {
  return Response.fromBytes(buf);
}

/**
 * Write a response into `dest`, which must be exactly `4 + data.length` bytes.
 */
export function encodeResponse(dest: Buffer, fields: ResponseFields): void {
  const { tag, statusInfo, data } = fields;
  const expected = RESPONSE_HEADER_SIZE + data.length;
  if (dest.length !== expected) {
    throw new SizeMismatchError(dest.length, expected);
  }
  const status = statusToCode(fields.status);
  checkRange("Tag", tag, UINT16_MAX);
  checkRange("Status info", statusInfo, UINT8_MAX);

  dest.writeUInt16LE(tag, 0);
  dest[2] = status;
  dest[3] = statusInfo;
  dest.set(data, RESPONSE_HEADER_SIZE);
}

export function buildResponse(fields: ResponseFields): Buffer {
  const buf = Buffer.alloc(RESPONSE_HEADER_SIZE + fields.data.length);
  encodeResponse(buf, fields);
  return buf;
}

// =============================================================================
// Name lookup
// =============================================================================

/**
 * Case-insensitive lookup of a named command. Returns null for unknown names.
 */
export function commandFromName(name: string): Command | null {
  const lower = name.toLowerCase();
  const match = COMMAND_NAMES.find((n) => n.toLowerCase() === lower);
  return match ? { name: match } : null;
}

/**
 * Case-insensitive lookup of a named status. Returns null for unknown names.
 */
export function statusFromName(name: string): Status | null {
  const lower = name.toLowerCase();
  const match = STATUS_NAMES.find((n) => n.toLowerCase() === lower);
  return match ? { name: match } : null;
}
