/**
 * Human-readable dumps of decoded HF2 frames and command buffers.
 */

import {
  Packet,
  PacketKind,
  Request,
  Response,
  commandName,
  commandToCode,
  isStreamKind,
  statusName,
  statusToCode,
} from "./protocol/index.js";
import { formatCode, formatHex } from "./lib.js";

const LABEL_WIDTH = 13;

function field(label: string, value: string | number): string {
  return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

function hexOrEmpty(bytes: Uint8Array): string {
  return bytes.length > 0 ? formatHex(bytes) : "(empty)";
}

export function inspectFrame(frame: Buffer): string[] {
  const packet = Packet.fromBytes(frame);
  const lines = [
    field("Kind", `${PacketKind[packet.kind]} (${formatCode(packet.kind, 2)})`),
    field("Length", packet.length),
    field("Payload", hexOrEmpty(packet.payload)),
    field("Padding", frame.length - packet.bytes.length),
  ];
  if (isStreamKind(packet.kind)) {
    lines.push(field("Text", JSON.stringify(packet.payload.toString("utf8"))));
  }
  return lines;
}

export function inspectRequest(buf: Buffer): string[] {
  const request = Request.fromBytes(buf);
  return [
    field("Command", `${commandName(request.command)} (${formatCode(commandToCode(request.command), 8)})`),
    field("Tag", formatCode(request.tag, 4)),
    field("Reserved", formatCode(request.reserved, 4)),
    field("Data length", request.data.length),
    field("Data", hexOrEmpty(request.data)),
  ];
}

export function inspectResponse(buf: Buffer): string[] {
  const response = Response.fromBytes(buf);
  return [
    field("Tag", formatCode(response.tag, 4)),
    field("Status", `${statusName(response.status)} (${formatCode(statusToCode(response.status), 2)})`),
    field("Status info", formatCode(response.statusInfo, 2)),
    field("Data length", response.data.length),
    field("Data", hexOrEmpty(response.data)),
  ];
}
