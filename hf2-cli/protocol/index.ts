/**
 * HF2 protocol module - packet framing and command codec.
 */

export {
  MAX_FRAME_SIZE,
  MAX_PAYLOAD_SIZE,
  REQUEST_HEADER_SIZE,
  RESPONSE_HEADER_SIZE,
  COMMAND_CODES,
  STATUS_CODES,
  PacketKind,
} from "./types.js";
export type {
  Command,
  CommandName,
  Status,
  StatusName,
  RequestFields,
  ResponseFields,
} from "./types.js";
export {
  Hf2Error,
  MalformedLengthError,
  UndersizedHeaderError,
  SizeMismatchError,
  FieldRangeError,
} from "./errors.js";
export {
  Packet,
  packetKindOf,
  packetKindFromName,
  isCommandKind,
  isStreamKind,
  decodePacket,
  encodePacket,
  buildPacket,
} from "./packet.js";
export {
  Request,
  Response,
  commandFromCode,
  commandToCode,
  commandFromName,
  commandName,
  statusFromCode,
  statusToCode,
  statusFromName,
  statusName,
  decodeRequest,
  encodeRequest,
  buildRequest,
  decodeResponse,
  encodeResponse,
  buildResponse,
} from "./command.js";
