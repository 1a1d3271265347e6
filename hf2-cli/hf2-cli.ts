#!/usr/bin/env node
import { SerialPort } from "serialport";
import { InvalidArgumentError, program } from "commander";
import {
  buildPacket,
  buildRequest,
  buildResponse,
  type Command,
  type PacketKind,
  type Status,
} from "./protocol/index.js";
import { inspectFrame, inspectRequest, inspectResponse } from "./inspect.js";
import {
  formatHex,
  getErrorMessage,
  matchesUsbFilter,
  parseCommand,
  parseHex,
  parseInteger,
  parseKind,
  parseStatus,
} from "./lib.js";

// =============================================================================
// Helpers
// =============================================================================

type GlobalOptions = {
  debug?: boolean;
};

function debug(message: string): void {
  if (program.opts<GlobalOptions>().debug) {
    console.error(`[DEBUG] ${message}`);
  }
}

/**
 * Wrap a lib parser so commander reports bad option values as usage errors.
 */
function argParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value) => {
    try {
      return parse(value);
    } catch (err) {
      throw new InvalidArgumentError(getErrorMessage(err));
    }
  };
}

function fail(err: unknown): never {
  console.error(`Error: ${getErrorMessage(err)}`);
  process.exit(1);
}

function readInput(words: string[]): Buffer {
  const bytes = parseHex(words);
  debug(`Input: ${bytes.length} bytes: ${formatHex(bytes)}`);
  return bytes;
}

function printEncoded(bytes: Buffer, inspect: (buf: Buffer) => string[]): void {
  for (const line of inspect(bytes)) {
    debug(line);
  }
  console.log(formatHex(bytes));
}

// =============================================================================
// CLI
// =============================================================================

program
  .name("hf2")
  .description("Decode and encode HF2 frames and command buffers")
  .version("0.1.0")
  .option("-d, --debug", "Print raw bytes and decoded fields to stderr");

program
  .command("frame")
  .description("Decode one transport frame")
  .argument("<hex...>", "Frame bytes")
  .action((hex: string[]) => {
    try {
      console.log(inspectFrame(readInput(hex)).join("\n"));
    } catch (err) {
      fail(err);
    }
  });

program
  .command("request")
  .description("Decode a reassembled request buffer")
  .argument("<hex...>", "Request bytes")
  .action((hex: string[]) => {
    try {
      console.log(inspectRequest(readInput(hex)).join("\n"));
    } catch (err) {
      fail(err);
    }
  });

program
  .command("response")
  .description("Decode a reassembled response buffer")
  .argument("<hex...>", "Response bytes")
  .action((hex: string[]) => {
    try {
      console.log(inspectResponse(readInput(hex)).join("\n"));
    } catch (err) {
      fail(err);
    }
  });

interface EncodeFrameOptions {
  kind: PacketKind;
}

program
  .command("encode-frame")
  .description("Encode a payload into a transport frame")
  .argument("[hex...]", "Payload bytes", [])
  .requiredOption("-k, --kind <kind>", "CommandInner, CommandFinal, StdOut or StdErr", argParser(parseKind))
  .action((hex: string[], options: EncodeFrameOptions) => {
    try {
      printEncoded(buildPacket(options.kind, readInput(hex)), inspectFrame);
    } catch (err) {
      fail(err);
    }
  });

interface EncodeRequestOptions {
  command: Command;
  tag: number;
  reserved: number;
}

program
  .command("encode-request")
  .description("Encode a request buffer")
  .argument("[hex...]", "Command data bytes", [])
  .requiredOption("-c, --command <command>", "Command name (e.g. BinInfo) or numeric code", argParser(parseCommand))
  .requiredOption("-t, --tag <n>", "Tag (0-65535)", argParser((v) => parseInteger(v, "tag", 0xffff)))
  .option("-r, --reserved <n>", "Reserved bytes as uint16", argParser((v) => parseInteger(v, "reserved", 0xffff)), 0)
  .action((hex: string[], options: EncodeRequestOptions) => {
    try {
      const data = readInput(hex);
      printEncoded(
        buildRequest({ command: options.command, tag: options.tag, reserved: options.reserved, data }),
        inspectRequest,
      );
    } catch (err) {
      fail(err);
    }
  });

interface EncodeResponseOptions {
  tag: number;
  status: Status;
  info: number;
}

program
  .command("encode-response")
  .description("Encode a response buffer")
  .argument("[hex...]", "Response data bytes", [])
  .requiredOption("-t, --tag <n>", "Tag of the request being answered", argParser((v) => parseInteger(v, "tag", 0xffff)))
  .requiredOption("-s, --status <status>", "Success, Unknown, Error or numeric code", argParser(parseStatus))
  .option("-i, --info <n>", "Status info byte", argParser((v) => parseInteger(v, "status info", 0xff)), 0)
  .action((hex: string[], options: EncodeResponseOptions) => {
    try {
      const data = readInput(hex);
      printEncoded(
        buildResponse({ tag: options.tag, status: options.status, statusInfo: options.info, data }),
        inspectResponse,
      );
    } catch (err) {
      fail(err);
    }
  });

interface PortsOptions {
  vid: string[];
}

program
  .command("ports")
  .description("List serial ports, marking likely HF2 bootloaders")
  .option("--vid <hex...>", "Additional USB vendor ids to match", [])
  .action(async (options: PortsOptions) => {
    try {
      const ports = await SerialPort.list();
      debug(`Found ${ports.length} serial port(s)`);

      if (ports.length === 0) {
        console.log("No serial ports found.");
        return;
      }

      for (const port of ports) {
        const mark = matchesUsbFilter(port.vendorId, options.vid) ? "*" : " ";
        console.log(
          `${mark} ${port.path} - ${port.manufacturer ?? "Unknown"} (VID: ${port.vendorId ?? "-"}, PID: ${port.productId ?? "-"})`,
        );
      }
    } catch (err) {
      fail(err);
    }
  });

await program.parseAsync();
