import {
  commandFromCode,
  commandFromName,
  packetKindFromName,
  statusFromCode,
  statusFromName,
  type Command,
  type PacketKind,
  type Status,
} from "./protocol/index.js";

// =============================================================================
// Constants
// =============================================================================

/** USB vendor ids commonly used by HF2/UF2 bootloaders */
export const USB_VENDOR_FILTERS = [
  "03eb", // Microchip (SAMD)
  "239a", // Adafruit
  "2e8a", // Raspberry Pi
] as const;

// =============================================================================
// Hex Helpers
// =============================================================================

/**
 * Parse hex bytes from CLI words.
 * Accepts "83 01 02", "0x83,0x01", "83:01" and "830102". A lone digit is one byte.
 */
export function parseHex(input: string | string[]): Buffer {
  const text = Array.isArray(input) ? input.join(" ") : input;
  const bytes: number[] = [];

  for (const word of text.split(/[\s,:]+/)) {
    if (word === "") continue;
    let digits = word.replace(/^0x/i, "");
    if (!/^[0-9a-f]+$/i.test(digits)) {
      throw new Error(`Invalid hex: ${word}`);
    }
    if (digits.length === 1) {
      digits = `0${digits}`;
    }
    if (digits.length % 2 !== 0) {
      throw new Error(`Odd number of hex digits: ${word}`);
    }
    for (let i = 0; i < digits.length; i += 2) {
      bytes.push(parseInt(digits.slice(i, i + 2), 16));
    }
  }

  return Buffer.from(bytes);
}

/**
 * Space-separated lowercase hex, e.g. "01 02 ff".
 */
export function formatHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

export function formatCode(value: number, width: number): string {
  return `0x${value.toString(16).padStart(width, "0")}`;
}

// =============================================================================
// Argument Helpers
// =============================================================================

/**
 * Parse a decimal or 0x-prefixed integer in 0..max.
 */
export function parseInteger(value: string, field: string, max: number): number {
  const text = value.trim();
  const parsed = /^0x[0-9a-f]+$/i.test(text) ? parseInt(text, 16) : /^\d+$/.test(text) ? parseInt(text, 10) : NaN;
  if (isNaN(parsed) || parsed > max) {
    throw new Error(`Invalid ${field}: ${value}. Must be 0-${max}.`);
  }
  return parsed;
}

export function parseCommand(value: string): Command {
  return commandFromName(value) ?? commandFromCode(parseInteger(value, "command", 0xffffffff));
}

export function parseStatus(value: string): Status {
  return statusFromName(value) ?? statusFromCode(parseInteger(value, "status", 0xff));
}

export function parseKind(value: string): PacketKind {
  const kind = packetKindFromName(value);
  if (kind === null) {
    throw new Error(`Unknown packet kind: ${value}. Use CommandInner, CommandFinal, StdOut or StdErr.`);
  }
  return kind;
}

// =============================================================================
// Discovery Helpers
// =============================================================================

export function matchesUsbFilter(vendorId: string | undefined, extraVendorIds: readonly string[] = []): boolean {
  if (!vendorId) return false;
  const vid = vendorId.toLowerCase();
  return [...USB_VENDOR_FILTERS, ...extraVendorIds].some((f) => f.toLowerCase() === vid);
}

// =============================================================================
// Error Helpers
// =============================================================================

/**
 * Extract error message from unknown error type.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
