import type { MaskConfig } from "./types.js";

/** DIDs are persisted as fixed-width 32-byte values */
export const DID_BYTE_LENGTH = 32;

const PADDING = /[ \t\r\n\0]+$/;

const utf8 = new TextDecoder("utf-8", { fatal: true });

export class InvalidHexError extends Error {
  constructor(readonly input: string, reason: string) {
    super(`Invalid hex value "${input}": ${reason}`);
    this.name = "InvalidHexError";
  }
}

function strip0x(hex: string): string {
  return hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
}

/** Parse a hex string (with or without 0x) into bytes */
export function hexToBytes(hex: string): Uint8Array {
  const clean = strip0x(hex);
  if (clean.length % 2 !== 0) throw new InvalidHexError(hex, "odd number of digits");
  if (!/^[0-9a-fA-F]*$/.test(clean)) throw new InvalidHexError(hex, "non-hex characters");
  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

export function bytesToHex(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) out += b.toString(16).padStart(2, "0");
  return out;
}

/**
 * Decode a hex-encoded DID into its text form, dropping the trailing
 * NUL/whitespace padding. Throws InvalidHexError on malformed hex or
 * bytes that are not valid UTF-8.
 */
export function decodeDid(hex: string): string {
  const bytes = hexToBytes(hex);
  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch {
    throw new InvalidHexError(hex, "not valid UTF-8");
  }
  return text.replace(PADDING, "");
}

/** Like decodeDid, but hands back the input unchanged when it is not a hex DID */
export function decodeDidOrRaw(value: unknown): string {
  if (typeof value !== "string") return value == null ? "" : String(value);
  try {
    return decodeDid(value);
  } catch {
    return value;
  }
}

/**
 * Encode a DID text the way the chain stores it: 0x-prefixed hex of the
 * UTF-8 bytes, right-padded with zeros and cut at 32 bytes.
 */
export function encodeDid(did: string): string {
  const hex = bytesToHex(new TextEncoder().encode(did)).padEnd(DID_BYTE_LENGTH * 2, "0");
  return "0x" + hex.slice(0, DID_BYTE_LENGTH * 2);
}

/**
 * Accepts either a raw 0x-prefixed DID or a DID text and returns the raw
 * padded hex form used inside event attributes.
 */
export function toRawDid(input: string): string {
  return input.startsWith("0x") ? input : encodeDid(input);
}

/** Keep the first `prefixLength` characters and pad with the mask char to `displayWidth` */
export function maskDid(did: string, mask: MaskConfig): string {
  return did.slice(0, mask.prefixLength).padEnd(mask.displayWidth, mask.maskChar);
}
