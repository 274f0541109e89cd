import { bytesToHex as toHexRaw, hexToBytes as fromHexRaw } from "@noble/hashes/utils.js";
import { fail } from "./errors.js";

const HEX_RE = /^(0x)?([0-9a-fA-F]{2})*$/;

export const bytesToHex = (bytes: Uint8Array) => `0x${toHexRaw(bytes)}`;

export const hexToBytes = (value: string) => {
  if (!HEX_RE.test(value)) {
    return fail("invalid_request", "hex_invalid", value);
  }
  const body = value.startsWith("0x") ? value.slice(2) : value;
  return fromHexRaw(body.toLowerCase());
};

export const utf8ToBytes = (value: string) => new TextEncoder().encode(value);

export const bytesToUtf8 = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

export const concatBytes = (...parts: Uint8Array[]) => {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
};

// Returns a copy so callers never alias the packed buffer.
export const extractRange = (buffer: Uint8Array, offset: number, length: number) => {
  if (!Number.isSafeInteger(offset) || !Number.isSafeInteger(length) || offset < 0 || length < 0) {
    return fail("out_of_range", "range_invalid", `offset=${offset} length=${length}`);
  }
  if (offset + length > buffer.length) {
    return fail(
      "out_of_range",
      "range_exceeds_buffer",
      `offset=${offset} length=${length} size=${buffer.length}`
    );
  }
  return buffer.slice(offset, offset + length);
};

// Big-endian unsigned encoding, left padded to `width` bytes.
export const uintToBytes = (value: bigint, width: number) => {
  if (value < 0n || value >= 1n << BigInt(width * 8)) {
    return fail("out_of_range", "uint_out_of_range", `width=${width}`);
  }
  const out = new Uint8Array(width);
  let rest = value;
  for (let index = width - 1; index >= 0; index -= 1) {
    out[index] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return out;
};
