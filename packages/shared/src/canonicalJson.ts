import { bytesToHex } from "./bytes.js";

// Object keys sorted, bigints as decimal strings, byte arrays as 0x-hex.
const normalize = (value: unknown): unknown => {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Uint8Array) {
    return bytesToHex(value);
  }
  if (Array.isArray(value)) {
    return value.map((entry) => normalize(entry));
  }
  if (value && typeof value === "object") {
    const record = value as Record<string, unknown>;
    return Object.keys(record)
      .filter((key) => record[key] !== undefined)
      .sort()
      .reduce<Record<string, unknown>>((acc, key) => {
        acc[key] = normalize(record[key]);
        return acc;
      }, {});
  }
  return value;
};

export const canonicalizeJson = (value: unknown) => JSON.stringify(normalize(value));
