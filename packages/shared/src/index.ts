import { z } from "zod";

export const AddressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, "address_invalid")
  .transform((value) => value.toLowerCase());

export const Bytes32HexSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{64}$/, "bytes32_invalid")
  .transform((value) => value.toLowerCase());

export const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000";

export { canonicalizeJson } from "./canonicalJson.js";
export { keccak256, keccak256Hex } from "./hashing.js";
export {
  bytesToHex,
  bytesToUtf8,
  concatBytes,
  extractRange,
  hexToBytes,
  uintToBytes,
  utf8ToBytes
} from "./bytes.js";
export { IdentityError, fail, isIdentityError, makeErrorResponse } from "./errors.js";
export type { ErrorCode, ErrorResponse } from "./errors.js";
export { createLogger, formatLogLine, redact } from "./log.js";
export type { LogLevel, LogMeta, Logger } from "./log.js";
export { createMetricsRegistry } from "./metrics.js";
export type { MetricLabels, MetricsRegistry } from "./metrics.js";
