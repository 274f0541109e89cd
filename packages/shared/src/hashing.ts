import { keccak_256 } from "@noble/hashes/sha3.js";
import { bytesToHex } from "./bytes.js";

export const keccak256 = (data: Uint8Array) => keccak_256(data);

export const keccak256Hex = (data: Uint8Array) => bytesToHex(keccak_256(data));
