import { test } from "node:test";
import assert from "node:assert/strict";
import { bytesToHex, extractRange, hexToBytes, uintToBytes } from "./bytes.js";
import { isIdentityError } from "./errors.js";

test("extractRange returns a copy of the window", () => {
  const buffer = new Uint8Array([1, 2, 3, 4, 5]);
  const window = extractRange(buffer, 1, 3);
  assert.deepEqual(window, new Uint8Array([2, 3, 4]));
  window[0] = 9;
  assert.equal(buffer[1], 2);
});

test("extractRange allows empty windows up to the end", () => {
  assert.deepEqual(extractRange(new Uint8Array([1, 2]), 2, 0), new Uint8Array(0));
  assert.deepEqual(extractRange(new Uint8Array(0), 0, 0), new Uint8Array(0));
});

test("extractRange rejects windows past the end and bad offsets", () => {
  const buffer = new Uint8Array(4);
  for (const [offset, length] of [
    [3, 2],
    [5, 0],
    [-1, 1],
    [0, 1.5]
  ]) {
    assert.throws(
      () => extractRange(buffer, offset, length),
      (error) => isIdentityError(error, "out_of_range")
    );
  }
});

test("uints encode big-endian at a fixed width", () => {
  assert.equal(bytesToHex(uintToBytes(0x0102n, 4)), "0x00000102");
  assert.equal(bytesToHex(uintToBytes(0n, 2)), "0x0000");
  assert.throws(
    () => uintToBytes(256n, 1),
    (error) => isIdentityError(error, "out_of_range")
  );
  assert.throws(
    () => uintToBytes(-1n, 1),
    (error) => isIdentityError(error, "out_of_range")
  );
});

test("hex parsing accepts an optional prefix and rejects odd input", () => {
  assert.deepEqual(hexToBytes("0xABcd"), new Uint8Array([0xab, 0xcd]));
  assert.deepEqual(hexToBytes("ff"), new Uint8Array([0xff]));
  assert.throws(
    () => hexToBytes("0xabc"),
    (error) => isIdentityError(error, "invalid_request")
  );
});
