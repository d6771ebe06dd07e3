import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { bitsToString, itobin } from "../src/address.js";
import { FabricBitstreamError } from "../src/util.js";

describe("itobin", () => {
  test("encodes most significant bit first, zero-padded", () => {
    assert.deepEqual(itobin(0, 2), [0, 0]);
    assert.deepEqual(itobin(1, 2), [0, 1]);
    assert.deepEqual(itobin(2, 2), [1, 0]);
    assert.deepEqual(itobin(3, 2), [1, 1]);
    assert.deepEqual(itobin(5, 4), [0, 1, 0, 1]);
  });

  test("width 0 encodes only 0", () => {
    assert.deepEqual(itobin(0, 0), []);
    assert.throws(() => itobin(1, 0), { name: "FabricBitstreamError", kind: "address_overflow" });
  });

  test("rejects values that do not fit the width", () => {
    assert.throws(() => itobin(4, 2), (e: unknown) => {
      assert.ok(e instanceof FabricBitstreamError);
      assert.equal(e.kind, "address_overflow");
      assert.equal(e.message, "Address index 4 does not fit in 2 bit(s)");
      return true;
    });
  });

  test("rejects negative and fractional input", () => {
    assert.throws(() => itobin(-1, 2), { kind: "address_overflow" });
    assert.throws(() => itobin(1.5, 2), { kind: "address_overflow" });
    assert.throws(() => itobin(1, -1), { kind: "address_overflow" });
  });
});

test("bitsToString joins bits", () => {
  assert.equal(bitsToString([1, 0, 1]), "101");
  assert.equal(bitsToString([]), "");
});
