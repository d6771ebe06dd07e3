import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { defaultBuildOptions, mergeOptions, parseConfigProtocol } from "../src/config.js";

describe("parseConfigProtocol", () => {
  test("accepts every protocol tag", () => {
    assert.deepEqual(parseConfigProtocol("standalone"), { type: "standalone" });
    assert.deepEqual(parseConfigProtocol("scan_chain"), { type: "scan_chain" });
    assert.deepEqual(parseConfigProtocol("memory_bank"), { type: "memory_bank" });
    assert.deepEqual(parseConfigProtocol(" Frame_Based "), { type: "frame_based" });
  });

  test("rejects anything else", () => {
    assert.throws(() => parseConfigProtocol("ql_memory_bank"), {
      name: "FabricBitstreamError",
      kind: "protocol",
      message:
        "Invalid configuration protocol 'ql_memory_bank' (expected one of: standalone, scan_chain, memory_bank, frame_based)",
    });
    assert.throws(() => parseConfigProtocol(undefined), { kind: "protocol" });
    assert.throws(() => parseConfigProtocol(3), { kind: "protocol" });
  });
});

describe("mergeOptions", () => {
  test("falls back to defaults", () => {
    assert.deepEqual(mergeOptions(undefined), defaultBuildOptions);
    assert.deepEqual(mergeOptions({}), { top_module: "fpga_top", decoder_address_port: "address", verbose: false });
  });

  test("takes well-typed overrides and ignores the rest", () => {
    assert.deepEqual(mergeOptions({ top_module: " chip ", decoder_address_port: "addr", verbose: "true" }), {
      top_module: "chip",
      decoder_address_port: "addr",
      verbose: true,
    });
    assert.deepEqual(mergeOptions({ top_module: "", decoder_address_port: 4, verbose: "yes" }), defaultBuildOptions);
  });
});
