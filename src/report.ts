import { bitsToString } from "./address.js";
import type { ConfigBlockTree } from "./bitstream_manager.js";
import type { ConfigProtocol } from "./config.js";
import type { FabricBitstream } from "./fabric_bitstream.js";
import type { BitValue } from "./util.js";

export type FabricBitReport = {
  config_bit: number;
  value: BitValue;
  address?: string;
  din?: BitValue;
};

export type FabricBitstreamReport = {
  protocol: ConfigProtocol["type"];
  num_bits: number;
  bits: FabricBitReport[];
};

export function fabricBitstreamReport(
  fabric: FabricBitstream,
  blocks: ConfigBlockTree,
  protocol: ConfigProtocol,
): FabricBitstreamReport {
  return {
    protocol: protocol.type,
    num_bits: fabric.numBits(),
    bits: fabric.bits().map((id) => {
      const configBit = fabric.configBit(id);
      const address = fabric.bitAddress(id);
      const din = fabric.bitDin(id);
      return {
        config_bit: configBit,
        value: blocks.bitValue(configBit),
        ...(address ? { address: bitsToString(address) } : {}),
        ...(din !== undefined ? { din } : {}),
      };
    }),
  };
}
