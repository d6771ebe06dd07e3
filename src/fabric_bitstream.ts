import type { ConfigBitId } from "./bitstream_manager.js";
import { die, type BitValue } from "./util.js";

export type FabricBitId = number;

export type FabricBit = {
  configBit: ConfigBitId;
  // frame-based protocols only
  address?: BitValue[];
  din?: BitValue;
};

/**
 * Configuration bits in the order they are loaded into the fabric.
 * Ids are positions, so they change after `reverse()`.
 */
export class FabricBitstream {
  private readonly entries: FabricBit[] = [];

  addBit(configBit: ConfigBitId): FabricBitId {
    this.entries.push({ configBit });
    return this.entries.length - 1;
  }

  setBitAddress(bit: FabricBitId, address: readonly BitValue[]): void {
    this.entry(bit).address = [...address];
  }

  setBitDin(bit: FabricBitId, din: BitValue): void {
    this.entry(bit).din = din;
  }

  configBit(bit: FabricBitId): ConfigBitId {
    return this.entry(bit).configBit;
  }

  bitAddress(bit: FabricBitId): readonly BitValue[] | undefined {
    return this.entry(bit).address;
  }

  bitDin(bit: FabricBitId): BitValue | undefined {
    return this.entry(bit).din;
  }

  bits(): FabricBitId[] {
    return this.entries.map((_, id) => id);
  }

  numBits(): number {
    return this.entries.length;
  }

  reverse(): void {
    this.entries.reverse();
  }

  toArray(): FabricBit[] {
    return this.entries.map((e) => ({
      configBit: e.configBit,
      ...(e.address ? { address: [...e.address] } : {}),
      ...(e.din !== undefined ? { din: e.din } : {}),
    }));
  }

  private entry(bit: FabricBitId): FabricBit {
    return this.entries[bit] ?? die(`Invalid fabric bit id ${bit}`);
  }
}
