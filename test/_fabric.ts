import { BitstreamManager, type ConfigBlockId } from "../src/bitstream_manager.js";
import type { FabricBitstream } from "../src/fabric_bitstream.js";
import { ModuleManager, generateInstanceName, type ModuleId } from "../src/module_manager.js";
import type { BitValue } from "../src/util.js";

export type TreeSpec = {
  module: string;
  bits?: BitValue[];
  children?: TreeSpec[];
  // appends a frame decoder with an `address` port of this width
  addressWidth?: number;
};

export type TestFabric = {
  blocks: BitstreamManager;
  modules: ModuleManager;
};

/**
 * Build both databases from one tree so that they agree by construction.
 * The root block is named after the root module; modules seen again reuse
 * the wiring of their first occurrence.
 */
export function buildFabric(root: TreeSpec): TestFabric {
  const blocks = new BitstreamManager();
  const modules = new ModuleManager();
  const wired = new Set<ModuleId>();
  const moduleOf = (name: string): ModuleId => modules.findModule(name) ?? modules.addModule(name);

  const visit = (spec: TreeSpec, blockName: string, parentBlock?: ConfigBlockId): void => {
    const module = moduleOf(spec.module);
    const block = blocks.addBlock(blockName);
    if (parentBlock !== undefined) blocks.addChildBlock(parentBlock, block);
    for (const v of spec.bits ?? []) blocks.addBit(block, v);

    const firstVisit = !wired.has(module);
    wired.add(module);
    const counts = new Map<ModuleId, number>();
    for (const child of spec.children ?? []) {
      const childModule = moduleOf(child.module);
      const index = counts.get(childModule) ?? 0;
      counts.set(childModule, index + 1);
      if (firstVisit) {
        modules.addChildModule(module, childModule);
        modules.addConfigurableChild(module, childModule, index);
      }
      visit(child, generateInstanceName(child.module, index), block);
    }
    if (firstVisit && spec.addressWidth !== undefined) {
      const decoder = modules.addModule(`${spec.module}_decoder`);
      modules.addModulePort(decoder, "address", spec.addressWidth);
      modules.addConfigurableChild(module, decoder, modules.addChildModule(module, decoder));
    }
  };

  visit(root, root.module);
  return { blocks, modules };
}

export function bitValues(fabric: FabricBitstream, blocks: BitstreamManager): BitValue[] {
  return fabric.bits().map((b) => blocks.bitValue(fabric.configBit(b)));
}
