import { itobin } from "./address.js";
import { blockHierarchyPath, type ConfigBitId, type ConfigBlockId, type ConfigBlockTree } from "./bitstream_manager.js";
import { defaultBuildOptions, type BuildOptions, type ConfigProtocol } from "./config.js";
import { FabricBitstream } from "./fabric_bitstream.js";
import type { ConfigurableChild, ModuleId, ModuleInstanceTree } from "./module_manager.js";
import { fail, type BitValue } from "./util.js";

export type BuildRunOptions = Partial<BuildOptions> & {
  log?: (line: string) => void;
};

const MAX_REPORTED_UNTOUCHED_BITS = 10;

/*
 * The block tree and the module graph are joined by name: the instance name
 * of every configurable child must be the name of a child block.
 */
function findConfigurableChildBlock(
  blocks: ConfigBlockTree,
  parentBlock: ConfigBlockId,
  modules: ModuleInstanceTree,
  parentModule: ModuleId,
  child: ConfigurableChild,
): ConfigBlockId {
  const instanceName = modules.instanceName(parentModule, child.module, child.instance);
  const childBlock = blocks.findChildBlock(parentBlock, instanceName);
  if (childBlock === undefined) {
    fail(
      "structural",
      `No config block '${instanceName}' under ${blockHierarchyPath(blocks, parentBlock)} ` +
        `for instance of module '${modules.moduleName(child.module)}' in '${modules.moduleName(parentModule)}'`,
    );
  }
  return childBlock;
}

function assertNoDirectBits(blocks: ConfigBlockTree, block: ConfigBlockId): void {
  const n = blocks.blockBits(block).length;
  if (n > 0) {
    fail("structural", `Block ${blockHierarchyPath(blocks, block)} has child blocks but owns ${n} bit(s) directly`);
  }
}

/**
 * Depth-first walk for configuration-chain protocols: every configurable
 * child is visited before anything at the current level, and leaf bits are
 * appended in the order the chain passes through them.
 */
export function buildChainBitstream(
  blocks: ConfigBlockTree,
  parentBlock: ConfigBlockId,
  modules: ModuleInstanceTree,
  parentModule: ModuleId,
  fabric: FabricBitstream,
): void {
  if (blocks.blockChildren(parentBlock).length > 0) {
    for (const child of modules.configurableChildren(parentModule)) {
      const childBlock = findConfigurableChildBlock(blocks, parentBlock, modules, parentModule, child);
      buildChainBitstream(blocks, childBlock, modules, child.module, fabric);
    }
    assertNoDirectBits(blocks, parentBlock);
  }

  for (const bit of blocks.blockBits(parentBlock)) {
    fabric.addBit(bit);
  }
}

/**
 * Depth-first walk for frame-based protocols. Each bit is addressed by the
 * concatenation, top level first, of the position of every ancestor among
 * the configurable children of its parent. A level with a single configurable
 * child has no decoder and adds no address bits; otherwise the last
 * configurable child is the decoder whose address port sets the field width.
 */
export function buildFrameBitstream(
  blocks: ConfigBlockTree,
  parentBlocks: readonly ConfigBlockId[],
  modules: ModuleInstanceTree,
  parentModules: readonly ModuleId[],
  addrCode: readonly BitValue[],
  fabric: FabricBitstream,
  decoderAddressPort: string = defaultBuildOptions.decoder_address_port,
): void {
  const parentBlock = parentBlocks[parentBlocks.length - 1];
  const parentModule = parentModules[parentModules.length - 1];
  if (parentBlock === undefined || parentModule === undefined) {
    fail("structural", "Frame-based traversal needs a non-empty block and module path");
  }

  if (blocks.blockChildren(parentBlock).length > 0) {
    const configurable = modules.configurableChildren(parentModule);
    // Nothing below this block can be addressed.
    if (configurable.length === 0) return;

    let children = configurable;
    let addrWidth = 0;
    if (configurable.length > 1) {
      const decoder = configurable[configurable.length - 1].module;
      children = configurable.slice(0, -1);
      const port = modules.findModulePort(decoder, decoderAddressPort);
      if (port === undefined) {
        fail(
          "structural",
          `Decoder module '${modules.moduleName(decoder)}' in '${modules.moduleName(parentModule)}' ` +
            `has no port '${decoderAddressPort}'`,
        );
      }
      addrWidth = modules.portWidth(port);
      if (children.length > 2 ** addrWidth) {
        fail(
          "address_overflow",
          `Decoder '${modules.moduleName(decoder)}' in '${modules.moduleName(parentModule)}' has a ` +
            `${addrWidth}-bit address but ${children.length} configurable children to select`,
        );
      }
    }

    children.forEach((child, childIndex) => {
      const childBlock = findConfigurableChildBlock(blocks, parentBlock, modules, parentModule, child);
      const childAddrCode = configurable.length > 1 ? [...addrCode, ...itobin(childIndex, addrWidth)] : addrCode;
      buildFrameBitstream(
        blocks,
        [...parentBlocks, childBlock],
        modules,
        [...parentModules, child.module],
        childAddrCode,
        fabric,
        decoderAddressPort,
      );
    });
    assertNoDirectBits(blocks, parentBlock);
  }

  for (const bit of blocks.blockBits(parentBlock)) {
    const fabricBit = fabric.addBit(bit);
    fabric.setBitAddress(fabricBit, addrCode);
    fabric.setBitDin(fabricBit, blocks.bitValue(bit));
  }
}

function describeUntouchedBits(blocks: ConfigBlockTree, fabric: FabricBitstream): string[] {
  const touched = new Set<ConfigBitId>(fabric.bits().map((b) => fabric.configBit(b)));
  const out: string[] = [];
  for (const bit of blocks.bits()) {
    if (touched.has(bit)) continue;
    out.push(`bit ${bit} (parent_block = ${blockHierarchyPath(blocks, blocks.bitParentBlock(bit))})`);
    if (out.length >= MAX_REPORTED_UNTOUCHED_BITS) break;
  }
  return out;
}

/** Dispatch on the configuration protocol, then check every bit was placed. */
export function buildModuleFabricDependentBitstream(
  protocol: ConfigProtocol,
  blocks: ConfigBlockTree,
  topBlock: ConfigBlockId,
  modules: ModuleInstanceTree,
  topModule: ModuleId,
  decoderAddressPort: string = defaultBuildOptions.decoder_address_port,
): FabricBitstream {
  const fabric = new FabricBitstream();

  switch (protocol.type) {
    case "standalone":
      buildChainBitstream(blocks, topBlock, modules, topModule, fabric);
      break;
    case "scan_chain":
      buildChainBitstream(blocks, topBlock, modules, topModule, fabric);
      fabric.reverse();
      break;
    case "memory_bank":
      // Bit placement for memory banks is not produced here; the size check
      // below fails whenever the database holds any bit.
      break;
    case "frame_based":
      buildFrameBitstream(blocks, [topBlock], modules, [topModule], [], fabric, decoderAddressPort);
      break;
    default: {
      const unknown: never = protocol.type;
      fail("protocol", `Invalid configuration protocol '${String(unknown)}'`);
    }
  }

  if (fabric.numBits() !== blocks.numBits()) {
    const untouched = describeUntouchedBits(blocks, fabric);
    fail(
      "size_mismatch",
      `Fabric bitstream has ${fabric.numBits()} bit(s) but the bitstream database has ${blocks.numBits()} ` +
        `(protocol ${protocol.type})` +
        (untouched.length > 0 ? `; not placed:\n  ${untouched.join("\n  ")}` : ""),
    );
  }
  return fabric;
}

/**
 * Reorganize the fabric-independent bitstream into the sequence the
 * configuration protocol loads. The bitstream database is not modified.
 */
export function buildFabricDependentBitstream(
  blocks: ConfigBlockTree,
  modules: ModuleInstanceTree,
  protocol: ConfigProtocol,
  options: BuildRunOptions = {},
): FabricBitstream {
  const topModuleName = options.top_module ?? defaultBuildOptions.top_module;
  const verbose = options.verbose ?? defaultBuildOptions.verbose;
  const log = options.log ?? ((line: string) => console.error(line));
  const started = performance.now();
  if (verbose) log("Build fabric dependent bitstream");

  const topModule = modules.findModule(topModuleName);
  if (topModule === undefined) {
    fail("structural", `Top module '${topModuleName}' not found in module graph`);
  }

  const topBlocks = blocks.findRootBlocks();
  if (topBlocks.length !== 1) {
    fail(
      "structural",
      `Expected exactly 1 top block in bitstream database, found ${topBlocks.length}` +
        (topBlocks.length > 0 ? ` (${topBlocks.map((b) => blocks.blockName(b)).join(", ")})` : ""),
    );
  }
  const topBlock = topBlocks[0];
  if (blocks.blockName(topBlock) !== topModuleName) {
    fail("structural", `Top block '${blocks.blockName(topBlock)}' does not match top module '${topModuleName}'`);
  }

  const fabric = buildModuleFabricDependentBitstream(
    protocol,
    blocks,
    topBlock,
    modules,
    topModule,
    options.decoder_address_port ?? defaultBuildOptions.decoder_address_port,
  );

  if (verbose) {
    log(`Built ${fabric.numBits()} configuration bits for fabric`);
    log(`Build fabric dependent bitstream took ${((performance.now() - started) / 1000).toFixed(2)} seconds`);
  }
  return fabric;
}
