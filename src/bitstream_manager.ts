import { die, type BitValue } from "./util.js";

export type ConfigBlockId = number;
export type ConfigBitId = number;

/**
 * Read-only view of the fabric-independent configuration bit database.
 * Only leaf blocks own bits.
 */
export interface ConfigBlockTree {
  findRootBlocks(): ConfigBlockId[];
  blockChildren(block: ConfigBlockId): readonly ConfigBlockId[];
  findChildBlock(parent: ConfigBlockId, name: string): ConfigBlockId | undefined;
  blockBits(block: ConfigBlockId): readonly ConfigBitId[];
  bitValue(bit: ConfigBitId): BitValue;
  blockName(block: ConfigBlockId): string;
  blockParent(block: ConfigBlockId): ConfigBlockId | undefined;
  bitParentBlock(bit: ConfigBitId): ConfigBlockId;
  bits(): ConfigBitId[];
  numBits(): number;
}

type Block = {
  name: string;
  parent?: ConfigBlockId;
  children: ConfigBlockId[];
  childByName: Map<string, ConfigBlockId>;
  bits: ConfigBitId[];
};

type Bit = {
  value: BitValue;
  block: ConfigBlockId;
};

export class BitstreamManager implements ConfigBlockTree {
  private readonly blocks: Block[] = [];
  private readonly bitList: Bit[] = [];

  addBlock(name: string): ConfigBlockId {
    const id = this.blocks.length;
    this.blocks.push({ name, children: [], childByName: new Map(), bits: [] });
    return id;
  }

  addChildBlock(parent: ConfigBlockId, child: ConfigBlockId): void {
    const p = this.block(parent);
    const c = this.block(child);
    if (c.parent !== undefined) die(`Block '${c.name}' already has a parent`);
    if (parent === child) die(`Block '${c.name}' cannot be its own child`);
    if (p.bits.length > 0) die(`Block '${p.name}' owns bits and cannot take child blocks`);
    if (p.childByName.has(c.name)) die(`Block '${p.name}' already has a child named '${c.name}'`);
    c.parent = parent;
    p.children.push(child);
    p.childByName.set(c.name, child);
  }

  addBit(block: ConfigBlockId, value: BitValue): ConfigBitId {
    const b = this.block(block);
    if (b.children.length > 0) die(`Block '${b.name}' has child blocks and cannot own bits`);
    const id = this.bitList.length;
    this.bitList.push({ value, block });
    b.bits.push(id);
    return id;
  }

  findRootBlocks(): ConfigBlockId[] {
    const out: ConfigBlockId[] = [];
    this.blocks.forEach((b, id) => {
      if (b.parent === undefined) out.push(id);
    });
    return out;
  }

  blockChildren(block: ConfigBlockId): readonly ConfigBlockId[] {
    return this.block(block).children;
  }

  findChildBlock(parent: ConfigBlockId, name: string): ConfigBlockId | undefined {
    return this.block(parent).childByName.get(name);
  }

  blockBits(block: ConfigBlockId): readonly ConfigBitId[] {
    return this.block(block).bits;
  }

  bitValue(bit: ConfigBitId): BitValue {
    return this.bit(bit).value;
  }

  blockName(block: ConfigBlockId): string {
    return this.block(block).name;
  }

  blockParent(block: ConfigBlockId): ConfigBlockId | undefined {
    return this.block(block).parent;
  }

  bitParentBlock(bit: ConfigBitId): ConfigBlockId {
    return this.bit(bit).block;
  }

  bits(): ConfigBitId[] {
    return this.bitList.map((_, id) => id);
  }

  numBits(): number {
    return this.bitList.length;
  }

  private block(id: ConfigBlockId): Block {
    return this.blocks[id] ?? die(`Invalid config block id ${id}`);
  }

  private bit(id: ConfigBitId): Bit {
    return this.bitList[id] ?? die(`Invalid config bit id ${id}`);
  }
}

/** `/top/child/leaf` path of a block, root first. */
export function blockHierarchyPath(tree: ConfigBlockTree, block: ConfigBlockId): string {
  const names: string[] = [];
  for (let cur: ConfigBlockId | undefined = block; cur !== undefined; cur = tree.blockParent(cur)) {
    names.push(tree.blockName(cur));
  }
  return names
    .reverse()
    .map((n) => `/${n}`)
    .join("");
}
