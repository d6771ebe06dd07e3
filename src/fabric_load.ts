import { pathToFileURL } from "url";
import yaml from "js-yaml";
import { XMLParser } from "fast-xml-parser";
import { BitstreamManager, type ConfigBlockId } from "./bitstream_manager.js";
import { mergeOptions, parseConfigProtocol, type BuildOptions, type ConfigProtocol } from "./config.js";
import { ModuleManager, type ModuleId } from "./module_manager.js";
import { asArray, asBitValue, die, isRecord, readText } from "./util.js";

export type LoadedFabric = {
  modules: ModuleManager;
  protocol: ConfigProtocol;
  options: BuildOptions;
};

function attr(node: Record<string, unknown>, name: string): string | undefined {
  const v = node[`@_${name}`];
  if (typeof v === "string" || typeof v === "number") return String(v);
  return undefined;
}

function loadBlock(db: BitstreamManager, node: unknown, parent?: ConfigBlockId): void {
  if (!isRecord(node)) die("bitstream_block must be an element");
  const name = attr(node, "name");
  if (!name) die("bitstream_block is missing its 'name' attribute");
  const block = db.addBlock(name);
  if (parent !== undefined) db.addChildBlock(parent, block);

  for (const child of asArray<unknown>(node.bitstream_block)) {
    loadBlock(db, child, block);
  }
  for (const bitstream of asArray<unknown>(node.bitstream)) {
    if (!isRecord(bitstream)) continue;
    for (const bit of asArray<unknown>(bitstream.bit)) {
      const raw = isRecord(bit) ? attr(bit, "value") : undefined;
      const value = asBitValue(raw);
      if (value === undefined) die(`Invalid bit value '${raw ?? ""}' in block '${name}'`);
      db.addBit(block, value);
    }
  }
}

/**
 * Read a fabric-independent bitstream database:
 * nested `<bitstream_block name="...">` elements, leaves holding
 * `<bitstream><bit value="0|1"/>...</bitstream>`.
 */
export function loadBitstreamXml(text: string): BitstreamManager {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    isArray: (tagName) => tagName === "bitstream_block" || tagName === "bit" || tagName === "bitstream",
  });
  const doc: unknown = parser.parse(text);
  const db = new BitstreamManager();
  if (!isRecord(doc)) return db;
  for (const top of asArray<unknown>(doc.bitstream_block)) {
    loadBlock(db, top);
  }
  return db;
}

type InstanceSpec = {
  module: string;
  name?: string;
  configurable: boolean;
};

function parseInstance(owner: string, raw: unknown): InstanceSpec {
  if (typeof raw === "string") return { module: raw, configurable: true };
  if (!isRecord(raw) || typeof raw.module !== "string") {
    die(`Module '${owner}' has an instance without a 'module' name`);
  }
  return {
    module: raw.module,
    name: typeof raw.name === "string" && raw.name.length > 0 ? raw.name : undefined,
    configurable: raw.configurable !== false,
  };
}

/**
 * Read a module graph description. Instances are listed in configuration
 * order; the last configurable instance of a frame-based module is its
 * decoder.
 *
 * ```yaml
 * top_module: fpga_top
 * config_protocol: frame_based
 * modules:
 *   - name: fpga_top
 *     instances: [grid_clb, grid_clb, { module: frame_decoder, name: decoder }]
 *   - name: grid_clb
 *   - name: frame_decoder
 *     ports: [{ name: address, width: 1 }]
 * ```
 */
export function loadFabricYaml(text: string): LoadedFabric {
  const doc: unknown = yaml.load(text);
  if (!isRecord(doc)) die("Fabric description must be a YAML mapping");
  const protocol = parseConfigProtocol(doc.config_protocol);
  const options = mergeOptions(doc);

  const modules = new ModuleManager();
  const entries = asArray<unknown>(doc.modules).filter(isRecord);
  const ids = new Map<Record<string, unknown>, ModuleId>();
  for (const m of entries) {
    if (typeof m.name !== "string" || m.name.length === 0) die("Module entry without a 'name'");
    ids.set(m, modules.addModule(m.name));
  }

  for (const m of entries) {
    const id = ids.get(m);
    if (id === undefined) continue;
    const owner = modules.moduleName(id);
    for (const p of asArray<unknown>(m.ports)) {
      if (!isRecord(p) || typeof p.name !== "string" || typeof p.width !== "number") {
        die(`Module '${owner}' has a port without 'name' and numeric 'width'`);
      }
      modules.addModulePort(id, p.name, p.width);
    }
    for (const raw of asArray<unknown>(m.instances)) {
      const inst = parseInstance(owner, raw);
      const child = modules.findModule(inst.module) ?? die(`Module '${owner}' instantiates unknown module '${inst.module}'`);
      const index = modules.addChildModule(id, child, inst.name);
      if (inst.configurable) modules.addConfigurableChild(id, child, index);
    }
  }

  return { modules, protocol, options };
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const [xmlPath, yamlPath] = process.argv.slice(2);
  try {
    const db = loadBitstreamXml(readText(xmlPath));
    const fabric = loadFabricYaml(readText(yamlPath));
    console.error(
      `fabric_load: top_blocks=${db.findRootBlocks().length} bits=${db.numBits()} ` +
        `modules=${fabric.modules.numModules()} protocol=${fabric.protocol.type}`,
    );
  } catch (e: unknown) {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}
