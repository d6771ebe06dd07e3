import { buildFabricDependentBitstream } from "./build_fabric_bitstream.js";
import { loadBitstreamXml, loadFabricYaml } from "./fabric_load.js";
import { fabricBitstreamReport } from "./report.js";
import { readText, writeText } from "./util.js";

async function main() {
  const args = process.argv.slice(2);
  const verbose = args.includes("--verbose");
  const [xmlPath, yamlPath, outJson] = args.filter((a) => a !== "--verbose");
  if (!xmlPath || !yamlPath) {
    console.error("Usage: node dist/main.js <bitstream.xml> <fabric.yaml> [out.json] [--verbose]");
    process.exit(1);
  }
  const blocks = loadBitstreamXml(readText(xmlPath));
  const fabric = loadFabricYaml(readText(yamlPath));
  const options = verbose ? { ...fabric.options, verbose } : fabric.options;
  const bitstream = buildFabricDependentBitstream(blocks, fabric.modules, fabric.protocol, options);
  const data = JSON.stringify(fabricBitstreamReport(bitstream, blocks, fabric.protocol), null, 2);
  if (!outJson || outJson === "-") {
    process.stdout.write(data);
  } else {
    writeText(outJson, data);
    console.error(`Fabric bitstream: ${outJson} (${bitstream.numBits()} bits, ${fabric.protocol.type})`);
  }
}

main().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
