import { fail, isRecord } from "./util.js";

export const CONFIG_PROTOCOL_TYPES = ["standalone", "scan_chain", "memory_bank", "frame_based"] as const;

export type ConfigProtocolType = (typeof CONFIG_PROTOCOL_TYPES)[number];

export type ConfigProtocol = {
  type: ConfigProtocolType;
};

export type BuildOptions = {
  top_module: string;
  decoder_address_port: string;
  verbose: boolean;
};

export const defaultBuildOptions: BuildOptions = {
  top_module: "fpga_top",
  decoder_address_port: "address",
  verbose: false,
};

function isProtocolType(v: string): v is ConfigProtocolType {
  return CONFIG_PROTOCOL_TYPES.some((t) => t === v);
}

export function parseConfigProtocol(raw: unknown): ConfigProtocol {
  const text = typeof raw === "string" ? raw.trim().toLowerCase() : "";
  if (!isProtocolType(text)) {
    fail(
      "protocol",
      `Invalid configuration protocol '${String(raw)}' (expected one of: ${CONFIG_PROTOCOL_TYPES.join(", ")})`,
    );
  }
  return { type: text };
}

function asName(v: unknown): string | undefined {
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  return s.length > 0 ? s : undefined;
}

function asBool(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (v === "true" || v === 1) return true;
  if (v === "false" || v === 0) return false;
  return undefined;
}

export function mergeOptions(raw: unknown): BuildOptions {
  const src = isRecord(raw) ? raw : {};
  return {
    top_module: asName(src.top_module) ?? defaultBuildOptions.top_module,
    decoder_address_port: asName(src.decoder_address_port) ?? defaultBuildOptions.decoder_address_port,
    verbose: asBool(src.verbose) ?? defaultBuildOptions.verbose,
  };
}
