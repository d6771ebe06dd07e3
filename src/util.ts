import fs from "fs";

export type BitValue = 0 | 1;

export type FabricBitstreamErrorKind = "structural" | "protocol" | "size_mismatch" | "address_overflow";

export class FabricBitstreamError extends Error {
  readonly kind: FabricBitstreamErrorKind;

  constructor(kind: FabricBitstreamErrorKind, message: string) {
    super(message);
    this.name = "FabricBitstreamError";
    this.kind = kind;
  }
}

export function fail(kind: FabricBitstreamErrorKind, msg: string): never {
  throw new FabricBitstreamError(kind, msg);
}

export function die(msg: string): never {
  throw new Error(msg);
}

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}

export function asArray<T>(v: T | T[] | undefined | null): T[] {
  if (v === undefined || v === null) return [];
  return Array.isArray(v) ? v : [v];
}

export function asBitValue(v: unknown): BitValue | undefined {
  if (v === 0 || v === "0" || v === false) return 0;
  if (v === 1 || v === "1" || v === true) return 1;
  return undefined;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
