import { fail, type BitValue } from "./util.js";

/**
 * Encode a non-negative integer as a fixed-width binary vector, most
 * significant bit first. A width of 0 only encodes 0.
 */
export function itobin(value: number, width: number): BitValue[] {
  if (!Number.isInteger(width) || width < 0) {
    fail("address_overflow", `Invalid address width ${width}`);
  }
  if (!Number.isInteger(value) || value < 0) {
    fail("address_overflow", `Invalid address index ${value}`);
  }
  if (value >= 2 ** width) {
    fail("address_overflow", `Address index ${value} does not fit in ${width} bit(s)`);
  }
  const out: BitValue[] = new Array<BitValue>(width).fill(0);
  let rest = value;
  for (let i = width - 1; i >= 0 && rest > 0; i -= 1) {
    out[i] = rest % 2 === 1 ? 1 : 0;
    rest = Math.floor(rest / 2);
  }
  return out;
}

export function bitsToString(bits: readonly BitValue[]): string {
  return bits.join("");
}
