import { type AbiParameter, bytesToHex } from "viem";
import { canonicalScalar } from "../cache/filter.js";
import { stableStringify } from "../streams/identity.js";
import type { FieldValue } from "../types/index.js";

/**
 * Converts a decoded ABI value into a storable field value.
 * Scalars are canonicalized; tuples and arrays become canonical JSON.
 */
export function toFieldValue(value: unknown): FieldValue {
  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case "string":
    case "number":
    case "bigint":
    case "boolean":
      return canonicalScalar(value);
    default:
      if (value instanceof Uint8Array) return bytesToHex(value);
      return stableStringify(value);
  }
}

/**
 * Decoded event args (positional or named) keyed by input name;
 * unnamed inputs fall back to `arg<i>`.
 */
export function toFields(
  args: unknown,
  inputs: readonly AbiParameter[],
): Record<string, FieldValue> {
  const fields: Record<string, FieldValue> = {};
  if (Array.isArray(args)) {
    inputs.forEach((input, index) => {
      fields[input.name || `arg${index}`] = toFieldValue(args[index]);
    });
    return fields;
  }
  if (typeof args === "object" && args !== null) {
    for (const [key, value] of Object.entries(args)) {
      fields[key] = toFieldValue(value);
    }
  }
  return fields;
}
