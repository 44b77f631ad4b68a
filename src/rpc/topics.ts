import {
  type AbiEvent,
  type Hex,
  isAddress,
  isHex,
  keccak256,
  numberToHex,
  pad,
  stringToHex,
  toEventSelector,
} from "viem";
import type { Constraint, Filter } from "../cache/filter.js";
import type { Scalar } from "../types/index.js";

export type TopicFilter = Array<Hex | Hex[] | null>;

/**
 * Encodes one indexed argument value as a 32-byte topic, or `null` when the type
 * cannot be matched by topic (tuples, arrays).
 */
export function encodeTopicValue(type: string, value: Scalar): Hex | null {
  if (type === "bool") {
    return numberToHex(value === true || value === "true" ? 1 : 0, { size: 32 });
  }
  if (typeof value !== "string") return null;

  if (type === "address") {
    return isAddress(value, { strict: false }) ? pad(value, { size: 32 }) : null;
  }
  if (type.startsWith("uint") || type.startsWith("int")) {
    if (!/^-?\d+$/.test(value) && !isHex(value)) return null;
    return numberToHex(BigInt(value), { size: 32, signed: type.startsWith("int") });
  }
  if (type === "string") {
    return keccak256(stringToHex(value));
  }
  if (type === "bytes") {
    return isHex(value) ? keccak256(value) : null;
  }
  if (/^bytes\d+$/.test(type)) {
    return isHex(value) ? pad(value, { dir: "right", size: 32 }) : null;
  }
  return null;
}

function encodeConstraint(type: string, constraint: Constraint): Hex | Hex[] | null {
  if (constraint.kind === "exact") return encodeTopicValue(type, constraint.value);
  const encoded: Hex[] = [];
  for (const value of constraint.values) {
    const topic = encodeTopicValue(type, value);
    if (topic === null) return null;
    encoded.push(topic);
  }
  return encoded;
}

/**
 * Topic filter for `event` narrowed by the filter's indexed keys. Keys the node
 * cannot match (non-indexed args, unsupported types) are left open and must be
 * applied to the returned rows.
 */
export function buildTopics(event: AbiEvent, filter: Filter): TopicFilter {
  const topics: TopicFilter = [toEventSelector(event)];
  for (const input of event.inputs) {
    if (!input.indexed) continue;
    const constraint = input.name ? filter.get(input.name) : undefined;
    topics.push(constraint ? encodeConstraint(input.type, constraint) : null);
  }
  while (topics.length > 1 && topics[topics.length - 1] === null) {
    topics.pop();
  }
  return topics;
}
