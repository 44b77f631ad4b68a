import type { FieldValue, Scalar, ScalarInput } from "../types/index.js";

/**
 * A single key's constraint: an exact value or an explicit allowed-set
 */
export type Constraint =
  | { kind: "exact"; value: Scalar }
  | { kind: "oneOf"; values: readonly Scalar[] };

export type FilterInput = Readonly<Record<string, ScalarInput | readonly ScalarInput[] | undefined>>;

/**
 * JSON form of a canonical filter, as persisted next to coverage records
 */
export type FilterJson = Record<string, Scalar | Scalar[]>;

const HEX_PATTERN = /^0x[0-9a-fA-F]*$/;

/**
 * Brings a value into the canonical scalar form shared by filters and row fields.
 */
export function canonicalScalar(value: ScalarInput): Scalar {
  switch (typeof value) {
    case "boolean":
      return value;
    case "bigint":
      return value.toString(10);
    case "number":
      return String(value);
    default:
      return HEX_PATTERN.test(value) ? value.toLowerCase() : value;
  }
}

const scalarOrder = (a: Scalar, b: Scalar) => {
  const left = JSON.stringify(a);
  const right = JSON.stringify(b);
  return left < right ? -1 : left > right ? 1 : 0;
};

function isScalarList(input: ScalarInput | readonly ScalarInput[]): input is readonly ScalarInput[] {
  return Array.isArray(input);
}

function toConstraint(input: ScalarInput | readonly ScalarInput[]): Constraint {
  if (!isScalarList(input)) {
    return { kind: "exact", value: canonicalScalar(input) };
  }
  const unique = [...new Set(input.map(canonicalScalar))].sort(scalarOrder);
  if (unique.length === 1) {
    return { kind: "exact", value: unique[0] };
  }
  return { kind: "oneOf", values: unique };
}

function sameConstraint(a: Constraint, b: Constraint): boolean {
  if (a.kind === "exact" && b.kind === "exact") return a.value === b.value;
  if (a.kind === "oneOf" && b.kind === "oneOf") {
    return a.values.length === b.values.length && a.values.every((v, i) => v === b.values[i]);
  }
  return false;
}

function constraintAccepts(constraint: Constraint, value: FieldValue | undefined): boolean {
  if (value === undefined || value === null) return false;
  const canonical = canonicalScalar(value);
  return constraint.kind === "exact"
    ? constraint.value === canonical
    : constraint.values.includes(canonical);
}

/**
 * Immutable, canonically ordered set of equality constraints.
 *
 * `g.subsumes(f)` is the `g ⊑ f` relation: every key constrained by `g` is
 * constrained identically by `f`. The empty filter subsumes every filter.
 */
export class Filter {
  static readonly EMPTY = new Filter([]);

  private readonly byKey: ReadonlyMap<string, Constraint>;
  readonly signature: string;

  private constructor(readonly entries: ReadonlyArray<readonly [string, Constraint]>) {
    this.byKey = new Map(entries);
    this.signature = JSON.stringify(this.toJSON());
  }

  static from(input?: FilterInput | Filter): Filter {
    if (input instanceof Filter) return input;
    if (!input) return Filter.EMPTY;

    const entries: Array<readonly [string, Constraint]> = [];
    for (const key of Object.keys(input).sort()) {
      const value = input[key];
      if (value === undefined) continue;
      if (isScalarList(value) && value.length === 0) {
        throw new TypeError(`Filter key "${key}" has an empty allowed-set`);
      }
      entries.push([key, toConstraint(value)]);
    }
    return entries.length === 0 ? Filter.EMPTY : new Filter(entries);
  }

  /**
   * Rebuilds a filter from its signature (the canonical JSON form).
   */
  static parse(signature: string): Filter {
    const parsed: unknown = JSON.parse(signature);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new TypeError(`Malformed filter signature: ${signature}`);
    }
    const input: Record<string, ScalarInput | ScalarInput[]> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (isScalar(value) || (Array.isArray(value) && value.every(isScalar))) {
        input[key] = value;
      } else {
        throw new TypeError(`Malformed filter value for "${key}" in ${signature}`);
      }
    }
    return Filter.from(input);
  }

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  keys(): string[] {
    return this.entries.map(([key]) => key);
  }

  get(key: string): Constraint | undefined {
    return this.byKey.get(key);
  }

  /**
   * `this ⊑ other`: data cached under `this` can answer queries for `other`.
   */
  subsumes(other: Filter): boolean {
    if (this.size > other.size) return false;
    for (const [key, constraint] of this.entries) {
      const counterpart = other.byKey.get(key);
      if (!counterpart || !sameConstraint(constraint, counterpart)) return false;
    }
    return true;
  }

  /**
   * Comparable under `⊑` in either direction
   */
  comparableWith(other: Filter): boolean {
    return this.subsumes(other) || other.subsumes(this);
  }

  equals(other: Filter): boolean {
    return this.signature === other.signature;
  }

  /**
   * Constraints of `this` that `general` leaves open
   */
  residual(general: Filter): Filter {
    const remaining = this.entries.filter(([key]) => !general.byKey.has(key));
    return remaining.length === this.entries.length
      ? this
      : remaining.length === 0
        ? Filter.EMPTY
        : new Filter(remaining);
  }

  matches(fields: Readonly<Record<string, FieldValue>>): boolean {
    return this.entries.every(([key, constraint]) => constraintAccepts(constraint, fields[key]));
  }

  toJSON(): FilterJson {
    const json: FilterJson = {};
    for (const [key, constraint] of this.entries) {
      json[key] = constraint.kind === "exact" ? constraint.value : [...constraint.values];
    }
    return json;
  }

  toString(): string {
    return this.signature;
  }
}

function isScalar(value: unknown): value is Scalar {
  return typeof value === "string" || typeof value === "boolean";
}
