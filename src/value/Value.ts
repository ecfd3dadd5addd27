import { DEFAULT_MAX_DEPTH } from "../constants.js";
import { ValueConversionError } from "../errors.js";

export type StringScalar = { type: "scalar"; kind: "string"; value: string };
export type IntegerScalar = { type: "scalar"; kind: "integer"; value: number };
export type FloatScalar = { type: "scalar"; kind: "float"; value: number };
export type BooleanScalar = { type: "scalar"; kind: "boolean"; value: boolean };
export type NullScalar = { type: "scalar"; kind: "null"; value: null };

export type Scalar =
  | StringScalar
  | IntegerScalar
  | FloatScalar
  | BooleanScalar
  | NullScalar;

export type ScalarKind = Scalar["kind"];

export type Sequence = { type: "sequence"; items: readonly Value[] };

/**
 * Mapping keys are strings or integers. Integer keys only appear when the
 * data was built from a `Map` or with `map()`; plain objects always yield
 * string keys.
 */
export type MappingKey = string | number;

export type MappingEntry = { key: MappingKey; value: Value };

export type Mapping = { type: "mapping"; entries: readonly MappingEntry[] };

/**
 * Generic tagged representation of parsed data.
 */
export type Value = Scalar | Sequence | Mapping;

const CANONICAL_INTEGER = /^-?(0|[1-9][0-9]*)$/;

/**
 * Returns the integer a string spells in canonical form ("42", "-7", "0"),
 * or `undefined` for anything else ("007", "1.0", "1e3").
 */
export function canonicalInteger(text: string): number | undefined {
  if (!CANONICAL_INTEGER.test(text)) return undefined;

  const n = Number(text);
  return Number.isSafeInteger(n) ? n : undefined;
}

export function str(value: string): StringScalar {
  return { type: "scalar", kind: "string", value };
}

export function int(value: number): IntegerScalar {
  if (!Number.isInteger(value)) {
    throw new ValueConversionError(`Not an integer: ${value}`);
  }
  return { type: "scalar", kind: "integer", value };
}

export function float(value: number): FloatScalar {
  return { type: "scalar", kind: "float", value };
}

export function bool(value: boolean): BooleanScalar {
  return { type: "scalar", kind: "boolean", value };
}

export function nil(): NullScalar {
  return { type: "scalar", kind: "null", value: null };
}

export function seq(items: readonly Value[]): Sequence {
  return { type: "sequence", items: Object.freeze([...items]) };
}

/**
 * Builds a Mapping from ordered `[key, value]` pairs.
 *
 * @throws ValueConversionError on a repeated key or a non-integer numeric key.
 */
export function map(pairs: Iterable<readonly [MappingKey, Value]>): Mapping {
  const seen = new Set<MappingKey>();
  const entries: MappingEntry[] = [];

  for (const [key, value] of pairs) {
    if (typeof key === "number" && !Number.isInteger(key)) {
      throw new ValueConversionError(`Mapping keys must be integers or strings, got ${key}`);
    }
    if (seen.has(key)) {
      throw new ValueConversionError(`Duplicate mapping key: ${String(key)}`);
    }
    seen.add(key);
    entries.push(Object.freeze({ key, value }));
  }

  return { type: "mapping", entries: Object.freeze(entries) };
}

export interface ConversionOptions {
  /** Deepest nesting converted. Defaults to DEFAULT_MAX_DEPTH. */
  maxDepth?: number;
}

/**
 * Converts native data (as produced by a YAML or JSON parser) into a Value.
 *
 * - numbers become `integer` scalars when `Number.isInteger`, `float` otherwise
 * - `Map` instances keep their string and integer keys
 * - `Date` instances become ISO-8601 strings
 *
 * @param data - Parsed document.
 * @param options - Depth limit.
 * @returns The Value tree.
 * @throws ValueConversionError on unsupported types, reference cycles or
 * nesting deeper than the limit.
 */
export function fromNative(data: unknown, options: ConversionOptions = {}): Value {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const ancestors = new Set<object>();

  const convert = (node: unknown, at: string, depth: number): Value => {
    if (depth > maxDepth) {
      throw new ValueConversionError(
        `Nesting deeper than ${maxDepth} levels at '${at}'`
      );
    }
    if (node === null) return nil();

    switch (typeof node) {
      case "string":
        return str(node);
      case "boolean":
        return bool(node);
      case "number":
        return Number.isInteger(node) ? int(node) : float(node);
      case "object":
        break;
      default:
        throw new ValueConversionError(
          `Unsupported value of type ${typeof node} at '${at || "(root)"}'`
        );
    }

    if (node instanceof Date) return str(node.toISOString());

    if (ancestors.has(node)) {
      throw new ValueConversionError(`Reference cycle at '${at || "(root)"}'`);
    }
    ancestors.add(node);

    try {
      if (Array.isArray(node)) {
        return seq(node.map((item, i) => convert(item, `${at}[${i}]`, depth + 1)));
      }

      if (node instanceof Map) {
        const pairs: [MappingKey, Value][] = [];
        for (const [key, value] of node) {
          if (typeof key !== "string" && typeof key !== "number") {
            throw new ValueConversionError(
              `Unsupported mapping key of type ${typeof key} at '${at || "(root)"}'`
            );
          }
          pairs.push([key, convert(value, `${at}[${String(key)}]`, depth + 1)]);
        }
        return map(pairs);
      }

      return map(
        Object.entries(node).map(
          ([key, value]): [MappingKey, Value] => [
            key,
            convert(value, at ? `${at}.${key}` : key, depth + 1),
          ]
        )
      );
    } finally {
      ancestors.delete(node);
    }
  };

  return convert(data, "", 0);
}

/**
 * Converts a Value back to plain JS data. Integer keys become string
 * property names.
 *
 * @throws ValueConversionError on nesting deeper than the limit.
 */
export function toNative(value: Value, options: ConversionOptions = {}): unknown {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  const convert = (node: Value, depth: number): unknown => {
    if (depth > maxDepth) {
      throw new ValueConversionError(`Nesting deeper than ${maxDepth} levels`);
    }

    switch (node.type) {
      case "scalar":
        return node.value;
      case "sequence":
        return node.items.map((item) => convert(item, depth + 1));
      case "mapping": {
        const out: Record<string, unknown> = {};
        for (const entry of node.entries) {
          out[String(entry.key)] = convert(entry.value, depth + 1);
        }
        return out;
      }
    }
  };

  return convert(value, 0);
}

/**
 * Looks up a key in a Mapping. Keys match by type and value: the string
 * "1" and the integer 1 are different keys.
 */
export function getEntry(mapping: Mapping, key: MappingKey): Value | undefined {
  return mapping.entries.find((entry) => entry.key === key)?.value;
}

/**
 * Names the shape of a value the way schema documents do.
 */
export function describeValue(value: Value): string {
  switch (value.type) {
    case "sequence":
      return "array";
    case "mapping":
      return "map";
    case "scalar":
      return value.kind === "float" ? "number" : value.kind;
  }
}

/**
 * Compares a scalar with a literal by value. Integers and floats compare
 * numerically; a number never equals a string.
 */
export function scalarEquals(scalar: Scalar, literal: string | number | boolean): boolean {
  switch (scalar.kind) {
    case "string":
      return typeof literal === "string" && scalar.value === literal;
    case "integer":
    case "float":
      return typeof literal === "number" && scalar.value === literal;
    case "boolean":
      return typeof literal === "boolean" && scalar.value === literal;
    case "null":
      return false;
  }
}
