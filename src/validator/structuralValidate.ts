import { DEFAULT_MAX_DEPTH } from "../constants.js";
import { formatPath } from "../datapath/formatPath.js";
import { field, index, key, type PathStep } from "../datapath/types.js";
import {
  ROOT_NAME,
  type MapRef,
  type PrimitiveKind,
  type SchemaModel,
  type TypeDef,
  type TypeRef,
} from "../schema/types.js";
import {
  canonicalInteger,
  describeValue,
  getEntry,
  type Mapping,
  type Value,
} from "../value/Value.js";
import type { ValidateOptions, ValidationError, ValidationResult } from "./Validator.js";

/**
 * Checks `value` against the root definition of `schema`.
 *
 * Every problem is collected: a mismatch stops only the subtree it was found
 * in, and siblings are still checked. Error paths are DataPath expressions,
 * e.g. `projects[0].epics[0].user_stories[0].id`.
 *
 * @param value - The data to validate.
 * @param schema - A model built by `loadSchema`.
 * @param options - Depth limit.
 * @returns `ok` and the ordered list of errors.
 * @throws TypeError if called without a value or schema.
 */
export function structuralValidate(
  value: Value,
  schema: SchemaModel,
  options: ValidateOptions = {}
): ValidationResult {
  if (value == null || schema == null) {
    throw new TypeError("validate() needs a value and a schema model");
  }

  const walk = new SchemaWalk(schema, options.maxDepth ?? DEFAULT_MAX_DEPTH);
  walk.object(value, schema.root, [], 0);

  return { ok: walk.errors.length === 0, errors: walk.errors };
}

class SchemaWalk {
  readonly errors: ValidationError[] = [];

  constructor(
    private readonly schema: SchemaModel,
    private readonly maxDepth: number
  ) {}

  node(value: Value, type: TypeRef, path: PathStep[], depth: number): void {
    if (depth > this.maxDepth) {
      this.errors.push({
        kind: "MaxDepthExceeded",
        path: formatPath(path),
        limit: this.maxDepth,
        message: `nesting deeper than ${this.maxDepth} levels`,
      });
      return;
    }

    switch (type.kind) {
      case "primitive":
        if (!matchesPrimitive(value, type.primitive)) {
          this.mismatch(path, type.primitive, value);
        }
        return;

      case "array": {
        if (value.type !== "sequence") {
          this.mismatch(path, "array", value);
          return;
        }
        const itemType = type.items;
        value.items.forEach((item, i) => {
          this.node(item, itemType, [...path, index(i)], depth + 1);
        });
        return;
      }

      case "map":
        this.map(value, type, path, depth);
        return;

      case "reference":
        this.object(value, this.lookup(type.name), path, depth);
        return;
    }
  }

  object(value: Value, def: TypeDef, path: PathStep[], depth: number): void {
    if (value.type !== "mapping") {
      this.mismatch(path, def.name === ROOT_NAME ? "map" : def.name, value);
      return;
    }

    for (const prop of def.properties) {
      const propPath = [...path, field(prop.name)];
      const child = lookupProperty(value, prop.name);

      if (child === undefined) {
        if (!prop.optional) {
          this.errors.push({
            kind: "MissingRequiredProperty",
            path: formatPath(propPath),
            property: prop.name,
            message: `missing required property '${prop.name}'`,
          });
        }
        continue;
      }

      this.node(child, prop.type, propPath, depth + 1);
    }

    // Closed world: nothing beyond the declared properties.
    const declared = new Set(def.properties.map((prop) => prop.name));
    for (const entry of value.entries) {
      const name = String(entry.key);
      if (declared.has(name)) continue;

      this.errors.push({
        kind: "UnknownProperty",
        path: formatPath([...path, field(name)]),
        property: name,
        message: `unknown property '${name}'`,
      });
    }
  }

  private map(value: Value, type: MapRef, path: PathStep[], depth: number): void {
    if (value.type !== "mapping") {
      this.mismatch(path, "map", value);
      return;
    }

    for (const entry of value.entries) {
      let step: PathStep;

      if (type.keys === "integer") {
        const n = typeof entry.key === "number" ? entry.key : canonicalInteger(entry.key);
        if (n === undefined) {
          this.errors.push({
            kind: "InvalidMapKey",
            path: formatPath([...path, key(String(entry.key))]),
            key: entry.key,
            expected: "integer",
            message: `map key ${JSON.stringify(entry.key)} is not an integer`,
          });
          continue;
        }
        step = index(n);
      } else {
        step = key(String(entry.key));
      }

      this.node(entry.value, type.values, [...path, step], depth + 1);
    }
  }

  private lookup(name: string): TypeDef {
    if (name === ROOT_NAME) return this.schema.root;

    const def = this.schema.types.get(name);
    if (!def) throw new TypeError(`Schema model has no type named '${name}'`);

    return def;
  }

  private mismatch(path: PathStep[], expected: string, value: Value): void {
    const actual = describeValue(value);

    this.errors.push({
      kind: "TypeMismatch",
      path: formatPath(path),
      expected,
      actual,
      message: `expected ${expected}, got ${actual}`,
    });
  }
}

function matchesPrimitive(value: Value, kind: PrimitiveKind): boolean {
  if (value.type !== "scalar") return false;

  switch (kind) {
    case "string":
      return value.kind === "string";
    case "integer":
      return value.kind === "integer";
    case "number":
      // JSON has no integer/float split on the wire.
      return value.kind === "integer" || value.kind === "float";
    case "boolean":
      return value.kind === "boolean";
  }
}

function lookupProperty(mapping: Mapping, name: string): Value | undefined {
  const found = getEntry(mapping, name);
  if (found !== undefined) return found;

  const n = canonicalInteger(name);
  return n === undefined ? undefined : getEntry(mapping, n);
}

/**
 * Renders one error as `<path>: <message>`, with `(root)` for the root.
 */
export function formatValidationError(error: ValidationError): string {
  return `${error.path || "(root)"}: ${error.message}`;
}
