import { DataFormatError, SchemaDefinitionError } from "../errors.js";
import { parseByType, parseYamlOrJson, type DataFormat } from "../parser/index.js";
import {
  MapKeysEntry,
  PropertyEntry,
  SchemaDocument,
  TypeDefinition,
  parseShape,
} from "./documentShape.js";
import { findDuplicateTopLevelKey } from "./topLevelKeys.js";
import { TypeRegistry } from "./TypeRegistry.js";
import {
  ROOT_NAME,
  type MapKeyKind,
  type PrimitiveKind,
  type PropertyDef,
  type SchemaModel,
  type TypeDef,
  type TypeRef,
} from "./types.js";

const PRIMITIVES: readonly string[] = ["string", "integer", "number", "boolean"];

/**
 * Checks deferred until every type name is known.
 */
type Pending = {
  references: { name: string; location: string }[];
  mapKeys: { keyType: string | undefined; location: string }[];
};

/**
 * Builds an immutable SchemaModel from a parsed schema document.
 *
 * The document maps `<<root>>` and type names to definitions:
 *
 * ```yaml
 * <<root>>:
 *   projects:
 *     type: array
 *     items:
 *       $ref: '#/Project'
 * Project:
 *   properties:
 *     name:
 *       type: string
 *     description:
 *       type: string
 *       optional: true
 * ```
 *
 * References are resolved after every definition is parsed, so types may
 * refer to each other in any order and to themselves.
 *
 * @param document - A plain object (or `Map`) as produced by a YAML/JSON parser.
 * @returns The resolved schema.
 * @throws SchemaDefinitionError on the first problem found.
 */
export function loadSchema(document: unknown): SchemaModel {
  const entries = topLevelEntries(document);

  // 1. collect names
  const names = new Set<string>();
  let rawRoot: unknown;
  let hasRoot = false;

  for (const [name, raw] of entries) {
    if (name === ROOT_NAME) {
      if (hasRoot) throw duplicate(name);
      hasRoot = true;
      rawRoot = raw;
      continue;
    }
    if (names.has(name)) throw duplicate(name);
    names.add(name);
  }

  if (!hasRoot) {
    throw new SchemaDefinitionError(
      "MalformedSchemaDocument",
      `missing '${ROOT_NAME}' definition`
    );
  }

  // 2. parse definitions
  const pending: Pending = { references: [], mapKeys: [] };
  const root = parseRoot(rawRoot, pending);
  const types = new Map<string, TypeDef>();

  for (const [name, raw] of entries) {
    if (name === ROOT_NAME) continue;
    types.set(name, parseTypeDef(name, raw, pending));
  }

  // 3. resolve references
  for (const ref of pending.references) {
    if (ref.name !== ROOT_NAME && !names.has(ref.name)) {
      throw new SchemaDefinitionError(
        "UnknownTypeReference",
        `no type named '${ref.name}'`,
        ref.location
      );
    }
  }

  // 4. map key kinds
  for (const { keyType, location } of pending.mapKeys) {
    if (!isMapKeyKind(keyType)) {
      throw new SchemaDefinitionError(
        "InvalidMapKeyType",
        keyType === undefined
          ? "map keys need a type (string or integer)"
          : `map keys must be string or integer, got '${keyType}'`,
        location
      );
    }
  }

  // 5. the entry point must be finite
  assertRootNotCircular(root, types);

  return Object.freeze({ root, types: new TypeRegistry(types) });
}

export interface SchemaTextOptions {
  /** Forces a format instead of trying YAML, then JSON. */
  format?: DataFormat;
  /** Name used in parse error messages. */
  source?: string;
}

/**
 * Parses YAML or JSON schema text and loads it.
 *
 * Repeated top-level names are reported as `DuplicateTypeName` before the
 * text reaches the parser.
 *
 * @param text - Schema document text.
 * @param options - Format and source name.
 * @throws SchemaDefinitionError
 */
export function loadSchemaText(text: string, options: SchemaTextOptions = {}): SchemaModel {
  const { format, source = "schema" } = options;

  const repeated = findDuplicateTopLevelKey(text);
  if (repeated !== undefined) throw duplicate(repeated);

  let document: unknown;
  try {
    document =
      format === undefined
        ? parseYamlOrJson(text, source)
        : parseByType(format, { rawContent: text, source });
  } catch (err) {
    if (err instanceof DataFormatError) {
      throw new SchemaDefinitionError("MalformedSchemaDocument", err.message);
    }
    throw err;
  }

  return loadSchema(document);
}

function topLevelEntries(document: unknown): [string, unknown][] {
  if (document instanceof Map) {
    return [...document].map(([name, raw]): [string, unknown] => [String(name), raw]);
  }

  return Object.entries(parseShape(SchemaDocument, document));
}

function duplicate(name: string): SchemaDefinitionError {
  return new SchemaDefinitionError(
    "DuplicateTypeName",
    `type '${name}' is defined more than once`,
    name
  );
}

function parseRoot(raw: unknown, pending: Pending): TypeDef {
  let props = parseShape(SchemaDocument, raw, ROOT_NAME);

  // `<<root>>: { properties: {...} }` is accepted as well as the bare form,
  // unless `properties` is itself a property entry, i.e. carries a string
  // `type` or `$ref`. Properties named `type` or `$ref` keep the wrapped form.
  const keys = Object.keys(props);
  if (keys.length === 1 && keys[0] === "properties") {
    const inner = SchemaDocument.safeParse(props.properties);
    if (
      inner.success &&
      typeof inner.data.type !== "string" &&
      typeof inner.data.$ref !== "string"
    ) {
      props = inner.data;
    }
  }

  return freezeTypeDef(ROOT_NAME, undefined, parseProperties(ROOT_NAME, props, pending));
}

function parseTypeDef(name: string, raw: unknown, pending: Pending): TypeDef {
  const def = parseShape(TypeDefinition, raw, name);

  return freezeTypeDef(name, def.description, parseProperties(name, def.properties, pending));
}

function parseProperties(
  owner: string,
  raw: Record<string, unknown>,
  pending: Pending
): PropertyDef[] {
  return Object.entries(raw).map(([name, entryRaw]) => {
    const location = `${owner}.${name}`;
    const entry = parseShape(PropertyEntry, entryRaw, location);

    const prop: PropertyDef = {
      name,
      type: parseTypeRef(entry, location, pending),
      optional: entry.optional ?? false,
      description: entry.description,
    };
    return Object.freeze(prop);
  });
}

/**
 * Parses the `items` of an array or the `values` of a map.
 */
function parseNestedTypeRef(raw: unknown, location: string, pending: Pending): TypeRef {
  const entry = parseShape(PropertyEntry, raw, location);
  if (entry.optional !== undefined) {
    throw new SchemaDefinitionError(
      "MalformedSchemaDocument",
      "'optional' is only allowed on properties",
      location
    );
  }

  return parseTypeRef(entry, location, pending);
}

function parseTypeRef(entry: PropertyEntry, location: string, pending: Pending): TypeRef {
  const ambiguous = (message: string) =>
    new SchemaDefinitionError("AmbiguousOrMissingTypeSpecifier", message, location);

  const stray = (allowed: readonly string[]) => {
    const extra = (["items", "keys", "values"] as const).find(
      (k) => entry[k] !== undefined && !allowed.includes(k)
    );
    if (extra !== undefined) {
      throw ambiguous(`'${extra}' does not belong with ${describeSpecifier(entry)}`);
    }
  };

  if (entry.properties !== undefined) {
    throw ambiguous("inline object definitions are not allowed, use $ref to a named type");
  }
  if (entry.type !== undefined && entry.$ref !== undefined) {
    throw ambiguous("both 'type' and '$ref' given");
  }

  if (entry.$ref !== undefined) {
    stray([]);
    const name = entry.$ref.startsWith("#/") ? entry.$ref.slice(2) : entry.$ref;
    pending.references.push({ name, location });
    return freezeRef({ kind: "reference", name });
  }

  switch (entry.type) {
    case undefined:
      throw ambiguous("no type specifier, expected 'type' or '$ref'");

    case "array": {
      stray(["items"]);
      if (entry.items === undefined) throw ambiguous("type: array must have items");
      const items = parseNestedTypeRef(entry.items, `${location} (array items)`, pending);
      return freezeRef({ kind: "array", items });
    }

    case "map": {
      stray(["keys", "values"]);
      if (entry.keys === undefined || entry.values === undefined) {
        throw ambiguous("type: map must have keys and values");
      }
      const keys = parseShape(MapKeysEntry, entry.keys, `${location} (map keys)`);
      pending.mapKeys.push({ keyType: keys.type, location: `${location} (map keys)` });

      const values = parseNestedTypeRef(entry.values, `${location} (map values)`, pending);
      // An invalid key kind fails step 4, so the fallback never escapes.
      const keyKind: MapKeyKind = isMapKeyKind(keys.type) ? keys.type : "string";
      return freezeRef({ kind: "map", keys: keyKind, values });
    }

    case "object":
      throw ambiguous("generic 'object' is not allowed here, use $ref to a named type or type: map");

    case "null":
      throw ambiguous("null type is not supported");

    default:
      if (!isPrimitiveKind(entry.type)) {
        throw ambiguous(`unsupported type '${entry.type}'`);
      }
      stray([]);
      return freezeRef({ kind: "primitive", primitive: entry.type });
  }
}

function freezeRef(ref: TypeRef): TypeRef {
  return Object.freeze(ref);
}

function describeSpecifier(entry: PropertyEntry): string {
  return entry.$ref !== undefined ? "$ref" : `type: ${entry.type}`;
}

function isPrimitiveKind(type: string): type is PrimitiveKind {
  return PRIMITIVES.includes(type);
}

function isMapKeyKind(type: string | undefined): type is MapKeyKind {
  return type === "string" || type === "integer";
}

function freezeTypeDef(
  name: string,
  description: string | undefined,
  properties: PropertyDef[]
): TypeDef {
  const def: TypeDef = { name, description, properties: Object.freeze(properties) };
  return Object.freeze(def);
}

/**
 * Follows direct reference properties (never array items or map values)
 * from the root; reaching the root again means no finite document could
 * satisfy it.
 */
function assertRootNotCircular(root: TypeDef, types: ReadonlyMap<string, TypeDef>): void {
  const visited = new Set<string>();

  const walk = (def: TypeDef, chain: string[]): void => {
    for (const prop of def.properties) {
      if (prop.type.kind !== "reference") continue;

      const next = [...chain, `${def.name}.${prop.name}`];
      if (prop.type.name === ROOT_NAME) {
        throw new SchemaDefinitionError(
          "CircularRootDefinition",
          `root refers back to itself through ${next.join(" -> ")}`,
          ROOT_NAME
        );
      }

      if (visited.has(prop.type.name)) continue;
      visited.add(prop.type.name);

      const target = types.get(prop.type.name);
      if (target) walk(target, next);
    }
  };

  walk(root, []);
}
