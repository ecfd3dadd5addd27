import { describe, expect, it } from "vitest";
import { SchemaDefinitionError, type SchemaErrorKind } from "../src/errors.js";
import { loadSchema, loadSchemaText } from "../src/schema/SchemaLoader.js";
import { findDuplicateTopLevelKey, scanTopLevelKeys } from "../src/schema/topLevelKeys.js";
import { ROOT_NAME } from "../src/schema/types.js";
import { structuralValidate } from "../src/validator/structuralValidate.js";
import { fromNative } from "../src/value/Value.js";
import { projectSchema } from "./helpers.js";

function schemaError(load: () => unknown): SchemaDefinitionError {
  try {
    load();
  } catch (err) {
    if (err instanceof SchemaDefinitionError) return err;
    throw err;
  }
  throw new Error("expected the schema to be rejected");
}

function expectSchemaError(
  document: unknown,
  kind: SchemaErrorKind,
  location: string | undefined,
  message: string
) {
  const err = schemaError(() => loadSchema(document));
  expect({ kind: err.kind, location: err.location, message: err.message }).toEqual({
    kind,
    location,
    message,
  });
}

describe("loadSchema", () => {
  it("loads the sample backlog schema", () => {
    const schema = projectSchema();

    expect(schema.root.name).toBe(ROOT_NAME);
    expect([...schema.types.keys()]).toEqual([
      "Project",
      "Epic",
      "UserStory",
      "Task",
      "Metrics",
    ]);
    expect(schema.types.get("Project")?.description).toBe("A product and its backlog");
  });

  it("builds typed property definitions", () => {
    const schema = projectSchema();

    expect(schema.root.properties).toEqual([
      {
        name: "projects",
        type: { kind: "array", items: { kind: "reference", name: "Project" } },
        optional: false,
        description: undefined,
      },
      {
        name: "metrics",
        type: {
          kind: "map",
          keys: "integer",
          values: { kind: "reference", name: "Metrics" },
        },
        optional: true,
        description: "Delivery figures per year",
      },
    ]);

    const task = schema.types.get("Task");
    expect(task?.properties.map((p) => [p.name, p.type.kind])).toEqual([
      ["id", "primitive"],
      ["description", "primitive"],
      ["sub_tasks", "array"],
    ]);
  });

  it("freezes the model", () => {
    const schema = projectSchema();

    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.root)).toBe(true);
    expect(Object.isFrozen(schema.root.properties)).toBe(true);
    expect(Object.isFrozen(schema.root.properties[0].type)).toBe(true);
  });

  it("does not let named types be added or removed", () => {
    const schema = projectSchema();

    expect(schema.types).not.toBeInstanceOf(Map);
    expect(Object.isFrozen(schema.types)).toBe(true);
    expect(Reflect.get(schema.types, "set")).toBeUndefined();
    expect(Reflect.get(schema.types, "delete")).toBeUndefined();
    expect(Reflect.get(schema.types, "clear")).toBeUndefined();
    expect(() => Map.prototype.delete.call(schema.types, "Task")).toThrow(TypeError);
    expect(() => Map.prototype.clear.call(schema.types)).toThrow(TypeError);

    expect(schema.types.size).toBe(5);
    expect(schema.types.has("Task")).toBe(true);
  });

  it("keeps validating after an attempt to remove a type", () => {
    const schema = loadSchema({
      [ROOT_NAME]: { a: { $ref: "A" } },
      A: { properties: { x: { type: "string" } } },
    });

    expect(() => Map.prototype.delete.call(schema.types, "A")).toThrow(TypeError);
    expect(structuralValidate(fromNative({ a: { x: "1" } }), schema)).toEqual({
      ok: true,
      errors: [],
    });
  });

  it("iterates named types in document order", () => {
    const schema = loadSchema({
      [ROOT_NAME]: {},
      B: { properties: {} },
      A: { properties: {} },
    });

    expect([...schema.types].map(([name]) => name)).toEqual(["B", "A"]);
    expect([...schema.types.values()].map((def) => def.name)).toEqual(["B", "A"]);

    const seen: string[] = [];
    schema.types.forEach((def, name) => seen.push(`${name}=${def.name}`));
    expect(seen).toEqual(["B=B", "A=A"]);
  });

  it("accepts types in any order and self references", () => {
    const schema = loadSchema({
      [ROOT_NAME]: { tree: { $ref: "Node" } },
      Node: {
        properties: {
          label: { type: "string" },
          children: { type: "array", items: { $ref: "#/Node" } },
        },
      },
    });

    expect(schema.types.get("Node")?.properties[1].type).toEqual({
      kind: "array",
      items: { kind: "reference", name: "Node" },
    });
  });

  it("accepts a root wrapped in properties", () => {
    const schema = loadSchema({
      [ROOT_NAME]: { properties: { name: { type: "string" } } },
    });

    expect(schema.root.properties.map((p) => p.name)).toEqual(["name"]);
  });

  it("unwraps a root whose properties are named type and $ref", () => {
    const schema = loadSchema({
      [ROOT_NAME]: {
        properties: {
          type: { type: "string" },
          $ref: { type: "integer" },
        },
      },
    });

    expect(schema.root.properties.map((p) => [p.name, p.type])).toEqual([
      ["type", { kind: "primitive", primitive: "string" }],
      ["$ref", { kind: "primitive", primitive: "integer" }],
    ]);
  });

  it("keeps a root property called properties", () => {
    const schema = loadSchema({
      [ROOT_NAME]: { properties: { type: "string" } },
    });

    expect(schema.root.properties).toEqual([
      {
        name: "properties",
        type: { kind: "primitive", primitive: "string" },
        optional: false,
        description: undefined,
      },
    ]);
  });

  it("accepts a Map document", () => {
    const schema = loadSchema(
      new Map<string, unknown>([[ROOT_NAME, { count: { type: "integer" } }]])
    );

    expect(schema.root.properties[0].type).toEqual({ kind: "primitive", primitive: "integer" });
  });

  it("allows a type to reference the root through an array", () => {
    const schema = loadSchema({
      [ROOT_NAME]: { children: { type: "array", items: { $ref: ROOT_NAME } } },
    });

    expect(schema.root.properties[0].type).toEqual({
      kind: "array",
      items: { kind: "reference", name: ROOT_NAME },
    });
  });
});

describe("schema definition errors", () => {
  it("reports a repeated type name in schema text", () => {
    const text = [
      "<<root>>:",
      "  task:",
      "    $ref: '#/Task'",
      "Task:",
      "  properties: {}",
      "Task:",
      "  properties: {}",
    ].join("\n");

    const err = schemaError(() => loadSchemaText(text));
    expect(err.kind).toBe("DuplicateTypeName");
    expect(err.location).toBe("Task");
    expect(err.message).toBe("DuplicateTypeName at Task: type 'Task' is defined more than once");
  });

  it("reports a repeated type name in JSON text", () => {
    const text = `{"<<root>>": {}, "A": {"properties": {}}, "A": {"properties": {}}}`;
    expect(schemaError(() => loadSchemaText(text)).kind).toBe("DuplicateTypeName");
  });

  it("reports Map keys that collide as names", () => {
    const document = new Map<string | number, unknown>([
      [ROOT_NAME, {}],
      [1, { properties: {} }],
      ["1", { properties: {} }],
    ]);

    expectSchemaError(
      document,
      "DuplicateTypeName",
      "1",
      "DuplicateTypeName at 1: type '1' is defined more than once"
    );
  });

  it("reports an unknown reference at the property", () => {
    expectSchemaError(
      {
        [ROOT_NAME]: { epics: { type: "array", items: { $ref: "#/Epic" } } },
        Epic: { properties: { owner: { $ref: "#/Person" } } },
      },
      "UnknownTypeReference",
      "Epic.owner",
      "UnknownTypeReference at Epic.owner: no type named 'Person'"
    );
  });

  it("reports an unknown reference inside array items", () => {
    expectSchemaError(
      { [ROOT_NAME]: { xs: { type: "array", items: { $ref: "Missing" } } } },
      "UnknownTypeReference",
      "<<root>>.xs (array items)",
      "UnknownTypeReference at <<root>>.xs (array items): no type named 'Missing'"
    );
  });

  it.each([
    [{ name: {} }, "no type specifier, expected 'type' or '$ref'"],
    [{ name: { type: "string", $ref: "#/A" } }, "both 'type' and '$ref' given"],
    [{ name: { type: "array" } }, "type: array must have items"],
    [{ name: { type: "map", keys: { type: "string" } } }, "type: map must have keys and values"],
    [
      { name: { type: "object" } },
      "generic 'object' is not allowed here, use $ref to a named type or type: map",
    ],
    [
      { name: { type: "object", properties: { a: { type: "string" } } } },
      "inline object definitions are not allowed, use $ref to a named type",
    ],
    [{ name: { type: "null" } }, "null type is not supported"],
    [{ name: { type: "date" } }, "unsupported type 'date'"],
    [{ name: { type: "string", items: { type: "string" } } }, "'items' does not belong with type: string"],
    [
      { name: { type: "array", items: { type: "string" }, values: { type: "string" } } },
      "'values' does not belong with type: array",
    ],
  ])("rejects an ambiguous or missing type specifier (%j)", (root, reason) => {
    expectSchemaError(
      { [ROOT_NAME]: root },
      "AmbiguousOrMissingTypeSpecifier",
      "<<root>>.name",
      `AmbiguousOrMissingTypeSpecifier at <<root>>.name: ${reason}`
    );
  });

  it("reports a stray entry next to $ref", () => {
    expectSchemaError(
      {
        [ROOT_NAME]: { a: { $ref: "A", items: { type: "string" } } },
        A: { properties: {} },
      },
      "AmbiguousOrMissingTypeSpecifier",
      "<<root>>.a",
      "AmbiguousOrMissingTypeSpecifier at <<root>>.a: 'items' does not belong with $ref"
    );
  });

  it("reports map keys that are neither string nor integer", () => {
    expectSchemaError(
      {
        [ROOT_NAME]: {
          byScore: { type: "map", keys: { type: "number" }, values: { type: "string" } },
        },
      },
      "InvalidMapKeyType",
      "<<root>>.byScore (map keys)",
      "InvalidMapKeyType at <<root>>.byScore (map keys): map keys must be string or integer, got 'number'"
    );
  });

  it("reports map keys without a type", () => {
    const err = schemaError(() =>
      loadSchema({
        [ROOT_NAME]: { m: { type: "map", keys: {}, values: { type: "string" } } },
      })
    );

    expect(err.kind).toBe("InvalidMapKeyType");
    expect(err.message).toContain("map keys need a type (string or integer)");
  });

  it("checks references before map key kinds", () => {
    const err = schemaError(() =>
      loadSchema({
        [ROOT_NAME]: {
          m: { type: "map", keys: { type: "boolean" }, values: { $ref: "Nowhere" } },
        },
      })
    );

    expect(err.kind).toBe("UnknownTypeReference");
  });

  it("reports a root that refers back to itself", () => {
    expectSchemaError(
      {
        [ROOT_NAME]: { config: { $ref: "Config" } },
        Config: { properties: { parent: { $ref: ROOT_NAME } } },
      },
      "CircularRootDefinition",
      ROOT_NAME,
      "CircularRootDefinition at <<root>>: root refers back to itself through <<root>>.config -> Config.parent"
    );
  });

  it("reports a root that contains itself directly", () => {
    const err = schemaError(() =>
      loadSchema({ [ROOT_NAME]: { self: { $ref: "#/<<root>>" } } })
    );
    expect(err.kind).toBe("CircularRootDefinition");
  });

  it("reports a missing root", () => {
    expectSchemaError(
      { Task: { properties: {} } },
      "MalformedSchemaDocument",
      undefined,
      "MalformedSchemaDocument: missing '<<root>>' definition"
    );
  });

  it("reports a document that is not a mapping", () => {
    expect(schemaError(() => loadSchema(["a"])).kind).toBe("MalformedSchemaDocument");
    expect(schemaError(() => loadSchema("text")).kind).toBe("MalformedSchemaDocument");
  });

  it("reports a named type without properties", () => {
    const err = schemaError(() =>
      loadSchema({ [ROOT_NAME]: {}, Task: { id: { type: "string" } } })
    );

    expect(err.kind).toBe("MalformedSchemaDocument");
    expect(err.location).toBe("Task.properties");
  });

  it("reports an unknown key in a property entry", () => {
    const err = schemaError(() =>
      loadSchema({ [ROOT_NAME]: { id: { type: "string", minLength: 3 } } })
    );

    expect(err.kind).toBe("MalformedSchemaDocument");
    expect(err.location).toBe("<<root>>.id");
  });

  it("reports a non-boolean optional flag", () => {
    const err = schemaError(() =>
      loadSchema({ [ROOT_NAME]: { id: { type: "string", optional: "yes" } } })
    );

    expect(err.kind).toBe("MalformedSchemaDocument");
    expect(err.location).toBe("<<root>>.id.optional");
  });

  it("reports optional on array items", () => {
    expectSchemaError(
      { [ROOT_NAME]: { xs: { type: "array", items: { type: "string", optional: true } } } },
      "MalformedSchemaDocument",
      "<<root>>.xs (array items)",
      "MalformedSchemaDocument at <<root>>.xs (array items): 'optional' is only allowed on properties"
    );
  });

  it("reports schema text that does not parse", () => {
    const err = schemaError(() => loadSchemaText("<<root>>: [unclosed"));
    expect(err.kind).toBe("MalformedSchemaDocument");
  });
});

describe("top-level key scan", () => {
  it("lists column-0 YAML keys, skipping comments and nested lines", () => {
    const text = [
      "# types",
      "<<root>>:",
      "  nested: 1",
      "Task:",
      "'Quoted Name': {}",
      "---",
      "- item",
    ].join("\n");

    expect(scanTopLevelKeys(text)).toEqual(["<<root>>", "Task", "Quoted Name"]);
  });

  it("lists JSON keys at depth one only", () => {
    expect(scanTopLevelKeys(`{"a": {"b": 1}, "c": ["d"], "e\\u0041": 2}`)).toEqual([
      "a",
      "c",
      "eA",
    ]);
  });

  it("finds the first repeated key", () => {
    expect(findDuplicateTopLevelKey("a: 1\nb: 2\na: 3\n")).toBe("a");
    expect(findDuplicateTopLevelKey("a: 1\nb: 2\n")).toBeUndefined();
  });
});
