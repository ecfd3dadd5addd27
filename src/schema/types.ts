/**
 * Reserved key of the entry-point definition in a schema document.
 */
export const ROOT_NAME = "<<root>>";

export type PrimitiveKind = "string" | "integer" | "number" | "boolean";

export type MapKeyKind = "string" | "integer";

export type PrimitiveRef = { kind: "primitive"; primitive: PrimitiveKind };
export type ArrayRef = { kind: "array"; items: TypeRef };
export type MapRef = { kind: "map"; keys: MapKeyKind; values: TypeRef };
export type ReferenceRef = { kind: "reference"; name: string };

/**
 * Expected shape of a value. Object shapes are always named types reached
 * through a reference.
 */
export type TypeRef = PrimitiveRef | ArrayRef | MapRef | ReferenceRef;

export interface PropertyDef {
  readonly name: string;
  readonly type: TypeRef;
  readonly optional: boolean;
  /** Informational only. */
  readonly description?: string;
}

export interface TypeDef {
  readonly name: string;
  readonly description?: string;
  readonly properties: readonly PropertyDef[];
}

/**
 * Resolved, immutable schema. Every reference names a key of `types` or
 * the root itself. `types` is a TypeRegistry, which cannot be changed
 * after loading.
 */
export interface SchemaModel {
  readonly root: TypeDef;
  readonly types: ReadonlyMap<string, TypeDef>;
}
