export type FilterLiteral = string | number | boolean;

export type FieldStep = { kind: "field"; name: string };
export type IndexStep = { kind: "index"; index: number };
export type KeyStep = { kind: "key"; key: string };
export type FilterStep = { kind: "filter"; field: string; value: FilterLiteral };

/**
 * One atomic operation of a parsed DataPath, applied left to right.
 */
export type PathStep = FieldStep | IndexStep | KeyStep | FilterStep;

export const field = (name: string): FieldStep => ({ kind: "field", name });

export const index = (i: number): IndexStep => ({ kind: "index", index: i });

export const key = (k: string): KeyStep => ({ kind: "key", key: k });

export const filter = (fieldName: string, value: FilterLiteral): FilterStep => ({
  kind: "filter",
  field: fieldName,
  value,
});
