import { z } from "zod";
import { SchemaDefinitionError } from "../errors.js";

/**
 * Raw shapes of a schema document, before any reference is resolved.
 */
export const SchemaDocument = z.record(z.string(), z.unknown());

export const TypeDefinition = z
  .object({
    type: z.literal("object").optional(),
    description: z.string().optional(),
    properties: z.record(z.string(), z.unknown()),
  })
  .strict();

export const PropertyEntry = z
  .object({
    type: z.string().optional(),
    $ref: z.string().optional(),
    items: z.unknown().optional(),
    keys: z.unknown().optional(),
    values: z.unknown().optional(),
    properties: z.unknown().optional(),
    optional: z.boolean().optional(),
    description: z.string().optional(),
  })
  .strict();

export const MapKeysEntry = z
  .object({
    type: z.string().optional(),
    description: z.string().optional(),
  })
  .strict();

export type PropertyEntry = z.infer<typeof PropertyEntry>;

/**
 * Parses `data` with a zod schema, turning the first issue into a
 * `MalformedSchemaDocument` error.
 *
 * @param schema - Expected shape.
 * @param data - Raw document fragment.
 * @param location - Where the fragment sits in the document, e.g. `Epic.tasks`.
 */
export function parseShape<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  location?: string
): z.output<T> {
  const result = schema.safeParse(data);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const at = [location, ...issue.path.map(String)].filter(Boolean).join(".");

  throw new SchemaDefinitionError("MalformedSchemaDocument", issue.message, at || undefined);
}
