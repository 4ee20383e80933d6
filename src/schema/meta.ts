import * as z from "zod"

/**
 * Metadata stored on field schemas of a resource definition
 */
export type ResourceFieldMeta = {
  /**
   * The field is sent in the `meta` member of the resource identifier object
   * instead of the `attributes` of the rendered resource.
   */
  identifierMeta?: boolean
}

/**
 * Registry holding the resource metadata of field schemas, separate from Zod's global registry
 */
const resourceFieldRegistry = z.registry<ResourceFieldMeta>()

/**
 * Mark a field as an identifier meta field.
 * The schema is cloned, the one passed in is left untouched.
 *
 * Apply it after any checks: the mark survives `.optional()`, `.nullable()` and `.default()`
 * but not checks chained after it, so write `identifierMeta(z.string().min(1))`,
 * not `identifierMeta(z.string()).min(1)`.
 *
 * @example
 * const Person = defineResource({
 *   name: "person",
 *   fields: {
 *     id: z.number(),
 *     name: z.string(),
 *     gender: identifierMeta(z.string().optional()),
 *   },
 * })
 */
export function identifierMeta<T extends z.ZodType>(schema: T): T {
  const marked = schema.clone()
  resourceFieldRegistry.add(marked, { ...getOwnFieldMeta(marked), identifierMeta: true })
  return marked
}

function getOwnFieldMeta(schema: z.core.$ZodType): ResourceFieldMeta {
  const meta = resourceFieldRegistry.get(schema)
  return { identifierMeta: meta?.identifierMeta }
}

/**
 * Get the inner schema of an optional/nullable/default wrapper, if the schema is one
 */
function innerSchema(schema: z.core.$ZodType): z.core.$ZodType | undefined {
  if (schema instanceof z.core.$ZodOptional) return schema._zod.def.innerType
  if (schema instanceof z.core.$ZodNullable) return schema._zod.def.innerType
  if (schema instanceof z.core.$ZodDefault) return schema._zod.def.innerType
  return undefined
}

/**
 * Get the resource metadata of a field schema.
 * Metadata set on any wrapper layer counts, which handles cases like
 * identifierMeta(z.string()).optional() where the mark is on the inner type.
 * @param schema - The field schema
 * @returns The merged metadata of all layers
 */
export function getFieldMeta(schema: z.core.$ZodType): ResourceFieldMeta {
  const meta: ResourceFieldMeta = {}
  let layer: z.core.$ZodType | undefined = schema

  while (layer) {
    if (getOwnFieldMeta(layer).identifierMeta) {
      meta.identifierMeta = true
    }
    layer = innerSchema(layer)
  }

  return meta
}

/**
 * Check if a field schema is marked as an identifier meta field
 */
export function isIdentifierMetaField(schema: z.core.$ZodType): boolean {
  return getFieldMeta(schema).identifierMeta === true
}

/**
 * A field is required when its schema does not accept a missing value.
 * `.optional()` and `.default()` fields are not required.
 */
export function isRequiredField(schema: z.core.$ZodType): boolean {
  return !z.safeParse(schema, undefined).success
}

/**
 * Value an absent field takes: the schema default, or undefined.
 */
export function absentFieldValue(schema: z.core.$ZodType): unknown {
  const result = z.safeParse(schema, undefined)
  return result.success ? result.data : undefined
}

// Re-export z so definitions can be written from a single import
export { z }
