/**
 * Schema module - re-exports Zod with resource field metadata helpers
 *
 * - `identifierMeta(schema)` - Render the field in the identifier `meta` instead of `attributes`
 *
 * @example
 * ```ts
 * import { z, identifierMeta } from "jsonapi-resource"
 *
 * const fields = {
 *   id: z.string(),
 *   title: z.string(),
 *   revision: identifierMeta(z.number().optional()),
 * }
 * ```
 */

export { z } from "@/schema/meta"

export {
  identifierMeta,
  getFieldMeta,
  isIdentifierMetaField,
  isRequiredField,
  absentFieldValue,
  type ResourceFieldMeta,
} from "@/schema/meta"
