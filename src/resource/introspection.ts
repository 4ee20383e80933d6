import { ResourceDefinition, type FieldShape } from "@/resource/definition"
import { ResourceInstance } from "@/resource/instance"

function definitionOf(resource: unknown): ResourceDefinition {
  if (resource instanceof ResourceDefinition) return resource
  if (resource instanceof ResourceInstance) return resource.definition
  throw new TypeError(`'${Object.prototype.toString.call(resource).slice(8, -1)}' object is not a resource.`)
}

/**
 * Field schemas of a resource definition, or of the definition of an instance
 * @throws TypeError when given anything else
 */
export function fieldSchemas(resource: unknown): Readonly<FieldShape> {
  return definitionOf(resource).fields
}

/**
 * Names of the fields rendered in `attributes`, in declaration order.
 * Excludes `id` and identifier meta fields.
 * @throws TypeError when given anything other than a definition or an instance
 */
export function attributeNames(resource: unknown): readonly string[] {
  return definitionOf(resource).attributeNames
}
