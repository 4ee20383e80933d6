import type { FieldShape } from "@/resource/definition"
import type { ResourceInstance } from "@/resource/instance"
import { requestedNames, type AttributeSelector } from "@/resource/selector"
import { snakeToCamelCase } from "@/utils/case"
import { cloneValue } from "@/utils/clone"
import {
  MissingAttributeError,
  ResourceConfigurationError,
  ResourceValidationError,
  type RenderedResource,
  type ResourceId,
  type ResourceIdentifier,
} from "@/types"

export interface RenderOptions {
  /** Names of registered links to include under `links` */
  links?: Iterable<string>
}

export interface DumpOptions extends RenderOptions {
  /** Serializer for the rendered resource, JSON.stringify by default */
  stringify?: (resource: RenderedResource) => string
}

/**
 * Render an instance as a JSON:API resource object.
 *
 * Attribute keys are the camelCase form of the declared field names, in declaration order.
 * The identifier never appears in `attributes`. Absent optional values render as null.
 * Arrays and plain objects are copied, so changing the result leaves the instance untouched.
 *
 * @param instance - The instance to render
 * @param selector - Attributes to include: `allAttributes` or `onlyAttributes(...)`
 * @param options - Links to include
 * @returns `{ type, id, attributes }`, plus `links` when links were requested
 * @throws ResourceConfigurationError when the selector or the links name something the definition lacks
 * @throws MissingAttributeError when a required field has no value
 */
export function render<F extends FieldShape>(
  instance: ResourceInstance<F>,
  selector: AttributeSelector,
  options: RenderOptions = {},
): RenderedResource {
  const definition = instance.definition
  const requested = requestedNames(selector)
  const linkNames = [...new Set(options.links ?? [])]

  const unexpected = [...new Set(requested ?? [])].filter((name) => !definition.attributeNames.includes(name))
  const unknownLinks = linkNames.filter((name) => !definition.linkNames.includes(name))
  if (unexpected.length > 0 || unknownLinks.length > 0) {
    throw new ResourceConfigurationError({ unexpected, unknownLinks })
  }

  const missing = definition.requiredFields.filter((name) => instance.values[name] === undefined)
  if (missing.length > 0) {
    throw new MissingAttributeError(instance.type, missing)
  }

  const id = resourceId(instance)
  const selected = new Set(requested ?? definition.attributeNames)
  const attributes: Record<string, unknown> = {}
  for (const name of definition.attributeNames) {
    if (selected.has(name)) {
      attributes[snakeToCamelCase(name)] = cloneValue(instance.values[name] ?? null)
    }
  }

  const resource: RenderedResource = { type: instance.type, id, attributes }
  if (linkNames.length > 0) {
    resource.links = Object.fromEntries(linkNames.map((name) => [name, definition.links[name](id)]))
  }
  return resource
}

/**
 * Render an instance and serialize the result
 */
export function dump<F extends FieldShape>(
  instance: ResourceInstance<F>,
  selector: AttributeSelector,
  options: DumpOptions = {},
): string {
  const stringify = options.stringify ?? ((resource: RenderedResource) => JSON.stringify(resource))
  return stringify(render(instance, selector, options))
}

/**
 * Build the resource identifier object of an instance.
 * Identifier meta fields, when the definition has any, are added under `meta` with camelCase keys.
 */
export function identifier<F extends FieldShape>(instance: ResourceInstance<F>): ResourceIdentifier {
  const result: ResourceIdentifier = { type: instance.type, id: resourceId(instance) }
  const metaFields = instance.definition.identifierMetaFields
  if (metaFields.length > 0) {
    result.meta = Object.fromEntries(
      metaFields.map((name) => [snakeToCamelCase(name), cloneValue(instance.values[name] ?? null)]),
    )
  }
  return result
}

function resourceId<F extends FieldShape>(instance: ResourceInstance<F>): ResourceId {
  const id = instance.values.id
  if (typeof id === "string" || typeof id === "number") {
    return id
  }
  throw new ResourceValidationError([
    { path: "id", message: "Resource identifier must be a string or a number", code: "invalid_type" },
  ])
}
