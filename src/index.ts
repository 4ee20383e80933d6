/**
 * jsonapi-resource
 *
 * Declare resources with Zod field schemas and render their instances as JSON:API resource objects.
 * Attribute keys are converted from snake_case to camelCase; the caller picks which attributes to include.
 *
 * @example
 * ```ts
 * import { z, defineResource, allAttributes } from "jsonapi-resource"
 *
 * const Person = defineResource({
 *   name: "person",
 *   fields: {
 *     id: z.number(),
 *     first_name: z.string(),
 *     last_name: z.string(),
 *   },
 *   links: { self: (id) => `https://api.example.com/people/${id}` },
 * })
 *
 * const ada = Person.create({ id: 1, first_name: "Ada", last_name: "Lovelace" })
 *
 * ada.toJsonApi(allAttributes)
 * // { type: "person", id: 1, attributes: { firstName: "Ada", lastName: "Lovelace" } }
 *
 * ada.toJsonApi(Person.select("first_name"), { links: ["self"] })
 * // { type: "person", id: 1, attributes: { firstName: "Ada" },
 * //   links: { self: "https://api.example.com/people/1" } }
 * ```
 */

// Schema - re-export Zod with field metadata helpers
export * from "./schema"

// Resources
export * from "./resource"

// Errors and shared types
export * from "./types"

// Utilities
export { snakeToCamelCase, getLogger, setLogger, type Logger } from "./utils"
