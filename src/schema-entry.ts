/**
 * jsonapi-resource/schema
 *
 * Zod with the field metadata helpers, without the renderer.
 * Use this entry point where field shapes are declared apart from the resources using them.
 *
 * @example
 * ```ts
 * import { z, identifierMeta } from "jsonapi-resource/schema"
 *
 * export const articleFields = {
 *   id: z.string(),
 *   title: z.string(),
 *   revision: identifierMeta(z.number()),
 * }
 * ```
 */

export * from "@/schema"
