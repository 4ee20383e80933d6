import type { ResourceInstance } from "@/resource/instance"
import { render } from "@/resource/render"
import type { AttributeSelector } from "@/resource/selector"
import type { RenderedDocument } from "@/types"

export interface DocumentOptions {
  /** Primary data: one instance, a list of instances, or null */
  data: ResourceInstance | readonly ResourceInstance[] | null
  /** Attributes rendered for every resource in `data` */
  attributes: AttributeSelector
  /** Registered link names rendered for every resource in `data` */
  resourceLinks?: Iterable<string>
  /** Document-level links */
  links?: Record<string, string>
}

/**
 * Build a top-level JSON:API document around one or more rendered resources.
 *
 * @example
 * ```ts
 * buildDocument({ data: [ada, grace], attributes: onlyAttributes("last_name") })
 * // { data: [{ type: "person", id: 1, attributes: { lastName: "Lovelace" } }, ...] }
 * ```
 */
export function buildDocument(options: DocumentOptions): RenderedDocument {
  const { data, attributes } = options
  // iterators are single-use, every resource needs the names
  const renderOptions = { links: options.resourceLinks ? [...options.resourceLinks] : undefined }

  const document: RenderedDocument = {
    data:
      data === null
        ? null
        : isInstanceList(data)
          ? data.map((instance) => render(instance, attributes, renderOptions))
          : render(data, attributes, renderOptions),
  }
  if (options.links) {
    document.links = { ...options.links }
  }
  return document
}

/**
 * Build a document and serialize it, with JSON.stringify by default
 */
export function dumpDocument(
  options: DocumentOptions & { stringify?: (document: RenderedDocument) => string },
): string {
  const document = buildDocument(options)
  return options.stringify ? options.stringify(document) : JSON.stringify(document)
}

function isInstanceList(data: ResourceInstance | readonly ResourceInstance[]): data is readonly ResourceInstance[] {
  return Array.isArray(data)
}
