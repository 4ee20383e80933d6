import type { FieldShape, ResourceDefinition } from "@/resource/definition"
import type { AttributeSelector } from "@/resource/selector"
import { dump, identifier, render, type DumpOptions, type RenderOptions } from "@/resource/render"
import type { RenderedResource, ResourceIdentifier } from "@/types"

/**
 * A concrete value for each field of a resource definition. Frozen once created.
 *
 * Instances are created through their definition (`create()`, `hydrate()` or `parse()`).
 */
export class ResourceInstance<F extends FieldShape = FieldShape> {
  readonly definition: ResourceDefinition<F>
  /** The JSON:API `type`, taken from the definition */
  readonly type: string
  /** Field values by declared name. Absent optional fields hold undefined. */
  readonly values: Readonly<Record<string, unknown>>

  constructor(definition: ResourceDefinition<F>, type: string, values: Record<string, unknown>) {
    this.definition = definition
    this.type = type
    this.values = Object.freeze(values)
    Object.freeze(this)
  }

  /**
   * Get the value of a declared field
   */
  get(name: keyof F & string): unknown {
    return this.values[name]
  }

  /**
   * Render as a JSON:API resource object. See `render()`.
   */
  toJsonApi(selector: AttributeSelector, options?: RenderOptions): RenderedResource {
    return render(this, selector, options)
  }

  /**
   * Render and serialize to a string. See `dump()`.
   */
  dump(selector: AttributeSelector, options?: DumpOptions): string {
    return dump(this, selector, options)
  }

  /**
   * The resource identifier object (`{ type, id, meta? }`)
   */
  identifier(): ResourceIdentifier {
    return identifier(this)
  }
}
