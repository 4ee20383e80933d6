import { z } from "@/schema"
import { absentFieldValue, isIdentifierMetaField, isRequiredField } from "@/schema/meta"
import { snakeToCamelCase } from "@/utils/case"
import { cloneValue } from "@/utils/clone"
import { getLogger } from "@/utils/logger"
import { ResourceDefinitionError, ResourceValidationError, type LinkFactory } from "@/types"
import { ResourceInstance } from "@/resource/instance"
import { onlyAttributes, type AttributeSelector } from "@/resource/selector"

/**
 * Field declarations of a resource, in declaration order
 */
export type FieldShape = Record<string, z.ZodType>

/**
 * Values accepted by `create()`: required fields must be given, optional and defaulted ones may be left out
 */
export type ResourceInput<F extends FieldShape> = {
  [K in keyof F as undefined extends z.input<F[K]> ? never : K]: z.input<F[K]>
} & {
  [K in keyof F as undefined extends z.input<F[K]> ? K : never]?: z.input<F[K]>
}

/**
 * Names a selector may ask for. Identifier meta fields are not visible at the type level.
 */
export type AttributeName<F extends FieldShape> = Exclude<keyof F & string, "id">

/**
 * Fields of a definition extended with new ones; new declarations win
 */
export type MergeFields<A extends FieldShape, B extends FieldShape> = Omit<A, keyof B> & B

/**
 * Options of `defineResource()` and `extend()`
 */
export interface ResourceDefinitionOptions<F extends FieldShape> {
  /** The JSON:API `type` of every instance. Required unless the definition is abstract. */
  name?: string
  /** Abstract definitions only exist to be extended: they need no `id` and cannot be instantiated */
  abstract?: boolean
  /** Field schemas, in the order attributes are rendered */
  fields: F
  /** Link factories, by link name */
  links?: Record<string, LinkFactory>
}

/**
 * Description of a single declared field
 */
export interface FieldDescriptor {
  name: string
  schema: z.ZodType
  /** The field must have a value for the instance to render */
  required: boolean
  /** The field is rendered in the identifier `meta` instead of `attributes` */
  identifierMeta: boolean
}

/**
 * Field names that would clash with members of a JSON:API resource object
 */
export const RESERVED_FIELD_NAMES: readonly string[] = ["type", "links", "relationships"]

const DefinitionOptionsSchema = z.object({
  name: z.string().min(1, "Resource name must not be empty").optional(),
  abstract: z.boolean().optional(),
  fields: z.record(
    z.string(),
    z.custom<z.ZodType>((value) => value instanceof z.ZodType, "Field declarations must be Zod schemas"),
  ),
  links: z
    .record(
      z.string().min(1, "Link names must not be empty"),
      z.custom<LinkFactory>((value) => typeof value === "function", "Link factories must be functions"),
    )
    .optional(),
})

/**
 * The declared schema of one kind of resource.
 * Built once by `defineResource()` or `extend()`, frozen afterwards.
 */
export class ResourceDefinition<F extends FieldShape = FieldShape> {
  /** The JSON:API `type`, undefined only for abstract definitions */
  readonly name: string | undefined
  readonly abstract: boolean
  readonly fields: Readonly<FieldShape>
  readonly links: Readonly<Record<string, LinkFactory>>

  /** Every field name, in declaration order */
  readonly fieldNames: readonly string[]
  /** Fields rendered in `attributes`: everything except `id` and identifier meta fields */
  readonly attributeNames: readonly string[]
  readonly identifierMetaFields: readonly string[]
  readonly requiredFields: readonly string[]
  readonly linkNames: readonly string[]

  /** Object schema of all fields, used by `parse()` */
  readonly schema: z.ZodObject<FieldShape>

  private readonly descriptors: ReadonlyMap<string, FieldDescriptor>

  constructor(options: ResourceDefinitionOptions<FieldShape>) {
    const parsed = DefinitionOptionsSchema.safeParse(options)
    if (!parsed.success) {
      throw new ResourceDefinitionError(
        parsed.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`),
      )
    }

    const abstract = options.abstract ?? false
    const descriptors = new Map<string, FieldDescriptor>()
    for (const [name, schema] of Object.entries(options.fields)) {
      descriptors.set(name, {
        name,
        schema,
        required: isRequiredField(schema),
        identifierMeta: isIdentifierMetaField(schema),
      })
    }

    const problems = checkFields(descriptors, abstract)
    if (!abstract && !options.name) {
      problems.push("A concrete resource must have a name.")
    }
    if (problems.length > 0) {
      throw new ResourceDefinitionError(problems)
    }

    const fields = [...descriptors.values()]
    this.name = options.name
    this.abstract = abstract
    this.fields = Object.freeze({ ...options.fields })
    this.links = Object.freeze({ ...options.links })
    this.fieldNames = Object.freeze(fields.map((field) => field.name))
    this.attributeNames = Object.freeze(
      fields.filter((field) => field.name !== "id" && !field.identifierMeta).map((field) => field.name),
    )
    this.identifierMetaFields = Object.freeze(fields.filter((field) => field.identifierMeta).map((field) => field.name))
    this.requiredFields = Object.freeze(fields.filter((field) => field.required).map((field) => field.name))
    this.linkNames = Object.freeze(Object.keys(this.links))
    this.schema = z.object(this.fields)
    this.descriptors = descriptors

    Object.freeze(this)
  }

  /**
   * Get the descriptor of a declared field
   * @param name - The field name
   * @returns The descriptor, or undefined if the field is not declared
   */
  field(name: string): FieldDescriptor | undefined {
    return this.descriptors.get(name)
  }

  /**
   * Create an instance from typed values.
   * Absent optional fields take their schema default. Values are not validated, use `parse()` for that.
   */
  create(values: ResourceInput<F>): ResourceInstance<F> {
    return this.instantiate(values)
  }

  /**
   * Create an instance from a loosely typed record, such as a database row.
   * Missing required fields are accepted here and reported when the instance is rendered.
   */
  hydrate(record: Readonly<Record<string, unknown>>): ResourceInstance<F> {
    return this.instantiate(record)
  }

  /**
   * Validate untrusted input against the field schemas and create an instance from the result
   * @throws ResourceValidationError when the input does not match
   */
  parse(input: unknown): ResourceInstance<F> {
    this.concreteName()
    const result = this.schema.safeParse(input)
    if (!result.success) {
      throw ResourceValidationError.fromZodError(result.error)
    }
    return this.instantiate(result.data)
  }

  /**
   * Build a selector of attributes checked against the declared fields at compile time
   */
  select(...names: AttributeName<F>[]): AttributeSelector<AttributeName<F>> {
    return onlyAttributes(...names)
  }

  /**
   * Create a definition inheriting the fields and links of this one.
   * Inherited fields come first; a redeclared field keeps its place and takes the new schema.
   * The name and the abstract flag are not inherited.
   */
  extend<G extends FieldShape>(options: ResourceDefinitionOptions<G>): ResourceDefinition<MergeFields<F, G>> {
    return new ResourceDefinition<MergeFields<F, G>>({
      name: options.name,
      abstract: options.abstract,
      fields: { ...this.fields, ...options.fields },
      links: { ...this.links, ...options.links },
    })
  }

  private concreteName(): string {
    if (this.abstract || this.name === undefined) {
      throw new ResourceDefinitionError([
        `Cannot instantiate the abstract resource with fields ${this.fieldNames.map((name) => `'${name}'`).join(", ")}.`,
      ])
    }
    return this.name
  }

  private instantiate(record: object): ResourceInstance<F> {
    const type = this.concreteName()
    const given = new Map<string, unknown>(Object.entries(record))
    const values: Record<string, unknown> = {}

    for (const field of this.descriptors.values()) {
      const value = given.get(field.name)
      values[field.name] = value === undefined ? absentFieldValue(field.schema) : cloneValue(value)
    }

    const undeclared = [...given.keys()].filter((key) => !this.descriptors.has(key))
    if (undeclared.length > 0) {
      getLogger().warn(`Ignoring fields not declared on resource '${type}'`, { fields: undeclared })
    }

    return new ResourceInstance(this, type, values)
  }
}

/**
 * Check declared fields for reserved names, identifier problems and rendered key clashes
 */
function checkFields(descriptors: ReadonlyMap<string, FieldDescriptor>, abstract: boolean): string[] {
  const problems: string[] = []

  for (const name of RESERVED_FIELD_NAMES) {
    if (descriptors.has(name)) {
      problems.push(`This field name is reserved: '${name}'.`)
    }
  }

  const id = descriptors.get("id")
  if (!id) {
    if (!abstract) problems.push("A resource must have an 'id' field.")
  } else {
    if (!id.required) problems.push("The 'id' field cannot be optional.")
    if (id.identifierMeta) problems.push("The 'id' field cannot be an identifier meta field.")
  }

  const renderedKeys = new Map<string, string>()
  for (const field of descriptors.values()) {
    if (field.name === "id" || field.identifierMeta) continue
    const key = snakeToCamelCase(field.name)
    if (key !== field.name && (key === "id" || RESERVED_FIELD_NAMES.includes(key))) {
      problems.push(`Field '${field.name}' renders as the reserved key '${key}'.`)
      continue
    }
    const previous = renderedKeys.get(key)
    if (previous !== undefined) {
      problems.push(`Fields '${previous}' and '${field.name}' both render as '${key}'.`)
    } else {
      renderedKeys.set(key, field.name)
    }
  }

  return problems
}

/**
 * Declare a resource.
 *
 * @example
 * ```ts
 * const Person = defineResource({
 *   name: "person",
 *   fields: {
 *     id: z.number(),
 *     first_name: z.string(),
 *     last_name: z.string(),
 *   },
 * })
 *
 * Person.create({ id: 1, first_name: "Ada", last_name: "Lovelace" }).toJsonApi(allAttributes)
 * // { type: "person", id: 1, attributes: { firstName: "Ada", lastName: "Lovelace" } }
 * ```
 */
export function defineResource<F extends FieldShape>(options: ResourceDefinitionOptions<F>): ResourceDefinition<F> {
  return new ResourceDefinition<F>(options)
}
