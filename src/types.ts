import type { ZodError } from "zod"

/**
 * JSON:API identifier value. Numbers are kept as-is rather than stringified.
 */
export type ResourceId = string | number

/**
 * Builds a link from a resource identifier
 */
export type LinkFactory = (id: ResourceId) => string

/**
 * A single resource rendered in the JSON:API shape
 */
export interface RenderedResource {
  type: string
  id: ResourceId
  attributes: Record<string, unknown>
  links?: Record<string, string>
}

/**
 * Resource identifier object (`{ type, id }`), with identifier meta fields under `meta`
 */
export interface ResourceIdentifier {
  type: string
  id: ResourceId
  meta?: Record<string, unknown>
}

/**
 * Top-level JSON:API document
 */
export interface RenderedDocument {
  data: RenderedResource | RenderedResource[] | null
  links?: Record<string, string>
}

/**
 * Base class of every error thrown by this package.
 */
export class ResourceError extends Error {
  override name: string = "ResourceError"

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/**
 * Thrown when a resource definition is invalid, or when an abstract definition is instantiated.
 */
export class ResourceDefinitionError extends ResourceError {
  override name = "ResourceDefinitionError" as const

  /** One entry per problem found */
  public readonly problems: string[]

  constructor(problems: string[]) {
    super(problems.join("\n"))
    this.problems = problems
  }
}

/**
 * Thrown when a render call asks for attributes or links the definition does not have.
 * Nothing is rendered when this is thrown.
 */
export class ResourceConfigurationError extends ResourceError {
  override name = "ResourceConfigurationError" as const

  /** Requested attribute names that are not attributes of the resource */
  public readonly unexpected: string[]

  /** Requested link names that have no registered factory */
  public readonly unknownLinks: string[]

  constructor(options: { unexpected?: string[]; unknownLinks?: string[] }) {
    const unexpected = options.unexpected ?? []
    const unknownLinks = options.unknownLinks ?? []
    super(
      [
        ...unexpected.map((name) => `Unexpected required attribute: '${name}'.`),
        ...unknownLinks.map((name) => `'${name}' is not a registered link name.`),
      ].join("\n"),
    )
    this.unexpected = unexpected
    this.unknownLinks = unknownLinks
  }
}

/**
 * Thrown when a field the definition requires has no value on the instance being rendered.
 */
export class MissingAttributeError extends ResourceError {
  override name = "MissingAttributeError" as const

  /** The `type` of the resource being rendered */
  public readonly resource: string

  /** Names of the required fields without a value, in declaration order */
  public readonly missing: string[]

  constructor(resource: string, missing: string[]) {
    super(missing.map((name) => `Missing required attribute: '${name}'.`).join("\n"))
    this.resource = resource
    this.missing = missing
  }
}

export interface ValidationIssue {
  path: string
  message: string
  code: string
}

/**
 * Thrown when input does not match a definition's field schemas.
 */
export class ResourceValidationError extends ResourceError {
  override name = "ResourceValidationError" as const

  public readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[], cause?: unknown) {
    super(issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join("\n"), { cause })
    this.issues = issues
  }

  /**
   * Create a ResourceValidationError from a failed Zod parse
   */
  static fromZodError(error: ZodError): ResourceValidationError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
      code: issue.code,
    }))

    return new ResourceValidationError(issues, error)
  }
}
