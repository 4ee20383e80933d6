import { describe, it, expect, vi, afterEach } from "vitest"
import {
  z,
  defineResource,
  identifierMeta,
  setLogger,
  ResourceDefinitionError,
  ResourceValidationError,
  type Logger,
} from "@/index"

const Person = defineResource({
  name: "person",
  fields: {
    id: z.number(),
    first_name: z.string(),
    last_name: z.string(),
  },
})

const definitionProblems = (fn: () => unknown): string[] => {
  try {
    fn()
  } catch (err) {
    if (err instanceof ResourceDefinitionError) return err.problems
    throw err
  }
  throw new Error("Expected a ResourceDefinitionError")
}

describe("defineResource()", () => {
  it("should expose the declared fields in declaration order", () => {
    expect(Person.name).toBe("person")
    expect(Person.abstract).toBe(false)
    expect(Person.fieldNames).toEqual(["id", "first_name", "last_name"])
    expect(Person.attributeNames).toEqual(["first_name", "last_name"])
    expect(Person.requiredFields).toEqual(["id", "first_name", "last_name"])
    expect(Person.identifierMetaFields).toEqual([])
    expect(Person.linkNames).toEqual([])
  })

  it("should describe single fields", () => {
    const field = Person.field("first_name")

    expect(field?.name).toBe("first_name")
    expect(field?.required).toBe(true)
    expect(field?.identifierMeta).toBe(false)
    expect(Person.field("nickname")).toBeUndefined()
  })

  it("should be frozen", () => {
    expect(Object.isFrozen(Person)).toBe(true)
    expect(Object.isFrozen(Person.fields)).toBe(true)
  })

  it("should require an id field on concrete resources", () => {
    const problems = definitionProblems(() => defineResource({ name: "nameless", fields: { name: z.string() } }))

    expect(problems).toEqual(["A resource must have an 'id' field."])
  })

  it("should require a name on concrete resources", () => {
    const problems = definitionProblems(() => defineResource({ fields: { id: z.number() } }))

    expect(problems).toEqual(["A concrete resource must have a name."])
  })

  it("should reject an empty name", () => {
    const problems = definitionProblems(() => defineResource({ name: "", fields: { id: z.number() } }))

    expect(problems).toEqual(["name: Resource name must not be empty"])
  })

  it("should reject reserved field names", () => {
    expect(() =>
      defineResource({ name: "thing", fields: { id: z.number(), type: z.string(), links: z.string() } }),
    ).toThrow("This field name is reserved: 'type'.\nThis field name is reserved: 'links'.")
  })

  it("should reject fields rendering as the identifier", () => {
    const problems = definitionProblems(() =>
      defineResource({ name: "thing", fields: { id: z.number(), _id: z.string(), id_: z.string() } }),
    )

    expect(problems).toEqual([
      "Field '_id' renders as the reserved key 'id'.",
      "Field 'id_' renders as the reserved key 'id'.",
    ])
  })

  it("should reject fields rendering as a reserved key", () => {
    const problems = definitionProblems(() =>
      defineResource({ name: "thing", fields: { id: z.number(), _type: z.string(), links_: z.string() } }),
    )

    expect(problems).toEqual([
      "Field '_type' renders as the reserved key 'type'.",
      "Field 'links_' renders as the reserved key 'links'.",
    ])
  })

  it("should reject an optional id", () => {
    const problems = definitionProblems(() => defineResource({ name: "thing", fields: { id: z.number().optional() } }))

    expect(problems).toEqual(["The 'id' field cannot be optional."])
  })

  it("should reject fields rendering under the same key", () => {
    const problems = definitionProblems(() =>
      defineResource({
        name: "thing",
        fields: { id: z.number(), first_name: z.string(), firstName: z.string() },
      }),
    )

    expect(problems).toEqual(["Fields 'first_name' and 'firstName' both render as 'firstName'."])
  })

  it("should keep identifier meta fields out of the attributes", () => {
    const Concrete = defineResource({
      name: "concrete",
      fields: {
        id: z.number(),
        name: z.string(),
        gender: identifierMeta(z.string().optional()),
      },
    })

    expect(Concrete.attributeNames).toEqual(["name"])
    expect(Concrete.identifierMetaFields).toEqual(["gender"])
    expect(Concrete.requiredFields).toEqual(["id", "name"])
  })
})

describe("extend()", () => {
  const Named = defineResource({
    abstract: true,
    fields: { name: z.string() },
    links: { self: (id) => `http://example.com/${id}` },
  })

  it("should allow abstract definitions without id or name", () => {
    expect(Named.abstract).toBe(true)
    expect(Named.name).toBeUndefined()
    expect(Named.fieldNames).toEqual(["name"])
  })

  it("should put inherited fields first", () => {
    const Concrete = Named.extend({ name: "concrete", fields: { id: z.number(), last_name: z.string() } })

    expect(Concrete.abstract).toBe(false)
    expect(Concrete.name).toBe("concrete")
    expect(Concrete.fieldNames).toEqual(["name", "id", "last_name"])
    expect(Concrete.attributeNames).toEqual(["name", "last_name"])
  })

  it("should inherit link factories", () => {
    const Concrete = Named.extend({
      name: "concrete",
      fields: { id: z.number() },
      links: { related: (id) => `http://example.com/${id}/related` },
    })

    expect(Concrete.linkNames).toEqual(["self", "related"])
  })

  it("should keep the position of a redeclared field and take the new schema", () => {
    const Article = defineResource({ name: "article", fields: { id: z.number(), title: z.string(), body: z.string() } })
    const Draft = Article.extend({ name: "draft", fields: { title: z.string().optional() } })

    expect(Draft.fieldNames).toEqual(["id", "title", "body"])
    expect(Draft.requiredFields).toEqual(["id", "body"])
  })

  it("should still check the merged fields", () => {
    const problems = definitionProblems(() => Named.extend({ name: "broken", fields: { nickname: z.string() } }))

    expect(problems).toEqual(["A resource must have an 'id' field."])
  })
})

describe("instances", () => {
  const warn = vi.fn<Logger["warn"]>()

  afterEach(() => {
    setLogger()
    warn.mockReset()
    vi.restoreAllMocks()
  })

  it("should create frozen instances", () => {
    const guido = Person.create({ id: 1, first_name: "Guido", last_name: "Van Rossum" })

    expect(guido.type).toBe("person")
    expect(guido.definition).toBe(Person)
    expect(guido.values).toEqual({ id: 1, first_name: "Guido", last_name: "Van Rossum" })
    expect(guido.get("first_name")).toBe("Guido")
    expect(Object.isFrozen(guido)).toBe(true)
    expect(Object.isFrozen(guido.values)).toBe(true)
  })

  it("should copy given arrays and objects", () => {
    const Tagged = defineResource({
      name: "tagged",
      fields: { id: z.number(), tags: z.array(z.string()), extra: z.record(z.string(), z.number()) },
    })
    const tags = ["a"]
    const extra = { score: 1 }

    const tagged = Tagged.create({ id: 1, tags, extra })
    tags.push("b")
    extra.score = 2

    expect(tagged.values).toEqual({ id: 1, tags: ["a"], extra: { score: 1 } })
  })

  it("should apply defaults to absent fields", () => {
    const Member = defineResource({
      name: "member",
      fields: {
        id: z.number(),
        nickname: z.string().default("none"),
        bio: z.string().optional(),
      },
    })

    const member = Member.create({ id: 4 })

    expect(member.values).toEqual({ id: 4, nickname: "none", bio: undefined })
  })

  it("should apply defaults to fields given as undefined", () => {
    const Member = defineResource({
      name: "member",
      fields: { id: z.number(), nickname: z.string().default("none") },
    })

    expect(Member.create({ id: 4, nickname: undefined }).get("nickname")).toBe("none")
  })

  it("should not instantiate abstract definitions", () => {
    const Named = defineResource({ abstract: true, fields: { name: z.string() } })

    expect(() => Named.create({ name: "John" })).toThrow(ResourceDefinitionError)
    expect(() => Named.hydrate({ name: "John" })).toThrow("Cannot instantiate the abstract resource with fields 'name'.")
    expect(() => Named.parse({ name: "John" })).toThrow(ResourceDefinitionError)
  })

  it("should hydrate records with missing fields", () => {
    const partial = Person.hydrate({ id: 1, first_name: "Guido" })

    expect(partial.values).toEqual({ id: 1, first_name: "Guido", last_name: undefined })
  })

  it("should drop undeclared fields and warn", () => {
    setLogger({ warn })

    const guido = Person.hydrate({ id: 1, first_name: "Guido", last_name: "Van Rossum", gender: "M" })

    expect(guido.values).toEqual({ id: 1, first_name: "Guido", last_name: "Van Rossum" })
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith("Ignoring fields not declared on resource 'person'", { fields: ["gender"] })
  })

  it("should warn through the console by default", () => {
    const consoleWarn = vi.spyOn(console, "warn").mockImplementation(() => {})

    Person.hydrate({ id: 1, first_name: "Guido", last_name: "Van Rossum", gender: "M" })

    expect(consoleWarn).toHaveBeenCalledWith("[jsonapi-resource] Ignoring fields not declared on resource 'person'", {
      fields: ["gender"],
    })
  })

  it("should not warn for declared fields only", () => {
    setLogger({ warn })

    Person.create({ id: 1, first_name: "Guido", last_name: "Van Rossum" })

    expect(warn).not.toHaveBeenCalled()
  })
})

describe("parse()", () => {
  it("should create an instance from valid input and strip unknown keys", () => {
    const warn = vi.fn<Logger["warn"]>()
    setLogger({ warn })

    const guido = Person.parse({ id: 1, first_name: "Guido", last_name: "Van Rossum", extra: true })

    expect(guido.values).toEqual({ id: 1, first_name: "Guido", last_name: "Van Rossum" })
    expect(warn).not.toHaveBeenCalled()
    setLogger()
  })

  it("should report every invalid field", () => {
    let error: unknown
    try {
      Person.parse({ id: "1", first_name: "Guido" })
    } catch (err) {
      error = err
    }

    expect(error).toBeInstanceOf(ResourceValidationError)
    if (!(error instanceof ResourceValidationError)) return
    expect(error.issues.map((issue) => [issue.path, issue.code])).toEqual([
      ["id", "invalid_type"],
      ["last_name", "invalid_type"],
    ])
    expect(error.cause).toBeInstanceOf(z.ZodError)
  })

  it("should reject input that is not an object", () => {
    expect(() => Person.parse("guido")).toThrow(ResourceValidationError)
  })
})

describe("select()", () => {
  it("should build an explicit selector", () => {
    expect(Person.select("first_name")).toEqual({ kind: "only", names: ["first_name"] })
  })
})
