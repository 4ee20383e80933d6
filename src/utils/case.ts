/**
 * Convert a snake_case name into camelCase.
 *
 * Empty segments are dropped, so leading and repeated underscores collapse.
 * The first segment is kept as written; every later segment gets an upper-case
 * first letter and a lower-case rest.
 *
 * @example
 * snakeToCamelCase("first_name") // "firstName"
 * snakeToCamelCase("__birth__date") // "birthDate"
 * snakeToCamelCase("firstName") // "firstName"
 */
export function snakeToCamelCase(name: string): string {
  const [first = "", ...others] = name.split("_").filter((segment) => segment.length > 0)
  return first + others.map(capitalize).join("")
}

const capitalize = (s: string) => s.charAt(0).toUpperCase() + s.slice(1).toLowerCase()
