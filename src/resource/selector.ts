/**
 * Which attributes a render call includes
 */
export type AttributeSelector<N extends string = string> =
  | {
      kind: "all"
    }
  | {
      kind: "only"
      names: readonly N[]
    }

/**
 * Select every attribute the definition declares
 */
export const allAttributes: AttributeSelector<never> = { kind: "all" }

/**
 * Select the given attributes, by declared (snake_case) field name.
 * For names checked at compile time use `definition.select(...)`.
 */
export function onlyAttributes<N extends string>(...names: N[]): AttributeSelector<N> {
  return { kind: "only", names: [...names] }
}

/**
 * Resolve a selector to the list of requested names, or undefined for "all"
 */
export function requestedNames(selector: AttributeSelector): readonly string[] | undefined {
  return selector.kind === "all" ? undefined : selector.names
}
