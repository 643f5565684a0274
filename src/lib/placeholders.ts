/**
 * Stackseed - ${NAME} placeholders
 *
 * Shared by composite values (DATABASE_URL from DATABASE_PASSWORD) and by
 * service definitions (probe arguments from the generated environment).
 */

const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g

export interface RenderResult {
  value: string
  /** Referenced names the lookup could not resolve, in order of first use */
  missing: string[]
}

export type Lookup = (name: string) => string | undefined

/**
 * Replace every ${NAME} with lookup(NAME). Unresolved names are reported and
 * left in place.
 */
export function renderPlaceholders(pattern: string, lookup: Lookup): RenderResult {
  const missing: string[] = []

  const value = pattern.replace(PLACEHOLDER, (match, name: string) => {
    const resolved = lookup(name)
    if (resolved === undefined) {
      if (!missing.includes(name)) missing.push(name)
      return match
    }
    return resolved
  })

  return { value, missing }
}

/**
 * Lookup over several maps, earlier maps take precedence
 */
export function layeredLookup(...layers: Array<Readonly<Record<string, string | undefined>>>): Lookup {
  return (name: string) => {
    for (const layer of layers) {
      const value = layer[name]
      if (value !== undefined) {
        return value
      }
    }
    return undefined
  }
}
