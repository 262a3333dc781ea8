import type { ConfigSource } from "../ports/source"

export type MergedSources = {
  values: Record<string, unknown>

  /** Key to the name of the source that supplied its final value. */
  provenance: Record<string, string>
}

/**
 * Load every source in order and merge the results.
 *
 * Later sources override earlier ones; an `undefined` value never overrides.
 * Every key, `__proto__` included, becomes an own property of the result.
 */
export async function mergeSources(sources: readonly ConfigSource[]): Promise<MergedSources> {
  const values = new Map<string, unknown>()
  const provenance = new Map<string, string>()

  for (const source of sources) {
    const loaded = await source.load()

    for (const [key, value] of Object.entries(loaded)) {
      if (value !== undefined) {
        values.set(key, value)
        provenance.set(key, source.name)
      }
    }
  }

  return { values: Object.fromEntries(values), provenance: Object.fromEntries(provenance) }
}
