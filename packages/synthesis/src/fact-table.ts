import type { IntentCfgError, Result } from '@intentcfg/types'

/**
 * Resolved facts (addresses, interface names) keyed by router or link. A fact
 * that could not be resolved keeps its error; reading it rethrows that error
 * so whoever depends on the missing fact fails with the original cause.
 */
export class FactTable<K, V> {
  private readonly facts = new Map<K, Result<V, IntentCfgError>>()

  constructor(private readonly name: string) {}

  set(key: K, value: V): void {
    this.facts.set(key, { success: true, data: value })
  }

  /** Record a failure. The first failure recorded for a key is kept. */
  fail(key: K, error: IntentCfgError): void {
    const current = this.facts.get(key)
    if (current && !current.success) return
    this.facts.set(key, { success: false, error })
  }

  get(key: K): V {
    const fact = this.facts.get(key)
    if (!fact) throw new Error(`No ${this.name} recorded for ${String(key)}`)
    if (!fact.success) throw fact.error
    return fact.data
  }

  has(key: K): boolean {
    return this.facts.has(key)
  }

  failures(): IntentCfgError[] {
    const errors: IntentCfgError[] = []
    for (const fact of this.facts.values()) {
      if (!fact.success) errors.push(fact.error)
    }
    return errors
  }
}
