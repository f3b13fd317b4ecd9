import { readFileSync } from 'node:fs'
import { isIntentCfgError } from '@intentcfg/types'
import type { IntentInput } from '../src/index.js'
import { parseIntent } from '../src/index.js'

export function exampleIntent(name: string): IntentInput {
  const url = new URL(`../../../examples/intents/${name}.json`, import.meta.url)
  const raw: IntentInput = JSON.parse(readFileSync(url, 'utf-8'))
  return raw
}

export function examplePath(name: string): string {
  return new URL(`../../../examples/intents/${name}.json`, import.meta.url).pathname
}

/** Issues reported by the InvalidIntent error for `raw`; fails if it loads. */
export function intentIssues(raw: unknown): readonly string[] {
  try {
    parseIntent(raw)
  } catch (err) {
    if (isIntentCfgError(err, 'InvalidIntent') && typeof err.context.issues === 'object') {
      return err.context.issues
    }
    throw err
  }
  throw new Error('expected the intent to be rejected')
}
