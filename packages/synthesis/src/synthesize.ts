import { SynthesisConfigSchema } from '@intentcfg/config'
import type { SynthesisConfig } from '@intentcfg/config'
import type { Intent } from '@intentcfg/intent'
import { getLogger } from '@intentcfg/telemetry'
import { isIntentCfgError } from '@intentcfg/types'
import type { ErrorCode, ErrorContext } from '@intentcfg/types'
import { planAddresses } from './address-plan.js'
import { deriveRouterPlan } from './adjacency.js'
import type { SynthesisContext } from './adjacency.js'
import { assignInterfaces } from './interface-assigner.js'
import { renderRouterConfig } from './renderer.js'

const logger = getLogger(['intentcfg', 'synthesis'])

export interface RouterFailure {
  readonly hostname: string
  readonly code: ErrorCode
  readonly message: string
  readonly context: ErrorContext
}

export interface SynthesisReport {
  /** False as soon as one router failed; the rendered routers are still usable. */
  readonly success: boolean
  /** Rendered configuration per hostname, in intent router order. */
  readonly configs: ReadonlyMap<string, string>
  readonly failures: readonly RouterFailure[]
}

/**
 * Synthesize the configuration of every router in the intent.
 *
 * Address and interface failures fail the routers they touch; the other
 * routers are still rendered and the report is marked unsuccessful.
 */
export function synthesizeNetwork(
  intent: Intent,
  config: Partial<SynthesisConfig> = {}
): SynthesisReport {
  const settings = SynthesisConfigSchema.parse(config)
  const ctx: SynthesisContext = { intent, addresses: planAddresses(intent), settings }

  const configs = new Map<string, string>()
  const failures: RouterFailure[] = []

  for (const router of intent.routers) {
    try {
      const assignment = assignInterfaces(
        router,
        settings.interfacePool,
        settings.loopbackInterface
      )
      const plan = deriveRouterPlan(ctx, router, assignment)
      configs.set(router.hostname, renderRouterConfig(plan))
    } catch (err) {
      if (!isIntentCfgError(err)) throw err
      logger.error`${router.hostname} not rendered: ${err.code}: ${err.message}`
      failures.push({
        hostname: router.hostname,
        code: err.code,
        message: err.message,
        context: err.context,
      })
    }
  }

  logger.info`Rendered ${configs.size} of ${intent.routers.length} routers`
  return { success: failures.length === 0, configs, failures }
}
