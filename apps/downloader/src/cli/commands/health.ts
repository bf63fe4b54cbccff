import { redactUrlCredentials } from '@cardledger/logger'
import { loadConfig } from '../../config/settings.js'
import type { DownloaderConfig } from '../../config/settings.js'
import { ConfigError } from '../../errors.js'
import type { ProxyPool } from '../../fetch/proxy-pool.js'
import { openRouting } from '../../runtime.js'
import { EXIT_OK, EXIT_UNRESOLVED, EXIT_USAGE } from '../exit-codes.js'

export interface HealthCommandDeps {
  env: NodeJS.ProcessEnv
  loadConfig: typeof loadConfig
  openRouting: (config: DownloaderConfig) => Promise<{
    pool: Pick<ProxyPool, 'healthCheckAll' | 'stats'>
    close(): Promise<void>
  }>
}

const defaultDeps: HealthCommandDeps = {
  env: process.env,
  loadConfig,
  openRouting,
}

/**
 * Probe every route once. Exits 0 when at least one route passes.
 */
export async function runHealthCommand(deps: HealthCommandDeps = defaultDeps): Promise<number> {
  let config: DownloaderConfig
  try {
    config = deps.loadConfig(deps.env, {})
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message)
      return EXIT_USAGE
    }
    throw error
  }

  const routing = await deps.openRouting(config)
  try {
    const results = await routing.pool.healthCheckAll()
    let passing = 0

    for (const record of routing.pool.stats()) {
      const passed = results.get(record.id) === true
      if (passed) passing++
      const target = record.proxyUrl ? redactUrlCredentials(record.proxyUrl) : 'direct'
      console.log(`${passed ? 'ok  ' : 'FAIL'}  ${record.id}  ${target}`)
    }

    console.log(`${passing}/${results.size} routes healthy`)
    return passing > 0 ? EXIT_OK : EXIT_UNRESOLVED
  } finally {
    await routing.close()
  }
}
