import { loggers } from '../../config/logger.js'
import { loadConfig } from '../../config/settings.js'
import type { ConfigOverrides, DownloaderConfig } from '../../config/settings.js'
import type { HierarchicalFetcher } from '../../downloader/fetcher.js'
import { RUN_MODES } from '../../downloader/types.js'
import type { RunMode, RunSummary } from '../../downloader/types.js'
import { ConfigError, classifyError } from '../../errors.js'
import { createRuntime } from '../../runtime.js'
import { EXIT_FATAL, EXIT_OK, EXIT_UNRESOLVED, EXIT_USAGE } from '../exit-codes.js'

const log = loggers.cli

export interface RunCommandInput {
  mode: string
  categoryIds: string[]
  concurrency?: number
  baseDelayMs?: number
  backoffFactor?: number
  maxDelayMs?: number
  dryRun: boolean
  output?: string
  signal?: AbortSignal
}

export interface RunCommandDeps {
  env: NodeJS.ProcessEnv
  loadConfig: (env: NodeJS.ProcessEnv, overrides: ConfigOverrides) => DownloaderConfig
  createRuntime: (config: DownloaderConfig) => Promise<{
    fetcher: Pick<HierarchicalFetcher, 'run'>
    close(): Promise<void>
  }>
}

const defaultDeps: RunCommandDeps = {
  env: process.env,
  loadConfig,
  createRuntime,
}

function isRunMode(value: string): value is RunMode {
  return RUN_MODES.some(mode => mode === value)
}

export function exitCodeFor(summary: RunSummary): number {
  if (summary.aborted && summary.abortReason !== 'cancelled') {
    return EXIT_FATAL
  }
  // Failures carried over from earlier runs keep the checkpoint unresolved too
  const unresolved = summary.failed + summary.pending + summary.carriedFailed
  if (summary.aborted || unresolved > 0 || summary.resumable) {
    return EXIT_UNRESOLVED
  }
  return EXIT_OK
}

function printSummary(summary: RunSummary): void {
  const seconds = (summary.durationMs / 1000).toFixed(1)
  console.log(summary.aborted ? `Run aborted (${summary.abortReason ?? 'unknown'})` : `Run finished in ${seconds}s`)
  console.log(`  processed: ${summary.processed}`)
  console.log(`  skipped:   ${summary.skipped}`)
  console.log(`  failed:    ${summary.failed}`)
  console.log(`  pending:   ${summary.pending}`)
  if (summary.carriedFailed > 0) {
    console.log(`  failed in earlier runs: ${summary.carriedFailed} (--mode retry-failed to retry)`)
  }
  console.log(`  records:   ${summary.totalRecords}`)
  console.log(`  requests:  ${summary.requests}`)
  for (const id of summary.failedNodes.slice(0, 20)) {
    console.log(`  failed node: ${id}`)
  }
  if (summary.resumable) {
    console.log('Checkpoint has unresolved nodes: run again with --mode resume or --mode retry-failed')
  }
}

export async function runRunCommand(input: RunCommandInput, deps: RunCommandDeps = defaultDeps): Promise<number> {
  if (!isRunMode(input.mode)) {
    console.error(`Invalid --mode "${input.mode}". Expected one of: ${RUN_MODES.join(', ')}`)
    return EXIT_USAGE
  }
  if (input.mode === 'single-category' && input.categoryIds.length === 0) {
    console.error('--category is required with --mode single-category')
    return EXIT_USAGE
  }
  if (input.mode !== 'single-category' && input.categoryIds.length > 0) {
    console.error('--category only applies to --mode single-category')
    return EXIT_USAGE
  }

  let config: DownloaderConfig
  try {
    config = deps.loadConfig(deps.env, {
      concurrency: input.concurrency,
      baseDelayMs: input.baseDelayMs,
      backoffFactor: input.backoffFactor,
      maxDelayMs: input.maxDelayMs,
      dryRun: input.dryRun,
      outputPath: input.output,
    })
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message)
      return EXIT_USAGE
    }
    throw error
  }

  let runtime: Awaited<ReturnType<RunCommandDeps['createRuntime']>>
  try {
    runtime = await deps.createRuntime(config)
  } catch (error) {
    const classified = classifyError(error)
    console.error(classified.message)
    return classified.category === 'config' ? EXIT_USAGE : EXIT_FATAL
  }

  try {
    const summary = await runtime.fetcher.run({
      mode: input.mode,
      categoryIds: input.categoryIds.length > 0 ? input.categoryIds : undefined,
      concurrency: config.concurrency,
      signal: input.signal,
    })
    printSummary(summary)
    return exitCodeFor(summary)
  } catch (error) {
    const classified = classifyError(error)
    log.fatal('Run aborted', { category: classified.category, code: classified.code, details: classified.details }, error)
    console.error(`Run aborted: ${classified.message}`)
    return classified.category === 'config' ? EXIT_USAGE : EXIT_FATAL
  } finally {
    await runtime.close()
  }
}
