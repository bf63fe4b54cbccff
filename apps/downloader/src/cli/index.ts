/**
 * cardledger-download
 *
 * Operator entry point for the catalog downloader.
 */

import { setLogDestination, setLogLevel } from '@cardledger/logger'
import { loggers } from '../config/logger.js'
import { runHealthCommand } from './commands/health.js'
import { runRunCommand } from './commands/run.js'
import { runStatusCommand } from './commands/status.js'
import { EXIT_FATAL, EXIT_USAGE } from './exit-codes.js'
import { asList, asNumber, asString, parseFlags } from './parse-flags.js'
import type { Flags } from './parse-flags.js'

const NUMERIC_FLAGS = ['concurrency', 'base-delay-ms', 'backoff-factor', 'max-delay-ms']

function printHelp(): void {
  console.log('Catalog downloader')
  console.log('')
  console.log('Commands:')
  console.log('  run --mode fresh|resume|retry-failed|single-category [--category 3,71]')
  console.log('      [--concurrency N] [--base-delay-ms N] [--backoff-factor X] [--max-delay-ms N]')
  console.log('      [--dry-run] [--output <path>]')
  console.log('  status [--checkpoint <path>] [--json]')
  console.log('  health')
  console.log('')
  console.log('Global flags: --verbose (debug logging)')
  console.log('')
  console.log('Exit codes: 0 done, 1 unresolved nodes, 2 usage error, 3 run aborted')
}

function invalidNumbers(flags: Flags): string[] {
  return NUMERIC_FLAGS.filter(key => flags[key] !== undefined && asNumber(flags[key]) === undefined)
}

/**
 * First SIGINT/SIGTERM aborts the run; the fetcher releases in-flight nodes
 * and drains the sink. A second one exits immediately.
 */
function abortOnSignals(): AbortController {
  const controller = new AbortController()
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      loggers.cli.warn('Second signal, exiting without cleanup', { signal })
      process.exit(130)
    }
    loggers.cli.info('Received signal, stopping after in-flight requests', { signal })
    controller.abort()
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)
  return controller
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  // stdout carries summaries and `status --json`
  setLogDestination('stderr')

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }
  if (flags.verbose === true) {
    setLogLevel('debug')
  }

  let exitCode = EXIT_USAGE

  switch (command) {
    case 'run': {
      const invalid = invalidNumbers(flags)
      if (invalid.length > 0) {
        console.error(`Expected a number for: ${invalid.map(key => `--${key}`).join(', ')}`)
        exitCode = EXIT_USAGE
        break
      }
      const controller = abortOnSignals()
      exitCode = await runRunCommand({
        mode: asString(flags.mode) || 'resume',
        categoryIds: asList(flags.category),
        concurrency: asNumber(flags.concurrency),
        baseDelayMs: asNumber(flags['base-delay-ms']),
        backoffFactor: asNumber(flags['backoff-factor']),
        maxDelayMs: asNumber(flags['max-delay-ms']),
        dryRun: flags['dry-run'] === true,
        output: asString(flags.output) || undefined,
        signal: controller.signal,
      })
      break
    }
    case 'status':
      exitCode = await runStatusCommand({
        json: flags.json === true,
        checkpointPath: asString(flags.checkpoint) || undefined,
      })
      break
    case 'health':
      exitCode = await runHealthCommand()
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = EXIT_USAGE
  }

  process.exit(exitCode)
}

main().catch(error => {
  loggers.cli.fatal('Unhandled error', {}, error)
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(EXIT_FATAL)
})
