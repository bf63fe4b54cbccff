import { loadConfig } from '../../config/settings.js'
import type { DownloaderConfig } from '../../config/settings.js'
import type { CheckpointStore } from '../../checkpoint/store.js'
import type { CheckpointStatus } from '../../checkpoint/types.js'
import { ConfigError } from '../../errors.js'
import { openCheckpoint } from '../../runtime.js'
import { EXIT_OK, EXIT_USAGE } from '../exit-codes.js'

export interface StatusCommandInput {
  json: boolean
  checkpointPath?: string
}

export interface StatusCommandDeps {
  env: NodeJS.ProcessEnv
  loadConfig: typeof loadConfig
  openCheckpoint: (config: DownloaderConfig) => {
    store: Pick<CheckpointStore, 'load'>
    close(): Promise<void>
  }
}

const defaultDeps: StatusCommandDeps = {
  env: process.env,
  loadConfig,
  openCheckpoint,
}

export function formatStatus(status: CheckpointStatus): string[] {
  if (status.runs === 0 && Object.values(status.counts).every(count => count === 0)) {
    return ['No checkpoint yet']
  }

  const lines = [
    `Started:  ${status.startedAt}`,
    `Updated:  ${status.updatedAt}`,
    `Runs:     ${status.runs}`,
    `Records:  ${status.totalRecords}`,
    `Nodes:    ${status.countsByKind.category} categories, ${status.countsByKind.group} groups`,
    `  completed:   ${status.counts.completed}`,
    `  pending:     ${status.counts.pending}`,
    `  in_progress: ${status.counts.in_progress}`,
    `  failed:      ${status.counts.failed}`,
    `Resumable: ${status.canResume ? 'yes' : 'no'}`,
  ]
  for (const failure of status.failed.slice(0, 20)) {
    lines.push(`  failed ${failure.id}${failure.error ? `: ${failure.error}` : ''}`)
  }
  return lines
}

export async function runStatusCommand(
  input: StatusCommandInput,
  deps: StatusCommandDeps = defaultDeps
): Promise<number> {
  let config: DownloaderConfig
  try {
    config = deps.loadConfig(deps.env, { checkpointPath: input.checkpointPath })
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message)
      return EXIT_USAGE
    }
    throw error
  }

  const checkpoint = deps.openCheckpoint(config)
  try {
    const status = await checkpoint.store.load()
    if (input.json) {
      console.log(JSON.stringify(status, null, 2))
    } else {
      for (const line of formatStatus(status)) console.log(line)
    }
    return EXIT_OK
  } finally {
    await checkpoint.close()
  }
}
