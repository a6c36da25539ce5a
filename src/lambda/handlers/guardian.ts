import type { ScheduledEvent } from 'aws-lambda'
import { createAwsBackends } from './shared/backends'
import { loadConfig } from './shared/config'
import { describeError } from './shared/errors'
import { runGuardian } from './shared/orchestrator'
import type { OutcomeCounts } from './shared/types'

export interface GuardianResult {
  status: 'ok'
  runId: string
  dryRun: boolean
  counts: OutcomeCounts
}

export async function handler(event?: ScheduledEvent): Promise<GuardianResult> {
  if (event?.id) {
    console.log(`Triggered by ${event.source} event ${event.id}`)
  }

  const config = loadConfig()

  try {
    const summary = await runGuardian({
      config,
      backends: createAwsBackends(config),
    })
    return {
      status: 'ok',
      runId: summary.runId,
      dryRun: summary.dryRun,
      counts: summary.counts,
    }
  } catch (e) {
    console.error(`Cost guardian run failed: ${describeError(e)}`)
    throw e
  }
}
