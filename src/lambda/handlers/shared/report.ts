import { ACTION_KINDS, ACTION_RESULTS } from './types'
import type { ActionKind, ActionOutcome, OutcomeCounts, RunSummary } from './types'

const MAX_LISTED_FAILURES = 10

const RESULT_LABELS = {
  Applied: 'applied',
  SkippedDryRun: 'dry-run',
  SkippedPolicy: 'skipped',
  Failed: 'failed',
} as const

const KIND_LABELS: Record<ActionKind, string> = {
  StopInstance: 'EC2 stop (>24h running)',
  DeactivateKey: 'Key deactivation (>60d inactive)',
  RotateKey: 'Key rotation (>30d old)',
}

export function countOutcomes(outcomes: readonly ActionOutcome[]): OutcomeCounts {
  const emptyRow = () => ({ Applied: 0, SkippedDryRun: 0, SkippedPolicy: 0, Failed: 0 })
  const counts: OutcomeCounts = {
    StopInstance: emptyRow(),
    DeactivateKey: emptyRow(),
    RotateKey: emptyRow(),
  }
  for (const outcome of outcomes) {
    counts[outcome.kind][outcome.result] += 1
  }
  return counts
}

/** Slack mrkdwn summary of a run. Never includes secret material. */
export function renderReport(summary: RunSummary): string {
  const lines = [
    '*Cost Guardian run*',
    `Time (UTC): \`${summary.runAt}\``,
    `Run ID: \`${summary.runId}\``,
    `DRY_RUN: \`${summary.dryRun}\``,
    '',
    `Instances evaluated: \`${summary.instancesEvaluated}\``,
    `Users processed: \`${summary.principalsProcessed}\``,
    '',
  ]

  for (const kind of ACTION_KINDS) {
    const row = ACTION_RESULTS.map(
      (result) => `${RESULT_LABELS[result]} \`${summary.counts[kind][result]}\``,
    ).join(', ')
    lines.push(`*${KIND_LABELS[kind]}*: ${row}`)
  }

  const failures = summary.outcomes.filter((o) => o.result === 'Failed')
  if (failures.length > 0) {
    lines.push('', '*Failures*')
    for (const f of failures.slice(0, MAX_LISTED_FAILURES)) {
      const owner = f.principal ? ` (${f.principal})` : ''
      lines.push(`- ${f.kind} \`${f.targetId}\`${owner}: ${f.detail ?? 'unknown error'}`)
    }
    if (failures.length > MAX_LISTED_FAILURES) {
      lines.push(`- ...and ${failures.length - MAX_LISTED_FAILURES} more`)
    }
  }

  return lines.join('\n')
}
