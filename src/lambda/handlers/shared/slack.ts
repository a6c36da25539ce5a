import { NotificationError, describeError } from './errors'
import { renderReport } from './report'
import type { Notifier, RunSummary } from './types'

const DELIVERY_TIMEOUT_MS = 5_000

export async function postToSlack(webhookUrl: string, text: string): Promise<void> {
  let resp: Response
  try {
    resp = await fetch(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text }),
      signal: AbortSignal.timeout(DELIVERY_TIMEOUT_MS),
    })
  } catch (e) {
    throw new NotificationError('Slack webhook request failed', { cause: e })
  }

  if (!resp.ok) {
    const body = await resp.text().catch(() => '')
    throw new NotificationError(
      `Slack webhook returned ${resp.status}${body ? `: ${body}` : ''}`,
    )
  }
}

/**
 * Posts the run report to a Slack incoming webhook. Delivery failures are
 * logged, never thrown.
 */
export class SlackNotifier implements Notifier {
  constructor(private readonly webhookUrl?: string) {}

  async notify(summary: RunSummary): Promise<void> {
    if (!this.webhookUrl) {
      console.log('SLACK_WEBHOOK_URL not set; skipping Slack notification.')
      return
    }

    try {
      await postToSlack(this.webhookUrl, renderReport(summary))
      console.log('Slack notification sent.')
    } catch (e) {
      console.error(`Error sending Slack notification: ${describeError(e)}`)
    }
  }
}
