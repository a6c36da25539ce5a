import { z } from 'zod'
import { ConfigError } from './errors'
import type { GuardianConfig } from './types'

export const DEFAULT_SECRET_NAME_PREFIX = 'iam/user/'
export const DEFAULT_MAX_ATTEMPTS = 3

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined))

const WebhookUrl = z.string().url()

const EnvSchema = z.object({
  // Anything but an explicit "false" keeps the job read-only.
  DRY_RUN: z
    .string()
    .optional()
    .transform((v) => (v ?? 'true').trim().toLowerCase() !== 'false'),
  EC2_FILTER_TAG_KEY: optionalString,
  EC2_FILTER_TAG_VALUE: optionalString,
  IAM_ALLOWED_USERS: z
    .string()
    .optional()
    .transform((v) =>
      (v ?? '')
        .split(',')
        .map((u) => u.trim())
        .filter(Boolean),
    ),
  SECRET_NAME_PREFIX: z.string().optional(),
  SLACK_WEBHOOK_URL: optionalString,
  MAX_ATTEMPTS: z.coerce
    .number()
    .int()
    .min(1)
    .max(5)
    .default(DEFAULT_MAX_ATTEMPTS),
})

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): GuardianConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${issues}`)
  }
  const vars = parsed.data

  const config: GuardianConfig = {
    dryRun: vars.DRY_RUN,
    allowedUsers: [...new Set(vars.IAM_ALLOWED_USERS)],
    secretNamePrefix: vars.SECRET_NAME_PREFIX ?? DEFAULT_SECRET_NAME_PREFIX,
    maxAttempts: vars.MAX_ATTEMPTS,
  }

  if (vars.EC2_FILTER_TAG_KEY && vars.EC2_FILTER_TAG_VALUE) {
    config.instanceTagFilter = {
      key: vars.EC2_FILTER_TAG_KEY,
      value: vars.EC2_FILTER_TAG_VALUE,
    }
  } else if (vars.EC2_FILTER_TAG_KEY || vars.EC2_FILTER_TAG_VALUE) {
    console.warn(
      'EC2_FILTER_TAG_KEY and EC2_FILTER_TAG_VALUE must both be set; ignoring instance tag filter.',
    )
  }

  if (vars.SLACK_WEBHOOK_URL) {
    // Notification is optional; a bad URL only disables it.
    if (WebhookUrl.safeParse(vars.SLACK_WEBHOOK_URL).success) {
      config.slackWebhookUrl = vars.SLACK_WEBHOOK_URL
    } else {
      console.warn('SLACK_WEBHOOK_URL is not a valid URL; Slack notification disabled.')
    }
  }

  return config
}
