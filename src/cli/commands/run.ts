import { Command } from 'commander'
import { createAwsBackends } from '../../lambda/handlers/shared/backends'
import { loadConfig } from '../../lambda/handlers/shared/config'
import { runGuardian } from '../../lambda/handlers/shared/orchestrator'
import { renderReport } from '../../lambda/handlers/shared/report'

interface RunOptions {
  apply?: boolean
  tagKey?: string
  tagValue?: string
  allowUsers?: string
  prefix?: string
  slackWebhook?: string
  region?: string
}

/**
 * Map CLI flags onto the same variables the Lambda reads, so both paths go
 * through one config parser. Flags win over the ambient environment.
 */
export function optionsToEnv(
  opts: RunOptions,
  env: Record<string, string | undefined> = process.env,
): Record<string, string | undefined> {
  return {
    ...env,
    DRY_RUN: opts.apply ? 'false' : 'true',
    ...(opts.tagKey ? { EC2_FILTER_TAG_KEY: opts.tagKey } : {}),
    ...(opts.tagValue ? { EC2_FILTER_TAG_VALUE: opts.tagValue } : {}),
    ...(opts.allowUsers ? { IAM_ALLOWED_USERS: opts.allowUsers } : {}),
    ...(opts.prefix ? { SECRET_NAME_PREFIX: opts.prefix } : {}),
    ...(opts.slackWebhook ? { SLACK_WEBHOOK_URL: opts.slackWebhook } : {}),
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run one guardian pass with local AWS credentials (dry-run unless --apply)')
    .option('--apply', 'Actually stop instances and rotate/deactivate keys')
    .option('--tag-key <key>', 'Only consider instances with this tag key')
    .option('--tag-value <value>', 'Required value for --tag-key')
    .option('--allow-users <users>', 'Comma-separated IAM users to manage')
    .option('--prefix <prefix>', 'Secret name prefix (default: iam/user/)')
    .option('--slack-webhook <url>', 'Post the report to this Slack webhook')
    .option('--region <region>', 'AWS region')
    .action(async (opts: RunOptions) => {
      const config = loadConfig(optionsToEnv(opts))
      const region = opts.region || process.env.AWS_REGION

      if (!config.dryRun) {
        console.log('--apply given: changes WILL be made.\n')
      }

      const summary = await runGuardian({
        config,
        backends: createAwsBackends(config, { region }),
      })

      console.log('\n' + renderReport(summary))
    })
}
