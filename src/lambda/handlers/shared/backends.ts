import { EC2Client } from '@aws-sdk/client-ec2'
import { IAMClient } from '@aws-sdk/client-iam'
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager'
import { createComputeBackend } from './ec2'
import { createIdentityBackend } from './iam'
import { createCredentialStore } from './secrets'
import { SlackNotifier } from './slack'
import type { GuardianBackends, GuardianConfig } from './types'

export interface AwsClientOptions {
  region?: string
}

/**
 * Wire the real AWS clients. Retries are left to the SDK's standard strategy,
 * capped at `config.maxAttempts` per call.
 */
export function createAwsBackends(
  config: GuardianConfig,
  options: AwsClientOptions = {},
): GuardianBackends {
  const clientConfig = {
    maxAttempts: config.maxAttempts,
    ...(options.region ? { region: options.region } : {}),
  }

  return {
    compute: createComputeBackend(new EC2Client(clientConfig)),
    identity: createIdentityBackend(new IAMClient(clientConfig)),
    store: createCredentialStore(
      config.secretNamePrefix,
      new SecretsManagerClient(clientConfig),
    ),
    notifier: new SlackNotifier(config.slackWebhookUrl),
  }
}
