import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager'
import { Command } from 'commander'
import { DEFAULT_SECRET_NAME_PREFIX } from '../../lambda/handlers/shared/config'
import {
  getRecordSecretName,
  readCredentialRecord,
} from '../../lambda/handlers/shared/secrets'

export function registerShowKeyCommand(program: Command): void {
  program
    .command('show-key')
    .description('Show the stored access key record for a user (never prints the secret)')
    .requiredOption('-u, --user <name>', 'IAM user name')
    .option('--prefix <prefix>', 'Secret name prefix', DEFAULT_SECRET_NAME_PREFIX)
    .option('--region <region>', 'AWS region')
    .action(async (opts: { user: string; prefix: string; region?: string }) => {
      const region = opts.region || process.env.AWS_REGION || 'us-east-1'
      const secretName = getRecordSecretName(opts.prefix, opts.user)
      const client = new SecretsManagerClient({ region })

      const record = await readCredentialRecord(client, opts.prefix, opts.user)
      if (!record) {
        console.error(`No record found at ${secretName}`)
        process.exit(1)
      }

      console.log(`Secret:        ${secretName}`)
      console.log(`UserName:      ${record.UserName}`)
      console.log(`AccessKeyId:   ${record.AccessKeyId}`)
      console.log(`CreateDate:    ${record.CreateDate}`)
    })
}
