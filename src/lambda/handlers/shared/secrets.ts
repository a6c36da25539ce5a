import {
  SecretsManagerClient,
  GetSecretValueCommand,
  PutSecretValueCommand,
  CreateSecretCommand,
  ResourceExistsException,
  ResourceNotFoundException,
} from '@aws-sdk/client-secrets-manager'
import { z } from 'zod'
import { PersistenceError } from './errors'
import type { CredentialStore, IssuedCredential } from './types'

/**
 * The record stored per IAM user. Readers of the secret depend on exactly
 * these four fields, so unknown fields are rejected rather than passed on.
 */
export const SecretRecordSchema = z
  .object({
    UserName: z.string().min(1),
    AccessKeyId: z.string().min(1),
    SecretAccessKey: z.string().min(1),
    CreateDate: z.string().datetime({ offset: true }),
  })
  .strict()

export type SecretRecord = z.infer<typeof SecretRecordSchema>

export function getRecordSecretName(prefix: string, userName: string): string {
  return `${prefix}${userName}/access-key`
}

export function toSecretRecord(credential: IssuedCredential): SecretRecord {
  return SecretRecordSchema.parse({
    UserName: credential.userName,
    AccessKeyId: credential.accessKeyId,
    SecretAccessKey: credential.secretAccessKey,
    CreateDate: credential.createDate.toISOString(),
  })
}

export function parseSecretRecord(secretString: string): SecretRecord {
  return SecretRecordSchema.parse(JSON.parse(secretString))
}

/**
 * Upsert the record for one user. The secret is created on first rotation
 * and overwritten with a new version on every later one.
 */
export async function storeCredentialRecord(
  client: SecretsManagerClient,
  prefix: string,
  record: SecretRecord,
): Promise<string> {
  const secretName = getRecordSecretName(prefix, record.UserName)
  const secretString = JSON.stringify(record)

  try {
    await client.send(
      new CreateSecretCommand({
        Name: secretName,
        SecretString: secretString,
        Description: `Current access key for IAM user ${record.UserName}`,
      }),
    )
    console.log(`    Created secret '${secretName}'.`)
    return secretName
  } catch (e) {
    if (!(e instanceof ResourceExistsException)) {
      throw new PersistenceError(
        secretName,
        `Failed to create secret '${secretName}'`,
        { cause: e },
      )
    }
  }

  try {
    await client.send(
      new PutSecretValueCommand({
        SecretId: secretName,
        SecretString: secretString,
      }),
    )
    console.log(`    Secret '${secretName}' already existed, wrote new version.`)
    return secretName
  } catch (e) {
    throw new PersistenceError(
      secretName,
      `Failed to update secret '${secretName}'`,
      { cause: e },
    )
  }
}

export async function readCredentialRecord(
  client: SecretsManagerClient,
  prefix: string,
  userName: string,
): Promise<SecretRecord | undefined> {
  const secretName = getRecordSecretName(prefix, userName)
  try {
    const result = await client.send(
      new GetSecretValueCommand({ SecretId: secretName }),
    )
    if (result.SecretString) {
      return parseSecretRecord(result.SecretString)
    }
    return undefined
  } catch (e) {
    if (e instanceof ResourceNotFoundException) {
      return undefined
    }
    throw e
  }
}

export function createCredentialStore(
  prefix: string,
  client: SecretsManagerClient = new SecretsManagerClient({}),
): CredentialStore {
  return {
    async store(credential: IssuedCredential): Promise<string> {
      let record: SecretRecord
      try {
        record = toSecretRecord(credential)
      } catch (e) {
        throw new PersistenceError(
          getRecordSecretName(prefix, credential.userName),
          `Refusing to store malformed record for ${credential.userName}`,
          { cause: e },
        )
      }
      return storeCredentialRecord(client, prefix, record)
    },
  }
}
