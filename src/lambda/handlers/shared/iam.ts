import {
  IAMClient,
  ListUsersCommand,
  ListAccessKeysCommand,
  GetAccessKeyLastUsedCommand,
  CreateAccessKeyCommand,
  UpdateAccessKeyCommand,
} from '@aws-sdk/client-iam'
import type { Credential, IdentityBackend, IssuedCredential } from './types'

export function createIdentityBackend(
  client: IAMClient = new IAMClient({}),
): IdentityBackend {
  async function getLastUsed(accessKeyId: string): Promise<Date | null> {
    const result = await client.send(
      new GetAccessKeyLastUsedCommand({ AccessKeyId: accessKeyId }),
    )
    const lastUsed = result.AccessKeyLastUsed?.LastUsedDate
    return lastUsed ? new Date(lastUsed) : null
  }

  return {
    async listUserNames(): Promise<string[]> {
      const names: string[] = []
      let marker: string | undefined

      do {
        const result = await client.send(
          new ListUsersCommand({ Marker: marker }),
        )
        for (const user of result.Users ?? []) {
          if (user.UserName) {
            names.push(user.UserName)
          }
        }
        marker = result.IsTruncated ? result.Marker : undefined
      } while (marker)

      return names
    },

    async listCredentials(userName: string): Promise<Credential[]> {
      const credentials: Credential[] = []
      let marker: string | undefined

      do {
        const result = await client.send(
          new ListAccessKeysCommand({ UserName: userName, Marker: marker }),
        )
        for (const meta of result.AccessKeyMetadata ?? []) {
          if (!meta.AccessKeyId || !meta.CreateDate) continue
          credentials.push({
            accessKeyId: meta.AccessKeyId,
            userName,
            status: meta.Status === 'Active' ? 'Active' : 'Inactive',
            createDate: new Date(meta.CreateDate),
            lastUsedDate: await getLastUsed(meta.AccessKeyId),
          })
        }
        marker = result.IsTruncated ? result.Marker : undefined
      } while (marker)

      return credentials.sort(
        (a, b) => a.createDate.getTime() - b.createDate.getTime(),
      )
    },

    async createCredential(userName: string): Promise<IssuedCredential> {
      const result = await client.send(
        new CreateAccessKeyCommand({ UserName: userName }),
      )
      const key = result.AccessKey
      if (!key?.AccessKeyId || !key.SecretAccessKey) {
        throw new Error(`CreateAccessKey returned no key material for ${userName}`)
      }
      return {
        accessKeyId: key.AccessKeyId,
        secretAccessKey: key.SecretAccessKey,
        userName,
        createDate: key.CreateDate ? new Date(key.CreateDate) : new Date(),
      }
    },

    async deactivateCredential(
      userName: string,
      accessKeyId: string,
    ): Promise<void> {
      await client.send(
        new UpdateAccessKeyCommand({
          UserName: userName,
          AccessKeyId: accessKeyId,
          Status: 'Inactive',
        }),
      )
    },
  }
}
