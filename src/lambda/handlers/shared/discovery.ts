import { DiscoveryError } from './errors'
import type {
  ComputeBackend,
  ComputeInstance,
  GuardianConfig,
  IdentityBackend,
  Principal,
  ResourceUniverse,
} from './types'

export function isUserManaged(config: GuardianConfig, userName: string): boolean {
  return config.allowedUsers.length === 0 || config.allowedUsers.includes(userName)
}

/**
 * Enumerate every instance and every managed IAM user with their keys.
 * Any listing failure aborts discovery; partial results are never returned.
 */
export async function discoverResources(
  config: GuardianConfig,
  compute: ComputeBackend,
  identity: IdentityBackend,
): Promise<ResourceUniverse> {
  let instances: ComputeInstance[]
  try {
    instances = await compute.listInstances(config.instanceTagFilter)
  } catch (e) {
    throw new DiscoveryError('Failed to list EC2 instances', { cause: e })
  }

  let userNames: string[]
  try {
    userNames = await identity.listUserNames()
  } catch (e) {
    throw new DiscoveryError('Failed to list IAM users', { cause: e })
  }

  const principals: Principal[] = []
  for (const userName of userNames) {
    if (!isUserManaged(config, userName)) {
      console.log(`Skipping user ${userName} (not in IAM_ALLOWED_USERS).`)
      continue
    }
    try {
      const credentials = await identity.listCredentials(userName)
      principals.push({ userName, credentials })
    } catch (e) {
      throw new DiscoveryError(`Failed to list access keys for ${userName}`, {
        cause: e,
      })
    }
  }

  console.log(
    `Discovered ${instances.length} instance(s) and ${principals.length} managed user(s).`,
  )

  return { instances, principals }
}
