import { ConstraintError } from './errors'
import type { ComputeInstance, Credential, Principal } from './types'

const HOUR_MS = 60 * 60 * 1000
const DAY_MS = 24 * HOUR_MS

export const INSTANCE_MAX_RUNTIME_MS = 24 * HOUR_MS
export const KEY_ROTATION_AGE_MS = 30 * DAY_MS
export const KEY_INACTIVITY_MS = 60 * DAY_MS
/** IAM hard limit on access keys per user */
export const MAX_KEYS_PER_USER = 2

export type InstanceDecision =
  | { action: 'stop'; instance: ComputeInstance; reason: string }
  | { action: 'skip'; instance: ComputeInstance; reason: string }

export type CredentialDecision =
  | { action: 'rotate'; credential: Credential; reason: string }
  | { action: 'deactivate'; credential: Credential; reason: string }
  | { action: 'blocked'; credential: Credential; error: ConstraintError }
  | { action: 'skip'; credential: Credential; reason: string }

function hours(ms: number): string {
  return `${(ms / HOUR_MS).toFixed(1)}h`
}

function days(ms: number): string {
  return `${(ms / DAY_MS).toFixed(1)}d`
}

export function evaluateInstance(
  instance: ComputeInstance,
  now: Date,
): InstanceDecision {
  if (instance.state !== 'running') {
    return { action: 'skip', instance, reason: `instance is ${instance.state}` }
  }

  const runtime = now.getTime() - instance.launchTime.getTime()
  if (runtime > INSTANCE_MAX_RUNTIME_MS) {
    return {
      action: 'stop',
      instance,
      reason: `running for ${hours(runtime)} (threshold ${hours(INSTANCE_MAX_RUNTIME_MS)})`,
    }
  }

  return {
    action: 'skip',
    instance,
    reason: `running for ${hours(runtime)} (threshold ${hours(INSTANCE_MAX_RUNTIME_MS)})`,
  }
}

/**
 * Classify a single key, ignoring the per-user cap.
 *
 * Age-based rotation is checked before inactivity, so a key that is both
 * old and unused gets rotated rather than just deactivated.
 */
export function evaluateCredential(
  credential: Credential,
  now: Date,
): CredentialDecision {
  if (credential.status !== 'Active') {
    return {
      action: 'skip',
      credential,
      reason: 'key is already inactive',
    }
  }

  const age = now.getTime() - credential.createDate.getTime()
  if (age > KEY_ROTATION_AGE_MS) {
    return {
      action: 'rotate',
      credential,
      reason: `key age ${days(age)} exceeds ${days(KEY_ROTATION_AGE_MS)}`,
    }
  }

  const lastActivity = credential.lastUsedDate ?? credential.createDate
  const idle = now.getTime() - lastActivity.getTime()
  const usage = credential.lastUsedDate ? 'last used' : 'never used, created'
  if (idle > KEY_INACTIVITY_MS) {
    return {
      action: 'deactivate',
      credential,
      reason: `${usage} ${days(idle)} ago, exceeds ${days(KEY_INACTIVITY_MS)}`,
    }
  }

  return {
    action: 'skip',
    credential,
    reason: `key age ${days(age)}, ${usage} ${days(idle)} ago`,
  }
}

/**
 * Evaluate every key of a user, then apply the two-key cap. A rotation
 * needs a free slot for the replacement key; when the user already holds
 * the maximum, the rotation is blocked and the old key stays Active.
 * At most one replacement key is issued per user per run.
 */
export function planPrincipal(
  principal: Principal,
  now: Date,
): CredentialDecision[] {
  let keyCount = principal.credentials.length
  let issued = false

  return principal.credentials.map((credential): CredentialDecision => {
    const decision = evaluateCredential(credential, now)
    if (decision.action !== 'rotate') {
      return decision
    }

    if (issued || keyCount + 1 > MAX_KEYS_PER_USER) {
      const newer = principal.credentials.find(
        (c) =>
          c.accessKeyId !== credential.accessKeyId &&
          c.status === 'Active' &&
          c.createDate.getTime() > credential.createDate.getTime(),
      )
      const hint = newer
        ? `; newer active key ${newer.accessKeyId} exists, retire ${credential.accessKeyId} manually`
        : ''
      return {
        action: 'blocked',
        credential,
        error: new ConstraintError(
          `Cannot rotate ${credential.accessKeyId}: ${principal.userName} already holds ${keyCount} of ${MAX_KEYS_PER_USER} access keys${hint}`,
        ),
      }
    }

    keyCount += 1
    issued = true
    return decision
  })
}
