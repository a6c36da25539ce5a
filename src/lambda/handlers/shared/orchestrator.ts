import { v4 as uuidv4 } from 'uuid'
import { discoverResources } from './discovery'
import { ActionError, PersistenceError, describeError } from './errors'
import { evaluateInstance, planPrincipal } from './policy'
import type { CredentialDecision, InstanceDecision } from './policy'
import { countOutcomes } from './report'
import type {
  ActionOutcome,
  GuardianBackends,
  GuardianConfig,
  IssuedCredential,
  Principal,
  RunSummary,
} from './types'

export interface RunOptions {
  config: GuardianConfig
  backends: GuardianBackends
  now?: Date
}

async function actOnInstance(
  decision: InstanceDecision,
  config: GuardianConfig,
  backends: GuardianBackends,
): Promise<ActionOutcome> {
  const { instance } = decision
  const base = { kind: 'StopInstance' as const, targetId: instance.instanceId }

  console.log(`Instance ${instance.instanceId}: ${decision.action}, ${decision.reason}`)

  if (decision.action === 'skip') {
    return { ...base, result: 'SkippedPolicy', detail: decision.reason }
  }
  if (config.dryRun) {
    console.log(`  DRY_RUN: would stop ${instance.instanceId}.`)
    return { ...base, result: 'SkippedDryRun', detail: decision.reason }
  }

  try {
    await backends.compute.stopInstance(instance.instanceId)
    console.log(`  Stopped ${instance.instanceId}.`)
    return { ...base, result: 'Applied', detail: decision.reason }
  } catch (e) {
    const err = new ActionError(instance.instanceId, 'StopInstances failed', { cause: e })
    console.error(`  Error stopping ${instance.instanceId}: ${describeError(err)}`)
    return { ...base, result: 'Failed', detail: describeError(err) }
  }
}

async function deactivate(
  backends: GuardianBackends,
  userName: string,
  accessKeyId: string,
): Promise<void> {
  try {
    await backends.identity.deactivateCredential(userName, accessKeyId)
  } catch (e) {
    throw new ActionError(accessKeyId, 'UpdateAccessKey failed', { cause: e })
  }
}

/**
 * Issue a replacement key, persist it, and only then retire the old key.
 * If persistence fails the old key is left Active.
 */
async function rotate(
  backends: GuardianBackends,
  userName: string,
  oldKeyId: string,
): Promise<string> {
  let issued: IssuedCredential
  try {
    issued = await backends.identity.createCredential(userName)
  } catch (e) {
    throw new ActionError(oldKeyId, 'CreateAccessKey failed', { cause: e })
  }
  console.log(`    Created new key ${issued.accessKeyId} for ${userName}.`)

  try {
    await backends.store.store(issued)
  } catch (e) {
    throw new PersistenceError(
      e instanceof PersistenceError ? e.secretName : '',
      `Storing new key ${issued.accessKeyId} failed, old key left Active`,
      { cause: e },
    )
  }

  try {
    await deactivate(backends, userName, oldKeyId)
  } catch (e) {
    throw new ActionError(
      oldKeyId,
      `New key ${issued.accessKeyId} is stored but the old key is still Active`,
      { cause: e },
    )
  }
  return issued.accessKeyId
}

async function actOnCredential(
  decision: CredentialDecision,
  config: GuardianConfig,
  backends: GuardianBackends,
): Promise<ActionOutcome> {
  const { credential } = decision
  const target = { targetId: credential.accessKeyId, principal: credential.userName }

  switch (decision.action) {
    case 'skip':
      console.log(`  Key ${credential.accessKeyId}: skip, ${decision.reason}`)
      return { kind: 'DeactivateKey', ...target, result: 'SkippedPolicy', detail: decision.reason }

    case 'blocked':
      console.warn(`  Key ${credential.accessKeyId}: ${decision.error.message}`)
      return {
        kind: 'RotateKey',
        ...target,
        result: 'SkippedPolicy',
        detail: `${decision.error.name}: ${decision.error.message}`,
      }

    case 'deactivate':
      console.log(`  Key ${credential.accessKeyId}: deactivate, ${decision.reason}`)
      if (config.dryRun) {
        console.log(`    DRY_RUN: would deactivate ${credential.accessKeyId}.`)
        return { kind: 'DeactivateKey', ...target, result: 'SkippedDryRun', detail: decision.reason }
      }
      try {
        await deactivate(backends, credential.userName, credential.accessKeyId)
        console.log(`    Key ${credential.accessKeyId} deactivated.`)
        return { kind: 'DeactivateKey', ...target, result: 'Applied', detail: decision.reason }
      } catch (e) {
        console.error(`    Error deactivating ${credential.accessKeyId}: ${describeError(e)}`)
        return { kind: 'DeactivateKey', ...target, result: 'Failed', detail: describeError(e) }
      }

    case 'rotate':
      console.log(`  Key ${credential.accessKeyId}: rotate, ${decision.reason}`)
      if (config.dryRun) {
        console.log(`    DRY_RUN: would create a new key and deactivate ${credential.accessKeyId}.`)
        return { kind: 'RotateKey', ...target, result: 'SkippedDryRun', detail: decision.reason }
      }
      try {
        const newKeyId = await rotate(backends, credential.userName, credential.accessKeyId)
        console.log(`    Rotated ${credential.accessKeyId} -> ${newKeyId}.`)
        return { kind: 'RotateKey', ...target, result: 'Applied', detail: `replaced by ${newKeyId}` }
      } catch (e) {
        console.error(`    Error rotating ${credential.accessKeyId}: ${describeError(e)}`)
        return { kind: 'RotateKey', ...target, result: 'Failed', detail: describeError(e) }
      }
  }
}

async function processPrincipal(
  principal: Principal,
  now: Date,
  config: GuardianConfig,
  backends: GuardianBackends,
): Promise<ActionOutcome[]> {
  console.log(`Processing user: ${principal.userName}`)
  if (principal.credentials.length === 0) {
    console.log(`  User ${principal.userName} has no access keys.`)
    return []
  }

  const outcomes: ActionOutcome[] = []
  // Sequential: a user's rotation must finish before their next key is touched.
  for (const decision of planPrincipal(principal, now)) {
    outcomes.push(await actOnCredential(decision, config, backends))
  }
  return outcomes
}

/**
 * One full pass: discover, evaluate, act, notify. The outcome depends only
 * on the discovered state, `now` and `config`, so a rerun on unchanged state
 * applies nothing new.
 *
 * Throws only when discovery fails. Every per-resource failure ends up in
 * the summary, which is handed to the notifier exactly once.
 */
export async function runGuardian(options: RunOptions): Promise<RunSummary> {
  const { config, backends } = options
  const now = options.now ?? new Date()

  console.log(`Cost guardian started at ${now.toISOString()}, DRY_RUN=${config.dryRun}`)

  const universe = await discoverResources(config, backends.compute, backends.identity)

  const outcomes: ActionOutcome[] = []

  for (const instance of universe.instances) {
    outcomes.push(await actOnInstance(evaluateInstance(instance, now), config, backends))
  }

  for (const principal of universe.principals) {
    outcomes.push(...(await processPrincipal(principal, now, config, backends)))
  }

  const counts = countOutcomes(outcomes)
  const summary: RunSummary = Object.freeze({
    runId: uuidv4(),
    runAt: now.toISOString(),
    dryRun: config.dryRun,
    instancesEvaluated: universe.instances.length,
    principalsProcessed: universe.principals.length,
    outcomes: Object.freeze(outcomes.map((o) => Object.freeze(o))),
    counts: Object.freeze({
      StopInstance: Object.freeze(counts.StopInstance),
      DeactivateKey: Object.freeze(counts.DeactivateKey),
      RotateKey: Object.freeze(counts.RotateKey),
    }),
  })

  console.log(
    `Cost guardian run complete: ${outcomes.length} outcome(s), ` +
      `${outcomes.filter((o) => o.result === 'Failed').length} failed.`,
  )

  try {
    await backends.notifier.notify(summary)
  } catch (e) {
    console.error(`Notifier error: ${describeError(e)}`)
  }

  return summary
}
