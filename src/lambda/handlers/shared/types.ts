export type InstanceState =
  | 'pending'
  | 'running'
  | 'stopping'
  | 'stopped'
  | 'shutting-down'
  | 'terminated'

export interface ComputeInstance {
  instanceId: string
  state: InstanceState
  launchTime: Date
  tags: Record<string, string>
}

export type CredentialStatus = 'Active' | 'Inactive'

export interface Credential {
  accessKeyId: string
  userName: string
  status: CredentialStatus
  createDate: Date
  /** null when the key has never been used */
  lastUsedDate: Date | null
}

export interface Principal {
  userName: string
  /** Oldest first. IAM caps this at two keys per user. */
  credentials: Credential[]
}

/** A freshly issued access key, including its secret half. */
export interface IssuedCredential {
  accessKeyId: string
  secretAccessKey: string
  userName: string
  createDate: Date
}

export interface ResourceUniverse {
  instances: ComputeInstance[]
  principals: Principal[]
}

export type ActionKind = 'StopInstance' | 'DeactivateKey' | 'RotateKey'

export type ActionResult = 'Applied' | 'SkippedDryRun' | 'SkippedPolicy' | 'Failed'

export const ACTION_KINDS: readonly ActionKind[] = [
  'StopInstance',
  'DeactivateKey',
  'RotateKey',
]

export const ACTION_RESULTS: readonly ActionResult[] = [
  'Applied',
  'SkippedDryRun',
  'SkippedPolicy',
  'Failed',
]

export interface ActionOutcome {
  kind: ActionKind
  /** Instance id or access key id */
  targetId: string
  /** Owning user, for key actions */
  principal?: string
  result: ActionResult
  detail?: string
}

export type OutcomeCounts = Record<ActionKind, Record<ActionResult, number>>

export interface RunSummary {
  runId: string
  runAt: string
  dryRun: boolean
  instancesEvaluated: number
  principalsProcessed: number
  outcomes: readonly ActionOutcome[]
  counts: OutcomeCounts
}

export interface InstanceTagFilter {
  key: string
  value: string
}

export interface GuardianConfig {
  dryRun: boolean
  instanceTagFilter?: InstanceTagFilter
  /** Empty means every user is managed */
  allowedUsers: string[]
  secretNamePrefix: string
  slackWebhookUrl?: string
  maxAttempts: number
}

/** EC2 operations the job depends on. */
export interface ComputeBackend {
  listInstances(filter?: InstanceTagFilter): Promise<ComputeInstance[]>
  stopInstance(instanceId: string): Promise<void>
}

/** IAM operations the job depends on. */
export interface IdentityBackend {
  listUserNames(): Promise<string[]>
  listCredentials(userName: string): Promise<Credential[]>
  createCredential(userName: string): Promise<IssuedCredential>
  deactivateCredential(userName: string, accessKeyId: string): Promise<void>
}

export interface CredentialStore {
  store(credential: IssuedCredential): Promise<string>
}

export interface Notifier {
  notify(summary: RunSummary): Promise<void>
}

export interface GuardianBackends {
  compute: ComputeBackend
  identity: IdentityBackend
  store: CredentialStore
  notifier: Notifier
}
