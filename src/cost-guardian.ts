import * as path from 'path'
import { Aws, Duration } from 'aws-cdk-lib'
import * as events from 'aws-cdk-lib/aws-events'
import * as eventsTargets from 'aws-cdk-lib/aws-events-targets'
import * as iam from 'aws-cdk-lib/aws-iam'
import { Runtime } from 'aws-cdk-lib/aws-lambda'
import { NodejsFunction } from 'aws-cdk-lib/aws-lambda-nodejs'
import { Construct } from 'constructs'

const HANDLERS_DIR = path.join(__dirname, 'lambda', 'handlers')
// guardian.ts when loaded from source, guardian.js once compiled
const HANDLER_EXT = path.extname(__filename)

const PREFIX_PATTERN = /^[a-zA-Z0-9/_+=.@-]*$/
const USER_NAME_PATTERN = /^[\w+=,.@-]+$/

/**
 * Restricts which EC2 instances the guardian may stop.
 */
export interface InstanceTagFilter {
  /**
   * Tag key, e.g. "AutoStop".
   */
  readonly key: string

  /**
   * Required tag value, e.g. "true".
   */
  readonly value: string
}

/**
 * Properties for the CostGuardian construct.
 */
export interface CostGuardianProps {
  /**
   * Log decisions only, without stopping instances or touching keys.
   *
   * @default true
   */
  readonly dryRun?: boolean

  /**
   * Only instances carrying this tag are considered. StopInstances is also
   * conditioned on the tag in the function's IAM policy.
   *
   * @default - all instances
   */
  readonly instanceTagFilter?: InstanceTagFilter

  /**
   * IAM user names whose keys are managed.
   *
   * @default - all users
   */
  readonly allowedUsers?: string[]

  /**
   * Secrets Manager name prefix. Each user's record is stored at
   * `<prefix><user>/access-key`.
   *
   * @default 'iam/user/'
   */
  readonly secretNamePrefix?: string

  /**
   * Slack incoming webhook for the run report.
   *
   * @default - no notification
   */
  readonly slackWebhookUrl?: string

  /**
   * When the job runs.
   *
   * @default - once a day
   */
  readonly schedule?: events.Schedule

  /**
   * Wall-clock budget for one run.
   *
   * @default Duration.minutes(5)
   */
  readonly timeout?: Duration

  /**
   * Attempts per AWS API call, including the first (1-5).
   *
   * @default 3
   */
  readonly maxAttempts?: number
}

/**
 * A scheduled Lambda that stops EC2 instances running for more than 24 hours,
 * deactivates IAM access keys unused for 60 days, and rotates keys older
 * than 30 days, storing each new key in Secrets Manager.
 */
export class CostGuardian extends Construct {
  /**
   * The guardian Lambda function.
   */
  public readonly function: NodejsFunction

  /**
   * The EventBridge rule that triggers each run.
   */
  public readonly rule: events.Rule

  /**
   * The secret name prefix in use.
   */
  public readonly secretNamePrefix: string

  constructor(scope: Construct, id: string, props: CostGuardianProps = {}) {
    super(scope, id)

    this.secretNamePrefix = props.secretNamePrefix ?? 'iam/user/'
    const maxAttempts = props.maxAttempts ?? 3

    // ─── Input validation ──────────────────────────────────────
    if (!PREFIX_PATTERN.test(this.secretNamePrefix)) {
      throw new Error(
        `Invalid secretNamePrefix "${this.secretNamePrefix}". It must match ${PREFIX_PATTERN}.`,
      )
    }
    for (const user of props.allowedUsers ?? []) {
      if (!USER_NAME_PATTERN.test(user)) {
        throw new Error(`Invalid IAM user name "${user}" in allowedUsers.`)
      }
    }
    if (props.instanceTagFilter && !props.instanceTagFilter.key) {
      throw new Error('instanceTagFilter.key must not be empty.')
    }
    if (props.instanceTagFilter && !props.instanceTagFilter.value) {
      throw new Error('instanceTagFilter.value must not be empty.')
    }
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1 || maxAttempts > 5) {
      throw new Error(`maxAttempts must be an integer from 1 to 5, got ${maxAttempts}.`)
    }

    // ─── Lambda environment ────────────────────────────────────
    const environment: Record<string, string> = {
      DRY_RUN: String(props.dryRun ?? true),
      SECRET_NAME_PREFIX: this.secretNamePrefix,
      MAX_ATTEMPTS: String(maxAttempts),
    }
    if (props.instanceTagFilter) {
      environment.EC2_FILTER_TAG_KEY = props.instanceTagFilter.key
      environment.EC2_FILTER_TAG_VALUE = props.instanceTagFilter.value
    }
    if (props.allowedUsers && props.allowedUsers.length > 0) {
      environment.IAM_ALLOWED_USERS = props.allowedUsers.join(',')
    }
    if (props.slackWebhookUrl) {
      environment.SLACK_WEBHOOK_URL = props.slackWebhookUrl
    }

    // ─── Lambda Function (NodejsFunction with esbuild) ─────────
    this.function = new NodejsFunction(this, 'GuardianFn', {
      runtime: Runtime.NODEJS_20_X,
      entry: path.join(HANDLERS_DIR, `guardian${HANDLER_EXT}`),
      handler: 'handler',
      environment,
      timeout: props.timeout ?? Duration.minutes(5),
      memorySize: 256,
      bundling: {
        externalModules: [],
        minify: true,
        sourceMap: true,
      },
    })

    // ─── IAM ───────────────────────────────────────────────────
    this.function.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['ec2:DescribeInstances'],
        resources: ['*'],
      }),
    )
    this.function.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['ec2:StopInstances'],
        resources: [`arn:${Aws.PARTITION}:ec2:*:${Aws.ACCOUNT_ID}:instance/*`],
        ...(props.instanceTagFilter
          ? {
            conditions: {
              StringEquals: {
                [`aws:ResourceTag/${props.instanceTagFilter.key}`]:
                    props.instanceTagFilter.value,
              },
            },
          }
          : {}),
      }),
    )
    this.function.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['iam:ListUsers'],
        resources: ['*'],
      }),
    )
    this.function.addToRolePolicy(
      new iam.PolicyStatement({
        actions: [
          'iam:ListAccessKeys',
          'iam:GetAccessKeyLastUsed',
          'iam:CreateAccessKey',
          'iam:UpdateAccessKey',
        ],
        resources: [`arn:${Aws.PARTITION}:iam::${Aws.ACCOUNT_ID}:user/*`],
      }),
    )
    this.function.addToRolePolicy(
      new iam.PolicyStatement({
        actions: [
          'secretsmanager:CreateSecret',
          'secretsmanager:PutSecretValue',
          'secretsmanager:GetSecretValue',
          'secretsmanager:DescribeSecret',
        ],
        resources: [this.recordArnPattern()],
      }),
    )

    // ─── Schedule ──────────────────────────────────────────────
    this.rule = new events.Rule(this, 'Schedule', {
      schedule: props.schedule ?? events.Schedule.rate(Duration.days(1)),
      targets: [new eventsTargets.LambdaFunction(this.function)],
    })
  }

  /**
   * Grant read access to the stored access key records (for the services
   * that consume the rotated keys).
   */
  public grantRecordRead(grantee: iam.IGrantable): void {
    grantee.grantPrincipal.addToPrincipalPolicy(
      new iam.PolicyStatement({
        actions: ['secretsmanager:GetSecretValue', 'secretsmanager:DescribeSecret'],
        resources: [this.recordArnPattern()],
      }),
    )
  }

  private recordArnPattern(): string {
    return `arn:${Aws.PARTITION}:secretsmanager:${Aws.REGION}:${Aws.ACCOUNT_ID}:secret:${this.secretNamePrefix}*`
  }
}
