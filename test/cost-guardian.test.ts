import { App, Duration, Stack } from 'aws-cdk-lib';
import { Template, Match } from 'aws-cdk-lib/assertions';
import * as events from 'aws-cdk-lib/aws-events';
import * as iam from 'aws-cdk-lib/aws-iam';
import { CostGuardian, CostGuardianProps } from '../src';

// Bundling is skipped for every stack so the tests never invoke esbuild.
function createTestStack(props?: CostGuardianProps) {
  const app = new App({ context: { 'aws:cdk:bundling-stacks': [] } });
  const stack = new Stack(app, 'TestStack');
  const guardian = new CostGuardian(stack, 'CostGuardian', props);
  return { app, stack, guardian, template: Template.fromStack(stack) };
}

describe('CostGuardian Construct', () => {
  test('creates a Node.js 20 function with a five minute timeout', () => {
    const { template } = createTestStack();
    template.resourceCountIs('AWS::Lambda::Function', 1);
    template.hasResourceProperties('AWS::Lambda::Function', {
      Runtime: 'nodejs20.x',
      Handler: 'index.handler',
      Timeout: 300,
      MemorySize: 256,
    });
  });

  test('defaults to dry-run with the iam/user/ prefix', () => {
    const { template, guardian } = createTestStack();
    expect(guardian.secretNamePrefix).toBe('iam/user/');
    template.hasResourceProperties('AWS::Lambda::Function', {
      Environment: {
        Variables: Match.objectLike({
          DRY_RUN: 'true',
          SECRET_NAME_PREFIX: 'iam/user/',
          MAX_ATTEMPTS: '3',
          IAM_ALLOWED_USERS: Match.absent(),
          SLACK_WEBHOOK_URL: Match.absent(),
          EC2_FILTER_TAG_KEY: Match.absent(),
        }),
      },
    });
  });

  test('passes optional settings through the environment', () => {
    const { template } = createTestStack({
      dryRun: false,
      instanceTagFilter: { key: 'AutoStop', value: 'true' },
      allowedUsers: ['alice', 'bob'],
      secretNamePrefix: 'keys/',
      slackWebhookUrl: 'https://hooks.example.com/test-webhook',
      maxAttempts: 5,
    });
    template.hasResourceProperties('AWS::Lambda::Function', {
      Environment: {
        Variables: Match.objectLike({
          DRY_RUN: 'false',
          SECRET_NAME_PREFIX: 'keys/',
          MAX_ATTEMPTS: '5',
          EC2_FILTER_TAG_KEY: 'AutoStop',
          EC2_FILTER_TAG_VALUE: 'true',
          IAM_ALLOWED_USERS: 'alice,bob',
          SLACK_WEBHOOK_URL: 'https://hooks.example.com/test-webhook',
        }),
      },
    });
  });

  test('creates a daily EventBridge rule by default', () => {
    const { template } = createTestStack();
    template.hasResourceProperties('AWS::Events::Rule', {
      ScheduleExpression: 'rate(1 day)',
    });
    template.hasResourceProperties('AWS::Lambda::Permission', {
      Action: 'lambda:InvokeFunction',
      Principal: 'events.amazonaws.com',
    });
  });

  test('accepts a custom schedule and timeout', () => {
    const { template } = createTestStack({
      schedule: events.Schedule.rate(Duration.hours(12)),
      timeout: Duration.minutes(10),
    });
    template.hasResourceProperties('AWS::Events::Rule', {
      ScheduleExpression: 'rate(12 hours)',
    });
    template.hasResourceProperties('AWS::Lambda::Function', {
      Timeout: 600,
    });
  });

  test('grants the EC2, IAM and Secrets Manager actions the run needs', () => {
    const { template } = createTestStack();
    template.hasResourceProperties('AWS::IAM::Policy', {
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({ Action: 'ec2:DescribeInstances', Resource: '*' }),
          Match.objectLike({ Action: 'ec2:StopInstances', Condition: Match.absent() }),
          Match.objectLike({ Action: 'iam:ListUsers', Resource: '*' }),
          Match.objectLike({
            Action: [
              'iam:ListAccessKeys',
              'iam:GetAccessKeyLastUsed',
              'iam:CreateAccessKey',
              'iam:UpdateAccessKey',
            ],
          }),
          Match.objectLike({
            Action: [
              'secretsmanager:CreateSecret',
              'secretsmanager:PutSecretValue',
              'secretsmanager:GetSecretValue',
              'secretsmanager:DescribeSecret',
            ],
          }),
        ]),
      },
    });
  });

  test('conditions StopInstances on the instance tag filter', () => {
    const { template } = createTestStack({
      instanceTagFilter: { key: 'AutoStop', value: 'true' },
    });
    template.hasResourceProperties('AWS::IAM::Policy', {
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({
            Action: 'ec2:StopInstances',
            Condition: { StringEquals: { 'aws:ResourceTag/AutoStop': 'true' } },
          }),
        ]),
      },
    });
  });

  test('grantRecordRead gives read-only access to the stored records', () => {
    const app = new App({ context: { 'aws:cdk:bundling-stacks': [] } });
    const stack = new Stack(app, 'TestStack');
    const guardian = new CostGuardian(stack, 'CostGuardian');
    const role = new iam.Role(stack, 'Consumer', {
      assumedBy: new iam.ServicePrincipal('lambda.amazonaws.com'),
    });
    guardian.grantRecordRead(role);

    const template = Template.fromStack(stack);
    template.hasResourceProperties('AWS::IAM::Policy', {
      Roles: [{ Ref: Match.stringLikeRegexp('^Consumer') }],
      PolicyDocument: {
        Statement: [
          Match.objectLike({
            Action: ['secretsmanager:GetSecretValue', 'secretsmanager:DescribeSecret'],
            Effect: 'Allow',
          }),
        ],
      },
    });
  });

  test('rejects an invalid secret name prefix', () => {
    expect(() => createTestStack({ secretNamePrefix: 'bad prefix/' })).toThrow(
      'Invalid secretNamePrefix',
    );
  });

  test('rejects an invalid user name', () => {
    expect(() => createTestStack({ allowedUsers: ['alice', 'no spaces'] })).toThrow(
      'Invalid IAM user name "no spaces" in allowedUsers.',
    );
  });

  test('rejects an empty tag filter key', () => {
    expect(() => createTestStack({ instanceTagFilter: { key: '', value: 'true' } })).toThrow(
      'instanceTagFilter.key must not be empty.',
    );
  });

  test('rejects an empty tag filter value', () => {
    expect(() => createTestStack({ instanceTagFilter: { key: 'AutoStop', value: '' } })).toThrow(
      'instanceTagFilter.value must not be empty.',
    );
  });

  test('rejects maxAttempts outside 1-5', () => {
    expect(() => createTestStack({ maxAttempts: 0 })).toThrow(
      'maxAttempts must be an integer from 1 to 5, got 0.',
    );
    expect(() => createTestStack({ maxAttempts: 6 })).toThrow('got 6.');
  });
});
