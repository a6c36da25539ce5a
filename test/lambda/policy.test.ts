import { ConstraintError } from '../../src/lambda/handlers/shared/errors';
import {
  evaluateCredential,
  evaluateInstance,
  planPrincipal,
} from '../../src/lambda/handlers/shared/policy';
import type { ComputeInstance } from '../../src/lambda/handlers/shared/types';
import { NOW, daysAgo, hoursAgo, makeKey } from './fake-account';

function instance(overrides: Partial<ComputeInstance> = {}): ComputeInstance {
  return {
    instanceId: 'i-0abc',
    state: 'running',
    launchTime: hoursAgo(25),
    tags: { AutoStop: 'true' },
    ...overrides,
  };
}

describe('evaluateInstance', () => {
  test('stops a running instance launched 25 hours ago', () => {
    const decision = evaluateInstance(instance(), NOW);
    expect(decision.action).toBe('stop');
    expect(decision.reason).toBe('running for 25.0h (threshold 24.0h)');
  });

  test('skips an instance launched 2 hours ago', () => {
    const decision = evaluateInstance(instance({ launchTime: hoursAgo(2) }), NOW);
    expect(decision.action).toBe('skip');
    expect(decision.reason).toBe('running for 2.0h (threshold 24.0h)');
  });

  test('threshold is strict: exactly 24 hours is not stopped', () => {
    const decision = evaluateInstance(instance({ launchTime: hoursAgo(24) }), NOW);
    expect(decision.action).toBe('skip');
  });

  test('never targets an instance that is not running', () => {
    for (const state of ['stopped', 'stopping', 'pending', 'terminated'] as const) {
      const decision = evaluateInstance(
        instance({ state, launchTime: daysAgo(10) }),
        NOW,
      );
      expect(decision).toEqual({
        action: 'skip',
        instance: expect.objectContaining({ state }),
        reason: `instance is ${state}`,
      });
    }
  });
});

describe('evaluateCredential', () => {
  test('deactivates a 10-day-old key last used 70 days ago', () => {
    const decision = evaluateCredential(
      makeKey('bob', 'AKIAB', daysAgo(10), daysAgo(70)),
      NOW,
    );
    expect(decision.action).toBe('deactivate');
    expect(decision).toMatchObject({
      reason: 'last used 70.0d ago, exceeds 60.0d',
    });
  });

  test('treats a never-used key as active since creation', () => {
    const fresh = evaluateCredential(makeKey('bob', 'AKIAB', daysAgo(20)), NOW);
    expect(fresh).toMatchObject({
      action: 'skip',
      reason: 'key age 20.0d, never used, created 20.0d ago',
    });
  });

  test('rotates a key older than 30 days', () => {
    const decision = evaluateCredential(
      makeKey('alice', 'AKIAA', daysAgo(31), daysAgo(1)),
      NOW,
    );
    expect(decision).toMatchObject({
      action: 'rotate',
      reason: 'key age 31.0d exceeds 30.0d',
    });
  });

  test('rotation takes precedence over inactivity', () => {
    const decision = evaluateCredential(
      makeKey('alice', 'AKIAA', daysAgo(90), daysAgo(80)),
      NOW,
    );
    expect(decision.action).toBe('rotate');
  });

  test('never targets an inactive key', () => {
    const decision = evaluateCredential(
      makeKey('alice', 'AKIAA', daysAgo(400), null, 'Inactive'),
      NOW,
    );
    expect(decision).toMatchObject({
      action: 'skip',
      reason: 'key is already inactive',
    });
  });

  test('skips a recent, recently used key', () => {
    const decision = evaluateCredential(
      makeKey('alice', 'AKIAA', daysAgo(5), daysAgo(1)),
      NOW,
    );
    expect(decision).toMatchObject({
      action: 'skip',
      reason: 'key age 5.0d, last used 1.0d ago',
    });
  });
});

describe('planPrincipal', () => {
  test('rotates when the user has a free key slot', () => {
    const decisions = planPrincipal(
      { userName: 'alice', credentials: [makeKey('alice', 'AKIAOLD', daysAgo(35))] },
      NOW,
    );
    expect(decisions.map((d) => d.action)).toEqual(['rotate']);
  });

  test('blocks rotation when two active keys exist and the other is newer', () => {
    const decisions = planPrincipal(
      {
        userName: 'alice',
        credentials: [
          makeKey('alice', 'AKIAOLD', daysAgo(35), daysAgo(1)),
          makeKey('alice', 'AKIANEWER', daysAgo(5), daysAgo(1)),
        ],
      },
      NOW,
    );

    expect(decisions.map((d) => d.action)).toEqual(['blocked', 'skip']);
    const blocked = decisions[0];
    if (blocked.action !== 'blocked') throw new Error('expected blocked');
    expect(blocked.error).toBeInstanceOf(ConstraintError);
    expect(blocked.error.message).toBe(
      'Cannot rotate AKIAOLD: alice already holds 2 of 2 access keys; ' +
        'newer active key AKIANEWER exists, retire AKIAOLD manually',
    );
  });

  test('an inactive key still occupies a slot', () => {
    const decisions = planPrincipal(
      {
        userName: 'carol',
        credentials: [
          makeKey('carol', 'AKIAC1', daysAgo(200), null, 'Inactive'),
          makeKey('carol', 'AKIAC2', daysAgo(40), daysAgo(2)),
        ],
      },
      NOW,
    );
    expect(decisions.map((d) => d.action)).toEqual(['skip', 'blocked']);
    const blocked = decisions[1];
    if (blocked.action !== 'blocked') throw new Error('expected blocked');
    expect(blocked.error.message).toBe(
      'Cannot rotate AKIAC2: carol already holds 2 of 2 access keys',
    );
  });

  test('a blocked old key is not deactivated for inactivity either', () => {
    const decisions = planPrincipal(
      {
        userName: 'dave',
        credentials: [
          makeKey('dave', 'AKIAD1', daysAgo(100), daysAgo(90)),
          makeKey('dave', 'AKIAD2', daysAgo(3)),
        ],
      },
      NOW,
    );
    expect(decisions[0].action).toBe('blocked');
  });
});
