import {
  ExecutionError,
  InputError,
  TaskTimeoutError,
} from '../common/errors';
import { testConfig } from '../../test/utils/test-config';
import { RetryPolicyService, isTransient } from './retry-policy.service';

describe('RetryPolicyService', () => {
  const transient = new ExecutionError('model service timed out');

  describe('nextAction', () => {
    it('doubles the delay per attempt until attempts run out', () => {
      const policy = new RetryPolicyService(testConfig());

      expect([1, 2, 3, 4].map((n) => policy.nextAction('forecast', n, transient))).toEqual([
        { type: 'retry', delayMs: 1000 },
        { type: 'retry', delayMs: 2000 },
        { type: 'retry', delayMs: 4000 },
        { type: 'retry', delayMs: 8000 },
      ]);
      expect(policy.nextAction('forecast', 5, transient)).toEqual({
        type: 'abandon',
        reason: 'attempts_exhausted',
      });
    });

    it('abandons permanent failures on the first attempt', () => {
      const policy = new RetryPolicyService(testConfig());

      expect(policy.nextAction('forecast', 1, new InputError('no batch'))).toEqual({
        type: 'abandon',
        reason: 'permanent',
      });
      expect(
        policy.nextAction('nlp_query', 1, new ExecutionError('bad prompt', { retryable: false })),
      ).toEqual({ type: 'abandon', reason: 'permanent' });
    });

    it('waits longer between ingestion attempts', () => {
      const policy = new RetryPolicyService(testConfig());

      expect(policy.nextAction('ingestion', 1, transient)).toEqual({
        type: 'retry',
        delayMs: 5000,
      });
      expect(policy.nextAction('ingestion', 2, transient)).toEqual({
        type: 'retry',
        delayMs: 10000,
      });
    });

    it('caps a single delay at the maximum', () => {
      const policy = new RetryPolicyService(testConfig({ RETRY_MAX_DELAY_MS: 3000 }));

      expect(policy.nextAction('forecast', 3, transient)).toEqual({
        type: 'retry',
        delayMs: 3000,
      });
      expect(policy.nextAction('forecast', 4, transient)).toEqual({
        type: 'retry',
        delayMs: 3000,
      });
    });

    it('abandons once the summed waits would exceed the total budget', () => {
      const policy = new RetryPolicyService(testConfig({ RETRY_MAX_TOTAL_WAIT_MS: 2500 }));

      expect(policy.nextAction('forecast', 1, transient)).toEqual({
        type: 'retry',
        delayMs: 1000,
      });
      expect(policy.nextAction('forecast', 2, transient)).toEqual({
        type: 'abandon',
        reason: 'wait_exhausted',
      });
    });

    it('applies task overrides over kind and global settings', () => {
      const policy = new RetryPolicyService(testConfig());

      expect(policy.nextAction('forecast', 2, transient, { maxAttempts: 2 })).toEqual({
        type: 'abandon',
        reason: 'attempts_exhausted',
      });
      expect(policy.settingsFor('ingestion', { baseDelayMs: 250 })).toEqual({
        maxAttempts: 5,
        baseDelayMs: 250,
        maxDelayMs: 60000,
        maxTotalWaitMs: 300000,
      });
    });
  });

  describe('isTransient', () => {
    it('trusts the flag on pipeline errors', () => {
      expect(isTransient(new TaskTimeoutError('forecast', 50))).toBe(true);
      expect(isTransient(new ExecutionError('flaky'))).toBe(true);
      expect(isTransient(new InputError('bad'))).toBe(false);
    });

    it('recognises network codes and throttling statuses', () => {
      expect(isTransient({ code: 'ECONNRESET' })).toBe(true);
      expect(isTransient({ code: 'ENOENT' })).toBe(false);
      expect(isTransient({ status: 503 })).toBe(true);
      expect(isTransient({ status: 429 })).toBe(true);
      expect(isTransient({ status: 404 })).toBe(false);
    });

    it('treats anything else as permanent', () => {
      expect(isTransient(new Error('unknown'))).toBe(false);
      expect(isTransient('timeout')).toBe(false);
      expect(isTransient(null)).toBe(false);
    });
  });
});
