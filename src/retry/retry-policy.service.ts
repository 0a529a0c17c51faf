import { Injectable } from '@nestjs/common';
import { PipelineError } from '../common/errors';
import { OrchestratorConfigService } from '../config/orchestrator-config.service';
import { RetryOverride, TaskKind } from '../pipelines/pipeline.types';

export type RetryDecision =
  | { type: 'retry'; delayMs: number }
  | { type: 'abandon'; reason: 'permanent' | 'attempts_exhausted' | 'wait_exhausted' };

export interface RetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  maxTotalWaitMs: number;
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EAI_AGAIN',
]);
const TRANSIENT_HTTP_STATUSES = new Set([429, 503]);

/**
 * Decides retry vs. abandon after a failed task attempt. Pure: no timers,
 * no state; the caller realises the returned delay.
 */
@Injectable()
export class RetryPolicyService {
  private readonly kindOverrides = new Map<TaskKind, RetryOverride>([
    // Connector outages tend to last longer than model hiccups.
    ['ingestion', { baseDelayMs: 5000 }],
  ]);

  constructor(private readonly config: OrchestratorConfigService) {}

  nextAction(
    taskKind: TaskKind,
    attemptCount: number,
    error: unknown,
    override?: RetryOverride,
  ): RetryDecision {
    if (!isTransient(error)) {
      return { type: 'abandon', reason: 'permanent' };
    }

    const settings = this.settingsFor(taskKind, override);
    if (attemptCount >= settings.maxAttempts) {
      return { type: 'abandon', reason: 'attempts_exhausted' };
    }

    const delayMs = backoffDelay(settings, attemptCount);
    if (totalWait(settings, attemptCount) > settings.maxTotalWaitMs) {
      return { type: 'abandon', reason: 'wait_exhausted' };
    }
    return { type: 'retry', delayMs };
  }

  settingsFor(taskKind: TaskKind, override?: RetryOverride): RetrySettings {
    const settings: RetrySettings = {
      maxAttempts: this.config.retryMaxAttempts,
      baseDelayMs: this.config.retryBaseDelayMs,
      maxDelayMs: this.config.retryMaxDelayMs,
      maxTotalWaitMs: this.config.retryMaxTotalWaitMs,
    };
    for (const layer of [this.kindOverrides.get(taskKind), override]) {
      settings.maxAttempts = layer?.maxAttempts ?? settings.maxAttempts;
      settings.baseDelayMs = layer?.baseDelayMs ?? settings.baseDelayMs;
      settings.maxDelayMs = layer?.maxDelayMs ?? settings.maxDelayMs;
      settings.maxTotalWaitMs = layer?.maxTotalWaitMs ?? settings.maxTotalWaitMs;
    }
    return settings;
  }
}

export function isTransient(error: unknown): boolean {
  if (error instanceof PipelineError) {
    return error.transient;
  }
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('code' in error && typeof error.code === 'string') {
    return TRANSIENT_NETWORK_CODES.has(error.code);
  }
  if ('status' in error && typeof error.status === 'number') {
    return TRANSIENT_HTTP_STATUSES.has(error.status);
  }
  return false;
}

/** Delay before the attempt following failed attempt number `attempt` (1-based). */
export function backoffDelay(settings: RetrySettings, attempt: number): number {
  return Math.min(
    settings.baseDelayMs * Math.pow(2, attempt - 1),
    settings.maxDelayMs,
  );
}

function totalWait(settings: RetrySettings, attempts: number): number {
  let total = 0;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    total += backoffDelay(settings, attempt);
  }
  return total;
}
