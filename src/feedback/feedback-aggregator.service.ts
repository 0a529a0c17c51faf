import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { Subscription } from 'rxjs';
import { validate as isUuid, v4 as uuidv4 } from 'uuid';
import { Clock, calendarDate } from '../common/clock';
import { ConflictError, InputError, describeError } from '../common/errors';
import { OrchestratorConfigService } from '../config/orchestrator-config.service';
import { PersistenceStore } from '../database/persistence.store';
import { WorkflowEngineService } from '../engine/workflow-engine.service';
import { ModelMonitorService } from '../monitoring/model-monitor.service';
import { SubmitFeedbackDto } from './dto/submit-feedback.dto';
import { FeedbackRecord, RetrainingDecision } from './feedback.types';

export interface RetrainingOutcome extends RetrainingDecision {
  /** Run enqueued for the decision, or null when none was needed or one already exists. */
  runId: string | null;
}

@Injectable()
export class FeedbackAggregatorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(FeedbackAggregatorService.name);
  private subscription?: Subscription;
  private signalsSinceEvaluation = 0;
  private evaluation?: Promise<RetrainingOutcome[]>;

  constructor(
    private readonly store: PersistenceStore,
    private readonly engine: WorkflowEngineService,
    private readonly monitor: ModelMonitorService,
    private readonly config: OrchestratorConfigService,
    private readonly clock: Clock,
  ) {}

  onModuleInit() {
    this.subscription = this.monitor.alerts$.subscribe(() => this.countSignal());
  }

  onModuleDestroy() {
    this.subscription?.unsubscribe();
  }

  // ============================================================================
  // FEEDBACK INGRESS
  // ============================================================================

  async submit(dto: SubmitFeedbackDto): Promise<FeedbackRecord> {
    if (!Number.isInteger(dto.rating) || dto.rating < 1 || dto.rating > 5) {
      throw new InputError(`Rating must be an integer from 1 to 5, got ${dto.rating}`);
    }
    if (dto.runId !== undefined && !isUuid(dto.runId)) {
      throw new InputError(`Run id must be a UUID, got ${dto.runId}`);
    }
    const record: FeedbackRecord = {
      id: uuidv4(),
      modelId: dto.modelId,
      runId: dto.runId,
      taskId: dto.taskId,
      rating: dto.rating,
      correction: dto.correction,
      submittedAt: this.clock.now(),
    };
    await this.store.appendFeedback(record);
    this.logger.debug(`💬 Feedback ${record.id} for ${record.modelId}: ${record.rating}/5`);

    this.countSignal();
    return record;
  }

  // ============================================================================
  // RETRAINING DECISION
  // ============================================================================

  @Cron(CronExpression.EVERY_10_MINUTES, { name: 'feedback-evaluation' })
  async evaluatePeriodically(): Promise<void> {
    try {
      await this.evaluate();
    } catch (error) {
      this.logger.error('❌ Periodic retraining evaluation failed', error);
    }
  }

  /**
   * Evaluate every model with feedback or alerts inside the window. Concurrent
   * callers share one evaluation.
   */
  evaluate(): Promise<RetrainingOutcome[]> {
    if (!this.evaluation) {
      this.signalsSinceEvaluation = 0;
      this.evaluation = this.runEvaluation().finally(() => {
        this.evaluation = undefined;
      });
    }
    return this.evaluation;
  }

  private async runEvaluation(): Promise<RetrainingOutcome[]> {
    const now = this.clock.now();
    const since = new Date(now.getTime() - this.config.feedbackWindowMs);
    const [feedback, criticalAlerts] = await Promise.all([
      this.store.listFeedback({ since }),
      this.store.listAlerts({ severity: 'critical', since }),
    ]);

    const modelIds = new Set([
      ...feedback.map((record) => record.modelId),
      ...criticalAlerts.map((alert) => alert.modelId),
    ]);

    const outcomes: RetrainingOutcome[] = [];
    for (const modelId of modelIds) {
      const ratings = feedback.filter((record) => record.modelId === modelId);
      const negatives = ratings.filter(
        (record) => record.rating <= this.config.feedbackNegativeRating,
      ).length;
      const negativeRatio = ratings.length > 0 ? negatives / ratings.length : 0;
      const critical = criticalAlerts.filter((alert) => alert.modelId === modelId).length;

      const decision: RetrainingDecision = {
        modelId,
        trigger:
          (ratings.length >= this.config.feedbackMinRecords &&
            negativeRatio > this.config.feedbackNegativeRatio) ||
          critical > 0,
        negativeRatio,
        feedbackCount: ratings.length,
        criticalAlerts: critical,
      };

      let runId: string | null = null;
      if (decision.trigger) {
        try {
          runId = await this.enqueueRetraining(decision, now);
        } catch (error) {
          this.logger.error(
            `❌ Could not enqueue retraining for ${modelId}: ${describeError(error)}`,
          );
        }
      }
      outcomes.push({ ...decision, runId });
    }
    return outcomes;
  }

  /**
   * One retraining run per model per day: a key that already has a run, in
   * any state, is left alone.
   */
  private async enqueueRetraining(
    decision: RetrainingDecision,
    now: Date,
  ): Promise<string | null> {
    const pipelineId = this.config.retrainingPipelineId;
    const logicalKey = `retrain:${decision.modelId}:${calendarDate(now, this.config.schedulerTimezone)}`;

    const existing = await this.store.findRunsByKey(pipelineId, logicalKey);
    if (existing.length > 0) {
      this.logger.debug(`🔂 Retraining ${logicalKey} already has run ${existing[0].id}`);
      return null;
    }

    try {
      const runId = await this.engine.submit(pipelineId, logicalKey, {
        entryState: 'retraining-queued',
        params: {
          modelId: decision.modelId,
          reason: decision.criticalAlerts > 0 ? 'critical_alert' : 'negative_feedback',
          negativeRatio: decision.negativeRatio,
          criticalAlerts: decision.criticalAlerts,
        },
      });
      this.logger.log(
        `🧠 Enqueued retraining ${logicalKey} as run ${runId} (negative ratio ${decision.negativeRatio.toFixed(2)}, ${decision.criticalAlerts} critical alert(s))`,
      );
      return runId;
    } catch (error) {
      if (error instanceof ConflictError) {
        return null;
      }
      throw error;
    }
  }

  private countSignal(): void {
    this.signalsSinceEvaluation++;
    if (this.signalsSinceEvaluation < this.config.feedbackEvaluateEvery) {
      return;
    }
    this.evaluate().catch((error: unknown) => {
      this.logger.error('❌ Retraining evaluation failed', error);
    });
  }
}
