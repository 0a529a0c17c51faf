import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { CronJob } from 'cron';
import { Subscription } from 'rxjs';
import { Clock, calendarDate } from '../common/clock';
import { ConflictError, describeError } from '../common/errors';
import { OrchestratorConfigService } from '../config/orchestrator-config.service';
import { WorkflowEngineService } from '../engine/workflow-engine.service';
import { PipelineDefinition } from '../pipelines/pipeline.types';
import { PipelinesService } from '../pipelines/pipelines.service';

export interface ScheduledTrigger {
  pipelineId: string;
  schedule: string;
  timezone: string;
  nextRun: Date;
}

const JOB_PREFIX = 'pipeline-trigger:';

/**
 * Time-based trigger: one cron job per scheduled pipeline, held in the Nest
 * scheduler registry as `pipeline-trigger:<pipelineId>`. Each tick submits a
 * run keyed by the current calendar date in the scheduler timezone.
 */
@Injectable()
export class TriggerSchedulerService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(TriggerSchedulerService.name);
  /** Cron expression per scheduled pipeline id. */
  private readonly schedules = new Map<string, string>();
  private subscription?: Subscription;

  constructor(
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly pipelines: PipelinesService,
    private readonly engine: WorkflowEngineService,
    private readonly config: OrchestratorConfigService,
    private readonly clock: Clock,
  ) {}

  onApplicationBootstrap() {
    if (!this.config.schedulerEnabled) {
      this.logger.log('⏸️ Scheduler disabled, pipelines run on manual triggers only');
      return;
    }
    for (const definition of this.pipelines.scheduled()) {
      this.schedule(definition);
    }
    // Definitions registered at run time get their trigger too.
    this.subscription = this.pipelines.registered$.subscribe((definition) =>
      this.schedule(definition),
    );
  }

  onModuleDestroy() {
    this.subscription?.unsubscribe();
    for (const pipelineId of Array.from(this.schedules.keys())) {
      this.unschedule(pipelineId);
    }
  }

  schedule(definition: PipelineDefinition): void {
    if (!definition.schedule) return;
    this.unschedule(definition.id);

    const timezone = this.config.schedulerTimezone;
    const job = new CronJob(
      definition.schedule,
      () => {
        void this.trigger(definition.id);
      },
      null,
      false,
      timezone,
    );
    this.schedulerRegistry.addCronJob(`${JOB_PREFIX}${definition.id}`, job);
    job.start();
    this.schedules.set(definition.id, definition.schedule);
    this.logger.log(
      `📅 Scheduled ${definition.id} at "${definition.schedule}" (${timezone}), next run ${job.nextDate().toJSDate().toISOString()}`,
    );
  }

  unschedule(pipelineId: string): boolean {
    const name = `${JOB_PREFIX}${pipelineId}`;
    if (!this.schedulerRegistry.doesExist('cron', name)) {
      return this.schedules.delete(pipelineId);
    }
    this.schedulerRegistry.deleteCronJob(name);
    this.schedules.delete(pipelineId);
    this.logger.debug(`⏹️ Unscheduled ${pipelineId}`);
    return true;
  }

  /**
   * Submit the run for today's key. A run already active for the key is
   * reported and dropped.
   */
  async trigger(pipelineId: string): Promise<string | null> {
    const logicalKey = calendarDate(this.clock.now(), this.config.schedulerTimezone);
    try {
      const runId = await this.engine.submit(pipelineId, logicalKey);
      this.logger.log(`⏰ Scheduled trigger of ${pipelineId}/${logicalKey} started run ${runId}`);
      return runId;
    } catch (error) {
      if (error instanceof ConflictError) {
        this.logger.warn(`⏭️ ${error.message}; scheduled trigger dropped`);
      } else {
        this.logger.error(
          `❌ Scheduled trigger of ${pipelineId}/${logicalKey} failed: ${describeError(error)}`,
        );
      }
      return null;
    }
  }

  getTriggers(): ScheduledTrigger[] {
    return Array.from(this.schedules, ([pipelineId, schedule]) => ({
      pipelineId,
      schedule,
      timezone: this.config.schedulerTimezone,
      nextRun: this.schedulerRegistry
        .getCronJob(`${JOB_PREFIX}${pipelineId}`)
        .nextDate()
        .toJSDate(),
    }));
  }
}
