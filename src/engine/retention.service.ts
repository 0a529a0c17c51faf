import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { Clock } from '../common/clock';
import { OrchestratorConfigService } from '../config/orchestrator-config.service';
import { PersistenceStore } from '../database/persistence.store';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Purges terminal runs, with their task instances, batches and outputs, once
 * they are older than the retention period.
 */
@Injectable()
export class RetentionService {
  private readonly logger = new Logger(RetentionService.name);

  constructor(
    private readonly store: PersistenceStore,
    private readonly config: OrchestratorConfigService,
    private readonly clock: Clock,
  ) {}

  @Cron(CronExpression.EVERY_DAY_AT_3AM, { name: 'run-retention' })
  async purgeExpiredRuns(): Promise<number> {
    const cutoff = new Date(
      this.clock.now().getTime() - this.config.runRetentionDays * DAY_MS,
    );
    try {
      const deleted = await this.store.deleteRunsFinishedBefore(cutoff);
      if (deleted > 0) {
        this.logger.log(
          `🧹 Purged ${deleted} run(s) finished before ${cutoff.toISOString()}`,
        );
      }
      return deleted;
    } catch (error) {
      this.logger.error('❌ Run retention purge failed', error);
      return 0;
    }
  }
}
