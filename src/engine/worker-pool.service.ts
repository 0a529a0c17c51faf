import { Injectable, Logger } from '@nestjs/common';
import { OrchestratorConfigService } from '../config/orchestrator-config.service';

export interface WorkerPoolStats {
  concurrency: number;
  active: number;
  queued: number;
  completed: number;
  failed: number;
}

/**
 * Bounded pool of task slots. Jobs start in submission order as slots free
 * up; callers get a promise per job and are never blocked by the queue.
 */
@Injectable()
export class WorkerPoolService {
  private readonly logger = new Logger(WorkerPoolService.name);
  private readonly concurrency: number;
  private readonly queue: Array<() => Promise<void>> = [];
  private active = 0;
  private completed = 0;
  private failed = 0;

  constructor(config: OrchestratorConfigService) {
    this.concurrency = Math.max(1, Math.floor(config.workerConcurrency));
    this.logger.log(`👷 Worker pool ready with ${this.concurrency} slots`);
  }

  submit<T>(job: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() =>
        Promise.resolve()
          .then(job)
          .then(
            (value) => {
              this.completed++;
              resolve(value);
            },
            (error: unknown) => {
              this.failed++;
              reject(error);
            },
          ),
      );
      if (this.active >= this.concurrency) {
        this.logger.debug(`⏳ All ${this.concurrency} slots busy, ${this.queue.length} job(s) queued`);
      }
      this.drain();
    });
  }

  getStats(): WorkerPoolStats {
    return {
      concurrency: this.concurrency,
      active: this.active,
      queued: this.queue.length,
      completed: this.completed,
      failed: this.failed,
    };
  }

  private drain(): void {
    while (this.active < this.concurrency) {
      const next = this.queue.shift();
      if (!next) return;
      this.active++;
      void next().finally(() => {
        this.active--;
        this.drain();
      });
    }
  }
}
