import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { Clock } from '../common/clock';
import { InputError } from '../common/errors';
import { ConnectorRegistry } from '../connectors/connector-registry.service';
import { PersistenceStore } from '../database/persistence.store';
import type { TaskConfig } from '../pipelines/pipeline.types';
import type { BatchRecord, DataBatch } from '../validation/validation.types';
import { throwIfAborted } from './record-fields';
import {
  TaskContext,
  TaskExecutor,
  TaskResult,
} from './task-executor.interface';

const DEFAULT_SINCE_HOURS = 24;

export interface IngestionOutput {
  batchId: string;
  recordCount: number;
  sourceIds: string[];
}

@Injectable()
export class IngestionExecutor implements TaskExecutor {
  readonly kind = 'ingestion';
  private readonly logger = new Logger(IngestionExecutor.name);

  constructor(
    private readonly connectors: ConnectorRegistry,
    private readonly store: PersistenceStore,
    private readonly clock: Clock,
  ) {}

  async execute(
    _batch: DataBatch | undefined,
    config: TaskConfig,
    context: TaskContext,
  ): Promise<TaskResult<IngestionOutput>> {
    const sourceIds = config.sources ?? [];
    if (sourceIds.length === 0) {
      throw new InputError(`Ingestion task ${context.taskId} has no sources`);
    }

    const now = this.clock.now();
    const sinceHours = config.sinceHours ?? DEFAULT_SINCE_HOURS;
    const since = new Date(now.getTime() - sinceHours * 3600 * 1000);

    const records: BatchRecord[] = [];
    for (const sourceId of sourceIds) {
      throwIfAborted(context);
      const fetched = await this.connectors.fetch(sourceId, since);
      for (const record of fetched) {
        records.push(
          record.sourceId === undefined ? { ...record, sourceId } : record,
        );
      }
      this.logger.debug(`📥 ${sourceId}: ${fetched.length} records`);
    }
    throwIfAborted(context);

    const batch: DataBatch = Object.freeze({
      id: uuidv4(),
      logicalKey: context.logicalKey,
      records: Object.freeze(records),
      provenance: Object.freeze({
        sourceIds: [...sourceIds],
        ingestedAt: now,
        recordCount: records.length,
      }),
    });
    const batchRef = await this.store.putBatch(context.runId, batch);

    this.logger.log(
      `📦 Ingested ${records.length} records for ${context.logicalKey} from ${sourceIds.length} source(s)`,
    );

    return {
      output: { batchId: batch.id, recordCount: records.length, sourceIds },
      metrics: { record_count: records.length },
      batchRef,
    };
  }
}
