import { ConnectorUnavailableError } from '../common/errors';
import type { BatchRecord } from '../validation/validation.types';
import { SourceConnector } from './source-connector.interface';

/**
 * Connector over records held in memory, for local runs and tests.
 * `failNext` simulates outages.
 */
export class InMemorySourceConnector implements SourceConnector {
  private readonly records = new Map<string, BatchRecord[]>();
  private readonly pendingFailures = new Map<string, number>();
  readonly fetchCalls: Array<{ sourceId: string; since: Date }> = [];

  constructor(sources: Record<string, BatchRecord[]> = {}) {
    for (const [sourceId, records] of Object.entries(sources)) {
      this.records.set(sourceId, records);
    }
  }

  get sourceIds(): string[] {
    return Array.from(this.records.keys());
  }

  setRecords(sourceId: string, records: BatchRecord[]): void {
    this.records.set(sourceId, records);
  }

  failNext(sourceId: string, times = 1): void {
    this.pendingFailures.set(sourceId, times);
  }

  async fetch(sourceId: string, since: Date): Promise<BatchRecord[]> {
    this.fetchCalls.push({ sourceId, since });

    const failures = this.pendingFailures.get(sourceId) ?? 0;
    if (failures > 0) {
      this.pendingFailures.set(sourceId, failures - 1);
      throw new ConnectorUnavailableError(sourceId);
    }

    const records = this.records.get(sourceId);
    if (!records) {
      throw new ConnectorUnavailableError(
        sourceId,
        `Unknown source: ${sourceId}`,
      );
    }
    return [...records];
  }
}
