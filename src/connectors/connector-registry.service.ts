import { Injectable, Logger } from '@nestjs/common';
import { ConnectorUnavailableError } from '../common/errors';
import type { BatchRecord } from '../validation/validation.types';
import { SourceConnector } from './source-connector.interface';

@Injectable()
export class ConnectorRegistry {
  private readonly logger = new Logger(ConnectorRegistry.name);
  private readonly connectors = new Map<string, SourceConnector>();

  register(connector: SourceConnector): void {
    for (const sourceId of connector.sourceIds) {
      this.connectors.set(sourceId, connector);
    }
    this.logger.log(
      `🔌 Registered connector for sources: ${connector.sourceIds.join(', ')}`,
    );
  }

  getSourceIds(): string[] {
    return Array.from(this.connectors.keys());
  }

  async fetch(sourceId: string, since: Date): Promise<BatchRecord[]> {
    const connector = this.connectors.get(sourceId);
    if (!connector) {
      throw new ConnectorUnavailableError(
        sourceId,
        `No connector registered for source ${sourceId}`,
      );
    }
    return connector.fetch(sourceId, since);
  }
}
