import { Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ConnectorUnavailableError, InputError } from '../common/errors';
import type { BatchRecord } from '../validation/validation.types';
import { SourceConnector } from './source-connector.interface';

/**
 * Reads `<dataDir>/<sourceId>.json`, a JSON array of records exported by a
 * delivery platform. Records with an `observedAt` older than `since` are
 * dropped; records without one are kept.
 */
export class JsonFileSourceConnector implements SourceConnector {
  private readonly logger = new Logger(JsonFileSourceConnector.name);

  constructor(
    private readonly dataDir: string,
    readonly sourceIds: readonly string[],
  ) {}

  async fetch(sourceId: string, since: Date): Promise<BatchRecord[]> {
    const file = path.join(this.dataDir, `${sourceId}.json`);

    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (error) {
      throw new ConnectorUnavailableError(
        sourceId,
        `Cannot read export for ${sourceId} at ${file}`,
        { cause: error },
      );
    }

    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) {
      throw new InputError(`Export for ${sourceId} is not a JSON array`);
    }

    const records = parsed.filter(isRecord).filter((record) => {
      const observedAt = record.observedAt;
      return (
        typeof observedAt !== 'string' ||
        new Date(observedAt).getTime() >= since.getTime()
      );
    });

    this.logger.debug(
      `📥 Read ${records.length}/${parsed.length} records for ${sourceId}`,
    );
    return records;
  }
}

function isRecord(value: unknown): value is BatchRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
