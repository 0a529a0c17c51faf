import type { BatchRecord } from '../validation/validation.types';

/**
 * External delivery-platform adapter. Implementations throw
 * `ConnectorUnavailableError` for outages the ingestion task may retry.
 */
export interface SourceConnector {
  /** Source identifiers this connector serves. */
  readonly sourceIds: readonly string[];
  fetch(sourceId: string, since: Date): Promise<BatchRecord[]>;
}
