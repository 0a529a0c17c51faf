import { Injectable, Logger } from '@nestjs/common';
import type { Alert } from './monitoring.types';

/**
 * Delivery channel for alerts (dashboard, chat, paging). The monitor only
 * hands alerts over; delivery guarantees belong to the implementation.
 */
export abstract class AlertNotifier {
  abstract notify(alert: Alert): Promise<void>;
}

@Injectable()
export class LoggingAlertNotifier extends AlertNotifier {
  private readonly logger = new Logger('AlertNotifier');

  async notify(alert: Alert): Promise<void> {
    const message = `🚨 [${alert.severity.toUpperCase()}] ${alert.metricId} observed ${alert.observed} vs expected ${alert.expected.toFixed(4)} (z=${formatZ(alert.zScore)}, run ${alert.runId})`;
    if (alert.severity === 'critical') {
      this.logger.error(message);
    } else {
      this.logger.warn(message);
    }
  }
}

function formatZ(z: number): string {
  return Number.isFinite(z) ? z.toFixed(2) : String(z);
}
