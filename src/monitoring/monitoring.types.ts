export type AlertSeverity = 'warning' | 'critical';

export interface ModelMetricSnapshot {
  id: string;
  /** `<modelId>:<metricName>` */
  metricId: string;
  modelId: string;
  metricName: string;
  runId: string;
  taskId: string;
  value: number;
  recordedAt: Date;
}

export interface Alert {
  id: string;
  severity: AlertSeverity;
  metricId: string;
  modelId: string;
  runId: string;
  observed: number;
  /** Mean of the rolling window the observation was compared against. */
  expected: number;
  zScore: number;
  createdAt: Date;
}

export interface AlertQuery {
  modelId?: string;
  severity?: AlertSeverity;
  since?: Date;
}
