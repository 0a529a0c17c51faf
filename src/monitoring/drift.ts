import type { AlertSeverity } from './monitoring.types';

export interface DriftThresholds {
  warningZ: number;
  criticalZ: number;
}

export interface WindowStats {
  mean: number;
  stddev: number;
}

/** Mean and population standard deviation. */
export function windowStats(values: readonly number[]): WindowStats {
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const variance =
    values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  return { mean, stddev: Math.sqrt(variance) };
}

/**
 * Standard score of `value` against the window, dividing by at least
 * `minStddev`. When both are zero an equal value scores 0 and any other value
 * an infinite deviation.
 */
export function zScore(value: number, stats: WindowStats, minStddev = 0): number {
  const stddev = Math.max(stats.stddev, minStddev);
  if (stddev === 0) {
    if (value === stats.mean) return 0;
    return value > stats.mean ? Infinity : -Infinity;
  }
  return (value - stats.mean) / stddev;
}

export function classify(
  z: number,
  thresholds: DriftThresholds,
): AlertSeverity | null {
  const magnitude = Math.abs(z);
  if (magnitude >= thresholds.criticalZ) return 'critical';
  if (magnitude >= thresholds.warningZ) return 'warning';
  return null;
}
