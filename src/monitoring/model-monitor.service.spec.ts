import { firstValueFrom } from 'rxjs';
import { InMemoryStore } from '../database/in-memory.store';
import { EngineEventsService } from '../engine/engine-events.service';
import { FakeClock } from '../../test/utils/fake-clock';
import { testConfig } from '../../test/utils/test-config';
import { AlertNotifier } from './alert-notifier';
import { ModelMonitorService } from './model-monitor.service';
import { Alert } from './monitoring.types';

class RecordingNotifier extends AlertNotifier {
  readonly alerts: Alert[] = [];
  failing = false;

  async notify(alert: Alert): Promise<void> {
    if (this.failing) {
      throw new Error('pager offline');
    }
    this.alerts.push(alert);
  }
}

const BASELINE = [10, 12, 10, 12, 10, 12];

describe('ModelMonitorService', () => {
  let store: InMemoryStore;
  let events: EngineEventsService;
  let notifier: RecordingNotifier;
  let clock: FakeClock;
  let monitor: ModelMonitorService;

  function createMonitor(values: Record<string, number> = {}): ModelMonitorService {
    return new ModelMonitorService(events, store, notifier, testConfig(values), clock);
  }

  async function feed(values: number[], metricName = 'mape'): Promise<Array<Alert | null>> {
    const alerts: Array<Alert | null> = [];
    for (const [index, value] of values.entries()) {
      alerts.push(
        await monitor.record({
          modelId: 'demand',
          metricName,
          runId: `run-${index}`,
          taskId: 'forecast',
          value,
        }),
      );
    }
    return alerts;
  }

  beforeEach(() => {
    store = new InMemoryStore();
    events = new EngineEventsService();
    notifier = new RecordingNotifier();
    clock = new FakeClock();
    monitor = createMonitor();
  });

  it('stays quiet until the window holds enough samples', async () => {
    expect(await feed([10, 30, 10, 30, 100])).toEqual([null, null, null, null, null]);
    expect(await store.getMetricSnapshots('demand:mape', 10)).toHaveLength(5);
  });

  it('raises a critical alert for a 4-sigma deviation', async () => {
    const alerts = await feed([...BASELINE, 15]);

    expect(alerts.slice(0, 6)).toEqual([null, null, null, null, null, null]);
    expect(alerts[6]).toEqual({
      id: expect.any(String),
      severity: 'critical',
      metricId: 'demand:mape',
      modelId: 'demand',
      runId: 'run-6',
      observed: 15,
      expected: 11,
      zScore: 4,
      createdAt: new Date('2024-05-01T06:00:00.000Z'),
    });
    expect(notifier.alerts).toEqual([alerts[6]]);
    expect(await store.listAlerts({ modelId: 'demand' })).toEqual([alerts[6]]);
  });

  it('alerts once per sustained breach until the cooldown passes', async () => {
    const alerts = await feed([...BASELINE, 15, 15]);
    expect(alerts[6]?.severity).toBe('critical');
    expect(alerts[7]).toBeNull();

    clock.advance(21_600_000);
    const [late] = await feed([40]);

    expect(late?.severity).toBe('critical');
    expect(late?.expected).toBe(12);
    expect(notifier.alerts).toHaveLength(2);
  });

  it('alerts again after the metric returns within bounds', async () => {
    const alerts = await feed([...BASELINE, 15, 11, 20]);

    expect(alerts[6]?.severity).toBe('critical');
    expect(alerts[7]).toBeNull();
    expect(alerts[8]?.severity).toBe('critical');
    expect(alerts[8]?.zScore).toBeCloseTo(5.376, 2);
  });

  it('alerts again when a warning escalates to critical', async () => {
    const alerts = await feed([...BASELINE, 13.5, 20]);

    expect(alerts[6]?.severity).toBe('warning');
    expect(alerts[6]?.zScore).toBe(2.5);
    expect(alerts[7]?.severity).toBe('critical');
  });

  it('ignores a negligible move on a flat window', async () => {
    const alerts = await feed([5, 5, 5, 5, 5, 5, 5.02]);

    expect(alerts).toEqual([null, null, null, null, null, null, null]);
  });

  it('scores a flat window against a stddev floor relative to its mean', async () => {
    const alerts = await feed([5, 5, 5, 5, 5, 5, 6]);

    expect(alerts[6]?.severity).toBe('critical');
    expect(alerts[6]?.zScore).toBeCloseTo(20, 6);
  });

  it('treats any change on a flat window of zeros as critical', async () => {
    const alerts = await feed([0, 0, 0, 0, 0, 0, 0.5], 'error_rate');

    expect(alerts[6]?.zScore).toBe(Infinity);
    expect(alerts[6]?.severity).toBe('critical');
  });

  it('takes the stddev floor from configuration', async () => {
    monitor = createMonitor({ MONITOR_MIN_STDDEV_RATIO: 0 });

    const alerts = await feed([5, 5, 5, 5, 5, 5, 5.02]);

    expect(alerts[6]?.zScore).toBe(Infinity);
  });

  it('compares against the most recent window only', async () => {
    monitor = createMonitor({ MONITOR_WINDOW_SIZE: 5 });

    const alerts = await feed([100, 10, 12, 10, 12, 10, 15]);

    expect(alerts[5]).toBeNull();
    expect(alerts[6]?.severity).toBe('critical');
    expect(alerts[6]?.expected).toBeCloseTo(10.8, 10);
  });

  it('warms its window from stored snapshots', async () => {
    await feed(BASELINE);
    monitor = createMonitor();

    const [alert] = await feed([15]);

    expect(alert?.severity).toBe('critical');
    expect(alert?.expected).toBe(11);
  });

  it('evaluates concurrent appends for one metric in order', async () => {
    const alerts = await Promise.all(
      [...BASELINE, 15].map((value, index) =>
        monitor.record({
          modelId: 'demand',
          metricName: 'mape',
          runId: `run-${index}`,
          taskId: 'forecast',
          value,
        }),
      ),
    );

    expect(alerts.filter((alert) => alert !== null)).toHaveLength(1);
    expect(alerts[6]?.runId).toBe('run-6');
  });

  it('keeps metrics of different models apart', async () => {
    await feed(BASELINE);

    const alert = await monitor.record({
      modelId: 'segments',
      metricName: 'mape',
      runId: 'run-x',
      taskId: 'cluster',
      value: 15,
    });

    expect(alert).toBeNull();
  });

  it('still publishes an alert when the notifier fails', async () => {
    notifier.failing = true;
    await feed(BASELINE);

    const published = firstValueFrom(monitor.alerts$);
    const [alert] = await feed([15]);

    expect(await published).toEqual(alert);
    expect(await store.listAlerts()).toHaveLength(1);
  });

  it('records metrics of succeeded tasks from the engine events', async () => {
    monitor.onModuleInit();
    const base = {
      runId: 'run-1',
      pipelineId: 'daily-ingest',
      logicalKey: '2024-05-01',
      at: clock.now(),
      taskId: 'forecast',
      kind: 'forecast' as const,
      modelId: 'daily-ingest.forecast',
      attempt: 1,
    };

    events.emitTask({ ...base, from: 'running', to: 'retry_scheduled' });
    events.emitTask({
      ...base,
      from: 'running',
      to: 'succeeded',
      metrics: { mape: 12.5, forecast_count: 40 },
    });
    await monitor.idle();

    const snapshots = await store.getMetricSnapshots('daily-ingest.forecast:mape', 10);
    expect(snapshots.map((snapshot) => [snapshot.runId, snapshot.value])).toEqual([
      ['run-1', 12.5],
    ]);
    expect(
      await store.getMetricSnapshots('daily-ingest.forecast:forecast_count', 10),
    ).toHaveLength(1);

    monitor.onModuleDestroy();
  });

  it('ignores metrics of ingestion and retraining tasks', async () => {
    monitor.onModuleInit();
    const base = {
      runId: 'run-1',
      pipelineId: 'daily-ingest',
      logicalKey: '2024-05-01',
      at: clock.now(),
      attempt: 1,
      from: 'running' as const,
      to: 'succeeded' as const,
    };

    events.emitTask({
      ...base,
      taskId: 'ingest',
      kind: 'ingestion',
      modelId: 'daily-ingest.ingest',
      metrics: { record_count: 1000 },
    });
    events.emitTask({
      ...base,
      taskId: 'retrain',
      kind: 'retrain',
      modelId: 'model-retraining.retrain',
      metrics: { training_records: 12 },
    });
    await monitor.idle();

    expect(await store.getMetricSnapshots('daily-ingest.ingest:record_count', 10)).toEqual([]);
    expect(
      await store.getMetricSnapshots('model-retraining.retrain:training_records', 10),
    ).toEqual([]);

    monitor.onModuleDestroy();
  });
});
