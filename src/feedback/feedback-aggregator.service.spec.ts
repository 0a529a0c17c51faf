import { InputError } from '../common/errors';
import { PersistenceStore } from '../database/persistence.store';
import { EngineEventsService } from '../engine/engine-events.service';
import type { RunState } from '../engine/run.types';
import { WorkflowEngineService } from '../engine/workflow-engine.service';
import { createTestingApp, flush, TestingApp } from '../../test/utils/testing-app';
import { FeedbackAggregatorService } from './feedback-aggregator.service';

const RATED_RUN_ID = '3f0c8a2e-5b1d-4c6e-9a7f-1e2d3c4b5a69';

describe('FeedbackAggregatorService', () => {
  let app: TestingApp;
  let aggregator: FeedbackAggregatorService;
  let engine: WorkflowEngineService;
  let store: PersistenceStore;

  async function rate(modelId: string, ratings: number[]): Promise<void> {
    for (const rating of ratings) {
      await aggregator.submit({ modelId, rating });
    }
  }

  beforeEach(async () => {
    app = await createTestingApp();
    aggregator = app.moduleRef.get(FeedbackAggregatorService);
    engine = app.moduleRef.get(WorkflowEngineService);
    store = app.moduleRef.get(PersistenceStore);
  });

  afterEach(() => app.close());

  it('stores feedback with the submission time', async () => {
    const record = await aggregator.submit({
      modelId: 'demand',
      runId: RATED_RUN_ID,
      taskId: 'forecast',
      rating: 2,
      correction: 'Weekend demand is higher',
    });

    expect(record).toEqual({
      id: expect.any(String),
      modelId: 'demand',
      runId: RATED_RUN_ID,
      taskId: 'forecast',
      rating: 2,
      correction: 'Weekend demand is higher',
      submittedAt: new Date('2024-05-01T06:00:00.000Z'),
    });
    expect(await store.listFeedback({ modelId: 'demand' })).toEqual([record]);
  });

  it('rejects ratings outside 1 to 5', async () => {
    await expect(aggregator.submit({ modelId: 'demand', rating: 7 })).rejects.toBeInstanceOf(
      InputError,
    );
    await expect(aggregator.submit({ modelId: 'demand', rating: 2.5 })).rejects.toBeInstanceOf(
      InputError,
    );
  });

  it('rejects a run id that is not a UUID', async () => {
    await expect(
      aggregator.submit({ modelId: 'demand', runId: 'run-1', rating: 4 }),
    ).rejects.toThrow('Run id must be a UUID, got run-1');
    expect(await store.listFeedback()).toEqual([]);
  });

  it('queues one retraining run when negative feedback passes the threshold', async () => {
    await rate('demand', [1, 2, 1, 2, 5, 5, 4, 5, 3, 4]);

    const [outcome] = await aggregator.evaluate();

    expect(outcome).toEqual({
      modelId: 'demand',
      trigger: true,
      negativeRatio: 0.4,
      feedbackCount: 10,
      criticalAlerts: 0,
      runId: expect.any(String),
    });
    if (!outcome.runId) throw new Error('expected a retraining run');

    const run = await engine.waitForRun(outcome.runId);
    expect(run.pipelineId).toBe('model-retraining');
    expect(run.logicalKey).toBe('retrain:demand:2024-05-01');
    expect(run.state).toBe('succeeded');
    expect(run.params).toEqual({
      modelId: 'demand',
      reason: 'negative_feedback',
      negativeRatio: 0.4,
      criticalAlerts: 0,
    });

    const output = await store.getTaskOutput(`${outcome.runId}/retrain/1`);
    expect(output?.output).toEqual({
      modelId: 'demand',
      version: 'demand@2024-05-01T06:00:00.000Z',
      reason: 'negative_feedback',
      feedbackUsed: 10,
      trainedAt: '2024-05-01T06:00:00.000Z',
    });
  });

  it('does not queue a second retraining run for the same model and day', async () => {
    await rate('demand', [1, 1, 1, 1, 1, 5, 5, 5, 5, 5]);
    const [first] = await aggregator.evaluate();
    if (!first.runId) throw new Error('expected a retraining run');
    await engine.waitForRun(first.runId);

    const [second] = await aggregator.evaluate();

    expect(second.trigger).toBe(true);
    expect(second.runId).toBeNull();
    expect(await store.findRunsByKey('model-retraining', 'retrain:demand:2024-05-01')).toHaveLength(1);
  });

  it('needs enough feedback and a ratio above the threshold', async () => {
    await rate('sparse', [1, 1, 1, 1, 1, 1, 1, 1, 1]);
    await rate('tolerable', [1, 2, 2, 5, 5, 5, 4, 4, 3, 3]);

    const outcomes = await aggregator.evaluate();

    expect(outcomes).toEqual([
      {
        modelId: 'sparse',
        trigger: false,
        negativeRatio: 1,
        feedbackCount: 9,
        criticalAlerts: 0,
        runId: null,
      },
      {
        modelId: 'tolerable',
        trigger: false,
        negativeRatio: 0.3,
        feedbackCount: 10,
        criticalAlerts: 0,
        runId: null,
      },
    ]);
    expect(engine.activeRunCount()).toBe(0);
  });

  it('queues retraining for a model with a recent critical alert', async () => {
    const now = app.clock.now();
    await store.saveAlert({
      id: 'alert-old',
      severity: 'critical',
      metricId: 'segments:largest_cluster_share',
      modelId: 'segments',
      runId: 'run-0',
      observed: 0.9,
      expected: 0.4,
      zScore: 6,
      createdAt: new Date(now.getTime() - 2 * 86_400_000),
    });
    await store.saveAlert({
      id: 'alert-new',
      severity: 'critical',
      metricId: 'segments:largest_cluster_share',
      modelId: 'segments',
      runId: 'run-1',
      observed: 0.95,
      expected: 0.4,
      zScore: 7,
      createdAt: now,
    });

    const [outcome] = await aggregator.evaluate();

    expect(outcome.trigger).toBe(true);
    expect(outcome.criticalAlerts).toBe(1);
    if (!outcome.runId) throw new Error('expected a retraining run');
    const run = await engine.waitForRun(outcome.runId);
    expect(run.params.reason).toBe('critical_alert');
    expect(run.state).toBe('succeeded');
  });

  it('starts retraining runs in the retraining-queued state', async () => {
    const transitions: Array<[RunState | null, RunState]> = [];
    const subscription = app.moduleRef
      .get(EngineEventsService)
      .events$.subscribe((event) => {
        if (event.type === 'run.transition') {
          transitions.push([event.from, event.to]);
        }
      });

    await rate('demand', [1, 1, 1, 1, 1, 1, 1, 1, 1, 1]);
    const [outcome] = await aggregator.evaluate();
    if (!outcome.runId) throw new Error('expected a retraining run');
    await engine.waitForRun(outcome.runId);
    subscription.unsubscribe();

    expect(transitions).toEqual([
      [null, 'retraining-queued'],
      ['retraining-queued', 'running'],
      ['running', 'succeeded'],
    ]);
  });

  it('evaluates on its own after every twenty signals', async () => {
    await rate('demand', Array.from({ length: 20 }, () => 1));
    await flush();

    const runs = await store.findRunsByKey('model-retraining', 'retrain:demand:2024-05-01');
    expect(runs).toHaveLength(1);
    expect(runs[0].params.reason).toBe('negative_feedback');
  });

  it('shares one evaluation between concurrent callers', async () => {
    await rate('demand', [1, 1, 1, 1, 1, 1, 1, 1, 1, 1]);

    const [a, b] = await Promise.all([aggregator.evaluate(), aggregator.evaluate()]);

    expect(a).toBe(b);
    expect(await store.findRunsByKey('model-retraining', 'retrain:demand:2024-05-01')).toHaveLength(1);
  });
});
