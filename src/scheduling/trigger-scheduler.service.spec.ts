import { SchedulerRegistry } from '@nestjs/schedule';
import { WorkflowEngineService } from '../engine/workflow-engine.service';
import { PipelinesService } from '../pipelines/pipelines.service';
import { createTestingApp, TestingApp } from '../../test/utils/testing-app';
import { testConfig } from '../../test/utils/test-config';
import { TriggerSchedulerService } from './trigger-scheduler.service';

describe('TriggerSchedulerService', () => {
  let app: TestingApp;
  let pipelines: PipelinesService;
  let registry: SchedulerRegistry;
  let scheduler: TriggerSchedulerService;

  beforeEach(async () => {
    app = await createTestingApp();
    pipelines = app.moduleRef.get(PipelinesService);
    registry = new SchedulerRegistry();
    scheduler = new TriggerSchedulerService(
      registry,
      pipelines,
      app.moduleRef.get(WorkflowEngineService),
      testConfig({ SCHEDULER_ENABLED: true }),
      app.clock,
    );
  });

  afterEach(async () => {
    scheduler.onModuleDestroy();
    await app.close();
  });

  it('schedules a pipeline registered after boot', () => {
    scheduler.onApplicationBootstrap();
    expect(scheduler.getTriggers()).toEqual([]);

    pipelines.register({
      id: 'evening-forecast',
      name: 'Evening forecast',
      schedule: '30 18 * * *',
      tasks: [{ id: 'forecast', kind: 'forecast', config: {} }],
    });

    const [trigger] = scheduler.getTriggers();
    expect(trigger).toMatchObject({
      pipelineId: 'evening-forecast',
      schedule: '30 18 * * *',
      timezone: 'UTC',
    });
    expect(trigger.nextRun.getUTCHours()).toBe(18);
    expect(trigger.nextRun.getUTCMinutes()).toBe(30);
    expect(registry.doesExist('cron', 'pipeline-trigger:evening-forecast')).toBe(true);
  });

  it('leaves unscheduled pipelines out of the registry', () => {
    scheduler.onApplicationBootstrap();

    pipelines.register({
      id: 'manual-forecast',
      name: 'Manual forecast',
      tasks: [{ id: 'forecast', kind: 'forecast', config: {} }],
    });

    expect(scheduler.getTriggers()).toEqual([]);
    expect(registry.getCronJobs().size).toBe(0);
  });

  it('does not schedule registrations while disabled', () => {
    const disabled = app.moduleRef.get(TriggerSchedulerService);

    pipelines.register({
      id: 'evening-forecast',
      name: 'Evening forecast',
      schedule: '30 18 * * *',
      tasks: [{ id: 'forecast', kind: 'forecast', config: {} }],
    });

    expect(disabled.getTriggers()).toEqual([]);
  });

  it('stops every trigger on shutdown', () => {
    scheduler.onApplicationBootstrap();
    pipelines.register({
      id: 'evening-forecast',
      name: 'Evening forecast',
      schedule: '30 18 * * *',
      tasks: [{ id: 'forecast', kind: 'forecast', config: {} }],
    });

    scheduler.onModuleDestroy();

    expect(scheduler.getTriggers()).toEqual([]);
    expect(registry.doesExist('cron', 'pipeline-trigger:evening-forecast')).toBe(false);
  });
});
