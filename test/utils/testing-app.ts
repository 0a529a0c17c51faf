import 'reflect-metadata';
import { Global, Module } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { Test, TestingModule } from '@nestjs/testing';
import * as path from 'path';
import { Clock } from '../../src/common/clock';
import { CommonModule } from '../../src/common/common.module';
import { InMemorySourceConnector } from '../../src/connectors/in-memory.connector';
import { ConnectorRegistry } from '../../src/connectors/connector-registry.service';
import { EngineModule } from '../../src/engine/engine.module';
import { FeedbackModule } from '../../src/feedback/feedback.module';
import { MonitoringModule } from '../../src/monitoring/monitoring.module';
import { SchedulingModule } from '../../src/scheduling/scheduling.module';
import type { BatchRecord } from '../../src/validation/validation.types';
import { FakeClock } from './fake-clock';

export interface TestingApp {
  moduleRef: TestingModule;
  clock: FakeClock;
  connector: InMemorySourceConnector;
  close(): Promise<void>;
}

/** The registry ScheduleModule.forRoot() would provide, without its cron explorer. */
@Global()
@Module({ providers: [SchedulerRegistry], exports: [SchedulerRegistry] })
class SchedulerRegistryModule {}

/**
 * Full engine wiring over the in-memory store, an in-memory connector and a
 * fake clock. Cron decorators stay inert: only the scheduler registry is
 * loaded, not ScheduleModule.
 */
export async function createTestingApp(
  sources: Record<string, BatchRecord[]> = {},
): Promise<TestingApp> {
  process.env.PIPELINES_FILE = path.join(__dirname, '../fixtures/pipelines.json');
  process.env.SOURCE_DATA_DIR = path.join(__dirname, '../fixtures/no-sources');
  process.env.SCHEDULER_ENABLED = 'false';
  process.env.PERSISTENCE_DRIVER = 'memory';

  const clock = new FakeClock();
  const moduleRef = await Test.createTestingModule({
    imports: [
      SchedulerRegistryModule,
      CommonModule,
      EngineModule,
      MonitoringModule,
      FeedbackModule,
      SchedulingModule,
    ],
  })
    .overrideProvider(Clock)
    .useValue(clock)
    .compile();
  moduleRef.useLogger(false);
  await moduleRef.init();

  const connector = new InMemorySourceConnector(sources);
  moduleRef.get(ConnectorRegistry).register(connector);

  return {
    moduleRef,
    clock,
    connector,
    close: () => moduleRef.close(),
  };
}

/** Let queued microtasks and immediate timers run. */
export async function flush(rounds = 3): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export function marketRecords(count: number, sourceId: string): BatchRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    restaurantId: `${sourceId}-r${i % 25}`,
    name: `Restaurant ${i % 25}`,
    cuisine: i % 2 === 0 ? 'pizza' : 'vegan',
    orderCount: 10 + (i % 7),
    averagePrice: 5 + (i % 40),
  }));
}
