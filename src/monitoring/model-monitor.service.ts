import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { Observable, Subject, Subscription, filter } from 'rxjs';
import { v4 as uuidv4 } from 'uuid';
import { Clock } from '../common/clock';
import { KeyedMutex } from '../common/keyed-mutex';
import { OrchestratorConfigService } from '../config/orchestrator-config.service';
import { PersistenceStore } from '../database/persistence.store';
import {
  EngineEventsService,
  TaskTransitionEvent,
} from '../engine/engine-events.service';
import { MONITORED_TASK_KINDS } from '../pipelines/pipeline.types';
import { AlertNotifier } from './alert-notifier';
import { classify, windowStats, zScore } from './drift';
import { Alert, AlertSeverity, ModelMetricSnapshot } from './monitoring.types';

export interface MetricObservation {
  modelId: string;
  metricName: string;
  runId: string;
  taskId: string;
  value: number;
}

interface BreachState {
  severity: AlertSeverity;
  alertedAt: Date;
}

/**
 * Turns metrics of succeeded analysis tasks into snapshots and checks each against the
 * rolling window of its predecessors. Appends for one metric are serialized;
 * different metrics are evaluated concurrently.
 */
@Injectable()
export class ModelMonitorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ModelMonitorService.name);
  private readonly mutex = new KeyedMutex();
  /** Values of the latest snapshots per metric id, oldest first. */
  private readonly windows = new Map<string, number[]>();
  private readonly breaches = new Map<string, BreachState>();
  private readonly alertsSubject = new Subject<Alert>();
  private subscription?: Subscription;

  readonly alerts$: Observable<Alert> = this.alertsSubject.asObservable();

  constructor(
    private readonly events: EngineEventsService,
    private readonly store: PersistenceStore,
    private readonly notifier: AlertNotifier,
    private readonly config: OrchestratorConfigService,
    private readonly clock: Clock,
  ) {}

  onModuleInit() {
    this.subscription = this.events.events$
      .pipe(
        filter(
          (event): event is TaskTransitionEvent =>
            event.type === 'task.transition' &&
            event.to === 'succeeded' &&
            MONITORED_TASK_KINDS.has(event.kind),
        ),
      )
      .subscribe((event) => this.onTaskSucceeded(event));
  }

  onModuleDestroy() {
    this.subscription?.unsubscribe();
    this.alertsSubject.complete();
  }

  /**
   * Append one snapshot and evaluate it. Resolves with the alert it raised,
   * if any.
   */
  record(observation: MetricObservation): Promise<Alert | null> {
    const metricId = `${observation.modelId}:${observation.metricName}`;
    return this.mutex.run(metricId, async () => {
      const window = await this.windowFor(metricId);
      const snapshot: ModelMetricSnapshot = {
        id: uuidv4(),
        metricId,
        ...observation,
        recordedAt: this.clock.now(),
      };
      await this.store.appendMetricSnapshot(snapshot);

      const alert = this.evaluate(snapshot, window);
      window.push(snapshot.value);
      if (window.length > this.config.monitorWindowSize) {
        window.shift();
      }

      if (alert) {
        await this.publish(alert);
      }
      return alert;
    });
  }

  /** Resolves once every queued snapshot has been evaluated. */
  idle(): Promise<void> {
    return this.mutex.idle();
  }

  private onTaskSucceeded(event: TaskTransitionEvent): void {
    for (const [metricName, value] of Object.entries(event.metrics ?? {})) {
      if (!Number.isFinite(value)) continue;
      this.record({
        modelId: event.modelId,
        metricName,
        runId: event.runId,
        taskId: event.taskId,
        value,
      }).catch((error: unknown) => {
        this.logger.error(
          `❌ Failed to record ${event.modelId}:${metricName} for run ${event.runId}`,
          error,
        );
      });
    }
  }

  /**
   * Hysteresis: a sustained breach alerts once. It alerts again after the
   * metric returns within bounds, after the cooldown, or when a warning
   * escalates to critical.
   */
  private evaluate(snapshot: ModelMetricSnapshot, window: number[]): Alert | null {
    if (window.length < this.config.monitorMinSamples) {
      return null;
    }

    const stats = windowStats(window);
    const z = zScore(
      snapshot.value,
      stats,
      Math.abs(stats.mean) * this.config.monitorMinStddevRatio,
    );
    const severity = classify(z, {
      warningZ: this.config.monitorWarningZ,
      criticalZ: this.config.monitorCriticalZ,
    });

    if (!severity) {
      this.breaches.delete(snapshot.metricId);
      return null;
    }

    const now = this.clock.now();
    const previous = this.breaches.get(snapshot.metricId);
    const escalated = previous?.severity === 'warning' && severity === 'critical';
    const cooledDown =
      !previous ||
      now.getTime() - previous.alertedAt.getTime() >= this.config.monitorCooldownMs;
    if (!cooledDown && !escalated) {
      this.logger.debug(
        `🔕 ${snapshot.metricId} still out of bounds (z=${z.toFixed(2)}), alert suppressed`,
      );
      return null;
    }

    this.breaches.set(snapshot.metricId, { severity, alertedAt: now });
    return {
      id: uuidv4(),
      severity,
      metricId: snapshot.metricId,
      modelId: snapshot.modelId,
      runId: snapshot.runId,
      observed: snapshot.value,
      expected: stats.mean,
      zScore: z,
      createdAt: now,
    };
  }

  private async publish(alert: Alert): Promise<void> {
    await this.store.saveAlert(alert);
    this.logger.log(
      `📣 ${alert.severity} alert on ${alert.metricId} (run ${alert.runId})`,
    );
    try {
      await this.notifier.notify(alert);
    } catch (error) {
      this.logger.error(`❌ Alert notifier failed for ${alert.id}`, error);
    }
    this.alertsSubject.next(alert);
  }

  private async windowFor(metricId: string): Promise<number[]> {
    let window = this.windows.get(metricId);
    if (!window) {
      const snapshots = await this.store.getMetricSnapshots(
        metricId,
        this.config.monitorWindowSize,
      );
      window = snapshots.map((snapshot) => snapshot.value);
      this.windows.set(metricId, window);
    }
    return window;
  }
}
