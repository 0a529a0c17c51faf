import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { CronTime } from 'cron';
import { promises as fs } from 'fs';
import { Observable, Subject } from 'rxjs';
import { Clock } from '../common/clock';
import {
  ConfigurationError,
  NotFoundError,
  describeError,
} from '../common/errors';
import { OrchestratorConfigService } from '../config/orchestrator-config.service';
import { PipelineDefinitionDto } from './dto';
import { parseTaskConfig } from './pipeline-config.parser';
import { PipelineDefinition, TaskSpec } from './pipeline.types';

export interface RejectedPipeline {
  id: string;
  reason: string;
}

export interface PipelineCatalog {
  pipelines: PipelineDefinition[];
  rejected: RejectedPipeline[];
}

/**
 * Catalog of immutable pipeline definitions. Definitions are checked as a
 * whole on registration; a bad one is recorded as rejected and only runs
 * referencing it are affected.
 */
@Injectable()
export class PipelinesService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PipelinesService.name);
  private readonly definitions = new Map<string, PipelineDefinition>();
  private readonly rejected = new Map<string, string>();
  private readonly registeredSubject = new Subject<PipelineDefinition>();

  /** Every accepted definition, at the moment it is registered. */
  readonly registered$: Observable<PipelineDefinition> =
    this.registeredSubject.asObservable();

  constructor(
    private readonly config: OrchestratorConfigService,
    private readonly clock: Clock,
  ) {}

  async onModuleInit() {
    await this.loadFromFile(this.config.pipelinesFile);
  }

  onModuleDestroy() {
    this.registeredSubject.complete();
  }

  // ============================================================================
  // LOADING & REGISTRATION
  // ============================================================================

  async loadFromFile(file: string): Promise<PipelineCatalog> {
    let entries: unknown;
    try {
      entries = JSON.parse(await fs.readFile(file, 'utf8'));
    } catch (error) {
      this.logger.warn(
        `📄 Could not read pipeline definitions from ${file}: ${describeError(error)}`,
      );
      return this.list();
    }

    if (!Array.isArray(entries)) {
      this.logger.error(`❌ ${file} must contain a JSON array of pipelines`);
      return this.list();
    }

    entries.forEach((entry: unknown, index) => {
      const id = this.entryId(entry, index);
      try {
        const dto = plainToInstance(PipelineDefinitionDto, entry);
        const errors = validateSync(dto, { forbidUnknownValues: true });
        if (errors.length > 0) {
          throw new ConfigurationError(formatValidationErrors(errors));
        }
        this.register(dto);
      } catch (error) {
        this.reject(id, describeError(error));
      }
    });

    this.logger.log(
      `📚 Loaded ${this.definitions.size} pipeline(s) from ${file} (${this.rejected.size} rejected)`,
    );
    return this.list();
  }

  /**
   * Register a definition. Registration is final: an id can be registered
   * once per process.
   */
  register(dto: PipelineDefinitionDto): PipelineDefinition {
    if (this.definitions.has(dto.id)) {
      throw new ConfigurationError(`Pipeline ${dto.id} is already registered`);
    }

    const tasks = dto.tasks.map(
      (task): TaskSpec => ({
        id: task.id,
        kind: task.kind,
        dependsOn: task.dependsOn ?? [],
        optional: task.optional ?? false,
        timeoutMs: task.timeoutMs ?? this.config.taskTimeoutMs,
        retry: task.retry ? { ...task.retry } : undefined,
        modelId: task.modelId,
        config: parseTaskConfig(task.config, `${dto.id}.${task.id}`),
      }),
    );

    const definition: PipelineDefinition = deepFreeze({
      id: dto.id,
      name: dto.name,
      description: dto.description,
      schedule: dto.schedule,
      runTimeoutMs: dto.runTimeoutMs,
      tasks,
      registeredAt: this.clock.now(),
    });
    validateDefinition(definition);

    this.definitions.set(definition.id, definition);
    this.rejected.delete(definition.id);
    this.logger.log(
      `🗂️ Registered pipeline ${definition.id} (${tasks.length} tasks${definition.schedule ? `, schedule ${definition.schedule}` : ''})`,
    );
    this.registeredSubject.next(definition);
    return definition;
  }

  // ============================================================================
  // LOOKUP
  // ============================================================================

  get(id: string): PipelineDefinition {
    const definition = this.definitions.get(id);
    if (definition) {
      return definition;
    }
    const reason = this.rejected.get(id);
    if (reason !== undefined) {
      throw new ConfigurationError(`Pipeline ${id} was rejected: ${reason}`);
    }
    throw new NotFoundError(`Pipeline ${id} not found`);
  }

  list(): PipelineCatalog {
    return {
      pipelines: Array.from(this.definitions.values()),
      rejected: Array.from(this.rejected, ([id, reason]) => ({ id, reason })),
    };
  }

  scheduled(): PipelineDefinition[] {
    return Array.from(this.definitions.values()).filter(
      (definition) => definition.schedule !== undefined,
    );
  }

  private reject(id: string, reason: string): void {
    this.rejected.set(id, reason);
    this.logger.error(`❌ Rejected pipeline ${id}: ${reason}`);
  }

  private entryId(entry: unknown, index: number): string {
    if (
      typeof entry === 'object' &&
      entry !== null &&
      'id' in entry &&
      typeof entry.id === 'string'
    ) {
      return entry.id;
    }
    return `#${index}`;
  }
}

// ============================================================================
// DEFINITION CHECKS
// ============================================================================

/**
 * Structural checks a definition must pass before any run can reference it.
 */
export function validateDefinition(definition: PipelineDefinition): void {
  const where = `Pipeline ${definition.id}`;
  const ids = new Set<string>();

  for (const task of definition.tasks) {
    if (ids.has(task.id)) {
      throw new ConfigurationError(`${where}: duplicate task id ${task.id}`);
    }
    ids.add(task.id);
    if (!(task.timeoutMs > 0)) {
      throw new ConfigurationError(`${where}: task ${task.id} needs a positive timeout`);
    }
  }

  for (const task of definition.tasks) {
    for (const dependency of task.dependsOn) {
      if (dependency === task.id || !ids.has(dependency)) {
        throw new ConfigurationError(
          `${where}: task ${task.id} depends on unknown task ${dependency}`,
        );
      }
    }
    if (task.kind === 'validation' && !task.config.rules) {
      throw new ConfigurationError(`${where}: validation task ${task.id} has no rules`);
    }
    if (task.kind === 'ingestion' && (task.config.sources ?? []).length === 0) {
      throw new ConfigurationError(`${where}: ingestion task ${task.id} has no sources`);
    }
  }

  if (definition.tasks.filter((task) => task.kind === 'ingestion').length > 1) {
    throw new ConfigurationError(`${where}: at most one ingestion task per pipeline`);
  }

  const cycle = findCycle(definition.tasks);
  if (cycle) {
    throw new ConfigurationError(`${where}: dependency cycle ${cycle.join(' -> ')}`);
  }

  if (definition.schedule !== undefined) {
    try {
      new CronTime(definition.schedule);
    } catch (error) {
      throw new ConfigurationError(
        `${where}: invalid schedule "${definition.schedule}": ${describeError(error)}`,
      );
    }
  }
}

/** First dependency cycle found by depth-first search, or null. */
export function findCycle(tasks: readonly Readonly<TaskSpec>[]): string[] | null {
  const byId = new Map(tasks.map((task) => [task.id, task]));
  const state = new Map<string, 'visiting' | 'done'>();
  const path: string[] = [];

  const visit = (id: string): string[] | null => {
    if (state.get(id) === 'done') return null;
    if (state.get(id) === 'visiting') {
      return [...path.slice(path.indexOf(id)), id];
    }
    state.set(id, 'visiting');
    path.push(id);
    for (const dependency of byId.get(id)?.dependsOn ?? []) {
      const cycle = visit(dependency);
      if (cycle) return cycle;
    }
    path.pop();
    state.set(id, 'done');
    return null;
  };

  for (const task of tasks) {
    const cycle = visit(task.id);
    if (cycle) return cycle;
  }
  return null;
}

function formatValidationErrors(errors: ValidationError[], prefix = ''): string {
  return errors
    .flatMap((error) => {
      const property = `${prefix}${error.property}`;
      const own = Object.values(error.constraints ?? {}).map(
        (message) => `${property}: ${message}`,
      );
      const nested = error.children?.length
        ? [formatValidationErrors(error.children, `${property}.`)]
        : [];
      return [...own, ...nested];
    })
    .join('; ');
}

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (typeof nested === 'object' && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
