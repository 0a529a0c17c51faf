import 'reflect-metadata';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError, NotFoundError } from '../common/errors';
import { FakeClock } from '../../test/utils/fake-clock';
import { testConfig } from '../../test/utils/test-config';
import { PipelineDefinitionDto, TaskSpecDto } from './dto';
import { PipelinesService, findCycle } from './pipelines.service';

function definition(overrides: Partial<PipelineDefinitionDto> = {}): PipelineDefinitionDto {
  return {
    id: 'daily-ingest',
    name: 'Daily market ingest',
    tasks: [
      { id: 'ingest', kind: 'ingestion', config: { sources: ['ubereats'] } },
      {
        id: 'validate',
        kind: 'validation',
        dependsOn: ['ingest'],
        config: { rules: { rules: [{ type: 'not_null', field: 'restaurantId' }] } },
      },
      { id: 'forecast', kind: 'forecast', dependsOn: ['validate'], timeoutMs: 600000 },
    ],
    ...overrides,
  };
}

describe('PipelinesService', () => {
  let service: PipelinesService;

  beforeEach(() => {
    service = new PipelinesService(testConfig({ TASK_TIMEOUT_MS: 120000 }), new FakeClock());
  });

  describe('register', () => {
    it('fills in task defaults and freezes the definition', () => {
      const registered = service.register(definition());

      expect(registered.tasks.map((task) => [task.id, task.dependsOn, task.optional, task.timeoutMs])).toEqual([
        ['ingest', [], false, 120000],
        ['validate', ['ingest'], false, 120000],
        ['forecast', ['validate'], false, 600000],
      ]);
      expect(registered.tasks[1].config.rules).toEqual({
        rules: [{ type: 'not_null', field: 'restaurantId' }],
      });
      expect(registered.registeredAt).toEqual(new Date('2024-05-01T06:00:00.000Z'));
      expect(Object.isFrozen(registered)).toBe(true);
      expect(Object.isFrozen(registered.tasks[0].config)).toBe(true);
      expect(service.get('daily-ingest')).toBe(registered);
    });

    it('registers an id only once', () => {
      service.register(definition());

      expect(() => service.register(definition({ name: 'Again' }))).toThrow(
        'Pipeline daily-ingest is already registered',
      );
    });

    it('rejects dependency cycles', () => {
      expect(() =>
        service.register(
          definition({
            tasks: [
              { id: 'a', kind: 'forecast', dependsOn: ['b'] },
              { id: 'b', kind: 'cluster', dependsOn: ['a'] },
            ],
          }),
        ),
      ).toThrow('Pipeline daily-ingest: dependency cycle a -> b -> a');
    });

    const invalid: Array<[string, TaskSpecDto[], string]> = [
      [
        'unknown dependencies',
        [{ id: 'forecast', kind: 'forecast', dependsOn: ['missing'] }],
        'task forecast depends on unknown task missing',
      ],
      [
        'duplicate task ids',
        [
          { id: 'forecast', kind: 'forecast' },
          { id: 'forecast', kind: 'cluster' },
        ],
        'duplicate task id forecast',
      ],
      [
        'validation tasks without rules',
        [{ id: 'validate', kind: 'validation' }],
        'validation task validate has no rules',
      ],
      [
        'ingestion tasks without sources',
        [{ id: 'ingest', kind: 'ingestion' }],
        'ingestion task ingest has no sources',
      ],
      [
        'a second ingestion task',
        [
          { id: 'a', kind: 'ingestion', config: { sources: ['ubereats'] } },
          { id: 'b', kind: 'ingestion', config: { sources: ['rappi'] } },
        ],
        'at most one ingestion task per pipeline',
      ],
      [
        'unknown rule types',
        [
          {
            id: 'validate',
            kind: 'validation',
            config: { rules: { rules: [{ type: 'regex', field: 'name' }] } },
          },
        ],
        'unknown rule type regex',
      ],
    ];

    it.each(invalid)('rejects %s', (_label, tasks, message) => {
      expect(() => service.register(definition({ tasks }))).toThrow(message);
    });

    it('rejects a schedule cron cannot parse', () => {
      expect(() =>
        service.register(
          definition({ schedule: 'every morning', tasks: [{ id: 'f', kind: 'forecast' }] }),
        ),
      ).toThrow(ConfigurationError);
    });

    it('lists scheduled pipelines', () => {
      service.register(definition({ schedule: '0 0 * * *' }));
      service.register(
        definition({ id: 'manual', tasks: [{ id: 'f', kind: 'forecast' }] }),
      );

      expect(service.scheduled().map((pipeline) => pipeline.id)).toEqual(['daily-ingest']);
    });
  });

  describe('get', () => {
    it('distinguishes unknown pipelines from rejected ones', async () => {
      const file = path.join(await fs.mkdtemp(path.join(os.tmpdir(), 'pipelines-')), 'pipelines.json');
      await fs.writeFile(
        file,
        JSON.stringify([
          { id: 'cyclic', name: 'Cyclic', tasks: [{ id: 'a', kind: 'forecast', dependsOn: ['a'] }] },
        ]),
      );
      await service.loadFromFile(file);

      expect(() => service.get('cyclic')).toThrow(ConfigurationError);
      expect(() => service.get('cyclic')).toThrow(
        'Pipeline cyclic was rejected: Pipeline cyclic: task a depends on unknown task a',
      );
      expect(() => service.get('nope')).toThrow(NotFoundError);
    });
  });

  describe('loadFromFile', () => {
    it('registers the valid entries and records the rejected ones', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipelines-'));
      const file = path.join(dir, 'pipelines.json');
      await fs.writeFile(
        file,
        JSON.stringify([
          { id: 'forecast-only', name: 'Forecast', tasks: [{ id: 'forecast', kind: 'forecast' }] },
          { id: 'Bad Id', name: 'Bad', tasks: [{ id: 'forecast', kind: 'forecast' }] },
          { id: 'empty', name: 'Empty', tasks: [] },
          { name: 'Anonymous', tasks: [{ id: 'x', kind: 'teleport' }] },
        ]),
      );

      const catalog = await service.loadFromFile(file);

      expect(catalog.pipelines.map((pipeline) => pipeline.id)).toEqual(['forecast-only']);
      expect(catalog.rejected.map((entry) => entry.id)).toEqual(['Bad Id', 'empty', '#3']);
      expect(catalog.rejected[1].reason).toContain('tasks');
    });

    it('leaves the catalog empty when the file is missing', async () => {
      const catalog = await service.loadFromFile(path.join(os.tmpdir(), 'missing-pipelines.json'));

      expect(catalog).toEqual({ pipelines: [], rejected: [] });
    });

    it('accepts the shipped pipeline configuration', async () => {
      const catalog = await service.loadFromFile(
        path.resolve(__dirname, '../../config/pipelines.json'),
      );

      expect(catalog.rejected).toEqual([]);
      expect(catalog.pipelines.map((pipeline) => pipeline.id)).toEqual([
        'daily-ingest',
        'model-retraining',
      ]);
    });
  });
});

describe('findCycle', () => {
  const task = (id: string, dependsOn: string[]) => ({
    id,
    kind: 'forecast' as const,
    dependsOn,
    optional: false,
    timeoutMs: 1000,
    config: {},
  });

  it('returns null for a DAG', () => {
    expect(findCycle([task('a', []), task('b', ['a']), task('c', ['a', 'b'])])).toBeNull();
  });

  it('returns the closed path of the first cycle', () => {
    expect(findCycle([task('a', ['c']), task('b', ['a']), task('c', ['b'])])).toEqual([
      'a',
      'c',
      'b',
      'a',
    ]);
  });
});
