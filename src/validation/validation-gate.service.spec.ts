import { ConnectorRegistry } from '../connectors/connector-registry.service';
import { InMemorySourceConnector } from '../connectors/in-memory.connector';
import { InMemoryStore } from '../database/in-memory.store';
import { FakeClock } from '../../test/utils/fake-clock';
import { ValidationGateService } from './validation-gate.service';
import { BatchRecord, DataBatch, RuleSet } from './validation.types';

function batchOf(records: BatchRecord[]): DataBatch {
  return {
    id: 'batch-1',
    logicalKey: '2024-05-01',
    records,
    provenance: {
      sourceIds: ['ubereats', 'rappi'],
      ingestedAt: new Date('2024-05-01T05:00:00.000Z'),
      recordCount: records.length,
    },
  };
}

describe('ValidationGateService', () => {
  let store: InMemoryStore;
  let gate: ValidationGateService;

  const rules: RuleSet = {
    rules: [
      { type: 'not_null', field: 'restaurantId' },
      { type: 'range', field: 'orderCount', min: 0 },
      { type: 'known_source', field: 'sourceId' },
    ],
  };

  beforeEach(() => {
    store = new InMemoryStore();
    const connectors = new ConnectorRegistry();
    connectors.register(new InMemorySourceConnector({ ubereats: [], rappi: [] }));
    gate = new ValidationGateService(store, connectors, new FakeClock());
  });

  it('passes a clean batch', () => {
    const result = gate.validate(
      batchOf([
        { restaurantId: 'r1', orderCount: 0, sourceId: 'ubereats' },
        { restaurantId: 'r2', orderCount: 12, sourceId: 'rappi' },
      ]),
      rules,
    );

    expect(result).toEqual({
      batchId: 'batch-1',
      passed: true,
      violations: [],
      recordCount: 2,
      validatedAt: new Date('2024-05-01T06:00:00.000Z'),
    });
  });

  it('collects every violation instead of stopping at the first', () => {
    const result = gate.validate(
      batchOf([
        { restaurantId: 'r1', orderCount: 5, sourceId: 'ubereats' },
        { restaurantId: null, orderCount: -1, sourceId: 'unknown' },
        { orderCount: 'x', sourceId: 'rappi' },
      ]),
      rules,
    );

    expect(result.passed).toBe(false);
    expect(result.violations).toEqual([
      { recordIndex: 1, field: 'restaurantId', rule: 'not_null', value: null },
      { recordIndex: 1, field: 'orderCount', rule: 'range', value: -1 },
      { recordIndex: 1, field: 'sourceId', rule: 'known_source', value: 'unknown' },
      { recordIndex: 2, field: 'restaurantId', rule: 'not_null', value: null },
      { recordIndex: 2, field: 'orderCount', rule: 'range', value: 'x' },
    ]);
  });

  it('treats empty strings as missing and checks both range bounds', () => {
    const result = gate.validate(
      batchOf([
        { name: '', averagePrice: 1200 },
        { name: 'Casa Roma', averagePrice: 18.5 },
      ]),
      {
        rules: [
          { type: 'not_null', field: 'name' },
          { type: 'range', field: 'averagePrice', min: 0, max: 1000 },
        ],
      },
    );

    expect(result.violations).toEqual([
      { recordIndex: 0, field: 'name', rule: 'not_null', value: '' },
      { recordIndex: 0, field: 'averagePrice', rule: 'range', value: 1200 },
    ]);
  });

  it('matches one_of values exactly', () => {
    const result = gate.validate(
      batchOf([{ cuisine: 'pizza' }, { cuisine: 'Pizza' }, { cuisine: 3 }]),
      { rules: [{ type: 'one_of', field: 'cuisine', values: ['pizza', 'sushi', 3] }] },
    );

    expect(result.violations).toEqual([
      { recordIndex: 1, field: 'cuisine', rule: 'one_of', value: 'Pizza' },
    ]);
  });

  it('prefers an explicit list of known sources over the registered connectors', () => {
    const result = gate.validate(
      batchOf([{ sourceId: 'ubereats' }, { sourceId: 'didi' }]),
      {
        rules: [{ type: 'known_source', field: 'sourceId' }],
        knownSourceIds: ['didi'],
      },
    );

    expect(result.violations).toEqual([
      { recordIndex: 0, field: 'sourceId', rule: 'known_source', value: 'ubereats' },
    ]);
  });

  it('records the verdict for audit', async () => {
    const result = await gate.validateAndRecord(
      'run-1',
      batchOf([{ restaurantId: null, orderCount: 1, sourceId: 'rappi' }]),
      rules,
    );

    expect(await store.getValidationResult('run-1')).toEqual(result);
    expect(result.violations).toHaveLength(1);
  });
});
