export type BatchRecord = Readonly<Record<string, unknown>>;

export interface DataBatchProvenance {
  sourceIds: string[];
  ingestedAt: Date;
  recordCount: number;
}

export interface DataBatch {
  readonly id: string;
  readonly logicalKey: string;
  readonly records: readonly BatchRecord[];
  readonly provenance: Readonly<DataBatchProvenance>;
}

export type ValidationRule =
  | { type: 'not_null'; field: string }
  | { type: 'range'; field: string; min?: number; max?: number }
  | { type: 'one_of'; field: string; values: Array<string | number> }
  | { type: 'known_source'; field: string };

export interface RuleSet {
  rules: ValidationRule[];
  /** Identifiers accepted by `known_source`; defaults to the registered connectors. */
  knownSourceIds?: string[];
}

export interface Violation {
  recordIndex: number;
  field: string;
  rule: ValidationRule['type'];
  value: unknown;
}

export interface ValidationResult {
  batchId: string;
  passed: boolean;
  violations: Violation[];
  recordCount: number;
  validatedAt: Date;
}
