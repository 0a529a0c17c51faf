import { Injectable, Logger } from '@nestjs/common';
import { Clock } from '../common/clock';
import { ConnectorRegistry } from '../connectors/connector-registry.service';
import { PersistenceStore } from '../database/persistence.store';
import {
  BatchRecord,
  DataBatch,
  RuleSet,
  ValidationResult,
  ValidationRule,
  Violation,
} from './validation.types';

@Injectable()
export class ValidationGateService {
  private readonly logger = new Logger(ValidationGateService.name);

  constructor(
    private readonly store: PersistenceStore,
    private readonly connectors: ConnectorRegistry,
    private readonly clock: Clock,
  ) {}

  /**
   * Evaluate every rule against every record. Violations are collected, not
   * short-circuited, so one verdict describes the whole batch.
   */
  validate(batch: DataBatch, ruleSet: RuleSet): ValidationResult {
    const knownSources = new Set(
      ruleSet.knownSourceIds ?? this.connectors.getSourceIds(),
    );
    const violations: Violation[] = [];

    batch.records.forEach((record, recordIndex) => {
      for (const rule of ruleSet.rules) {
        const value = record[rule.field];
        if (!this.satisfies(rule, value, knownSources)) {
          violations.push({
            recordIndex,
            field: rule.field,
            rule: rule.type,
            value: value ?? null,
          });
        }
      }
    });

    return {
      batchId: batch.id,
      passed: violations.length === 0,
      violations,
      recordCount: batch.records.length,
      validatedAt: this.clock.now(),
    };
  }

  /**
   * Validate and persist the verdict for audit.
   */
  async validateAndRecord(
    runId: string,
    batch: DataBatch,
    ruleSet: RuleSet,
  ): Promise<ValidationResult> {
    const result = this.validate(batch, ruleSet);
    await this.store.saveValidationResult(runId, result);

    if (result.passed) {
      this.logger.log(
        `✅ Batch ${batch.id} passed validation (${result.recordCount} records)`,
      );
    } else {
      this.logger.warn(
        `🚫 Batch ${batch.id} failed validation: ${result.violations.length} violation(s) in ${result.recordCount} records`,
      );
    }
    return result;
  }

  private satisfies(
    rule: ValidationRule,
    value: BatchRecord[string],
    knownSources: Set<string>,
  ): boolean {
    switch (rule.type) {
      case 'not_null':
        return value !== null && value !== undefined && value !== '';
      case 'range':
        return (
          typeof value === 'number' &&
          Number.isFinite(value) &&
          (rule.min === undefined || value >= rule.min) &&
          (rule.max === undefined || value <= rule.max)
        );
      case 'one_of':
        return (
          (typeof value === 'string' || typeof value === 'number') &&
          rule.values.includes(value)
        );
      case 'known_source':
        return typeof value === 'string' && knownSources.has(value);
    }
  }
}
