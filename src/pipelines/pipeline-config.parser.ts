import { ConfigurationError } from '../common/errors';
import type { RuleSet, ValidationRule } from '../validation/validation.types';
import type { TaskConfig } from './pipeline.types';

const TYPED_KEYS = new Set(['sources', 'sinceHours', 'rules']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function optionalNumber(
  raw: Record<string, unknown>,
  key: string,
  where: string,
): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError(`${where}: "${key}" must be a number`);
  }
  return value;
}

export function parseRule(raw: unknown, where: string): ValidationRule {
  if (!isRecord(raw) || typeof raw.field !== 'string' || raw.field === '') {
    throw new ConfigurationError(`${where}: every rule needs a "field"`);
  }
  const field = raw.field;
  switch (raw.type) {
    case 'not_null':
      return { type: 'not_null', field };
    case 'known_source':
      return { type: 'known_source', field };
    case 'range': {
      const min = optionalNumber(raw, 'min', where);
      const max = optionalNumber(raw, 'max', where);
      if (min !== undefined && max !== undefined && min > max) {
        throw new ConfigurationError(`${where}: range on ${field} has min > max`);
      }
      return { type: 'range', field, min, max };
    }
    case 'one_of': {
      const values = raw.values;
      if (
        !Array.isArray(values) ||
        values.length === 0 ||
        !values.every((v) => typeof v === 'string' || typeof v === 'number')
      ) {
        throw new ConfigurationError(
          `${where}: one_of on ${field} needs a non-empty "values" list`,
        );
      }
      return { type: 'one_of', field, values };
    }
    default:
      throw new ConfigurationError(
        `${where}: unknown rule type ${String(raw.type)}`,
      );
  }
}

export function parseRuleSet(raw: unknown, where: string): RuleSet {
  if (!isRecord(raw) || !Array.isArray(raw.rules)) {
    throw new ConfigurationError(`${where}: "rules" must hold a rule list`);
  }
  const rules = raw.rules.map((rule) => parseRule(rule, where));
  if (raw.knownSourceIds === undefined) {
    return { rules };
  }
  if (!isStringArray(raw.knownSourceIds)) {
    throw new ConfigurationError(`${where}: "knownSourceIds" must be strings`);
  }
  return { rules, knownSourceIds: raw.knownSourceIds };
}

/**
 * Narrow free-form task configuration to the typed keys the executors read.
 * Unknown keys pass through untouched.
 */
export function parseTaskConfig(
  raw: Record<string, unknown> | undefined,
  where: string,
): TaskConfig {
  const config: TaskConfig = {};
  for (const [key, value] of Object.entries(raw ?? {})) {
    if (!TYPED_KEYS.has(key)) {
      config[key] = value;
    }
  }

  if (raw?.sources !== undefined) {
    if (!isStringArray(raw.sources)) {
      throw new ConfigurationError(`${where}: "sources" must be strings`);
    }
    config.sources = raw.sources;
  }
  if (raw?.sinceHours !== undefined) {
    const sinceHours = optionalNumber(raw, 'sinceHours', where);
    if (sinceHours === undefined || sinceHours <= 0) {
      throw new ConfigurationError(`${where}: "sinceHours" must be positive`);
    }
    config.sinceHours = sinceHours;
  }
  if (raw?.rules !== undefined) {
    config.rules = parseRuleSet(raw.rules, where);
  }
  return config;
}
