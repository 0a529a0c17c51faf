import { Injectable } from '@nestjs/common';
import { InputError } from '../common/errors';
import type { TaskConfig } from '../pipelines/pipeline.types';
import type { DataBatch } from '../validation/validation.types';
import { requireBatch, roundTo, stringField, throwIfAborted } from './record-fields';
import {
  TaskContext,
  TaskExecutor,
  TaskResult,
} from './task-executor.interface';

const DEFAULT_SEARCH_FIELDS = ['name', 'cuisine', 'description'];

export interface QueryAnswer {
  query: string;
  matches: number;
  sampleRestaurantIds: string[];
}

export interface NlpQueryOutput {
  answers: QueryAnswer[];
}

/**
 * Baseline market question answering: each configured query is matched
 * term-by-term against the text fields of every record.
 */
@Injectable()
export class NlpQueryExecutor implements TaskExecutor {
  readonly kind = 'nlp_query';

  async execute(
    batch: DataBatch | undefined,
    config: TaskConfig,
    context: TaskContext,
  ): Promise<TaskResult<NlpQueryOutput>> {
    const input = requireBatch(batch, context);
    const queries = stringList(config.queries);
    if (queries.length === 0) {
      throw new InputError(`NLP task ${context.taskId} has no queries`);
    }
    const fields = stringList(config.fields);
    const searchFields = fields.length > 0 ? fields : DEFAULT_SEARCH_FIELDS;

    const startedAt = performance.now();
    const documents = input.records.map((record) => ({
      id: stringField(record, 'restaurantId'),
      text: searchFields
        .map((field) => stringField(record, field) ?? '')
        .join(' ')
        .toLowerCase(),
    }));

    const answers = queries.map((query): QueryAnswer => {
      throwIfAborted(context);
      const terms = query.toLowerCase().split(/\s+/).filter(Boolean);
      const hits = documents.filter((doc) =>
        terms.every((term) => doc.text.includes(term)),
      );
      return {
        query,
        matches: hits.length,
        sampleRestaurantIds: hits
          .map((doc) => doc.id)
          .filter((id): id is string => id !== null)
          .slice(0, 5),
      };
    });

    const answered = answers.filter((answer) => answer.matches > 0).length;
    return {
      output: { answers },
      metrics: {
        match_rate: roundTo(answered / answers.length),
        latency_ms: roundTo(performance.now() - startedAt, 2),
      },
    };
  }
}

function stringList(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === 'string')
    : [];
}
