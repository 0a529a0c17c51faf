import { Injectable } from '@nestjs/common';
import { InputError } from '../common/errors';
import type { TaskConfig } from '../pipelines/pipeline.types';
import type { DataBatch } from '../validation/validation.types';
import {
  mean,
  numberField,
  requireBatch,
  roundTo,
  stringField,
  throwIfAborted,
} from './record-fields';
import {
  TaskContext,
  TaskExecutor,
  TaskResult,
} from './task-executor.interface';

export interface DemandForecast {
  restaurantId: string;
  predictedOrders: number;
  observations: number;
}

export interface ForecastOutput {
  forecasts: DemandForecast[];
}

/**
 * Baseline demand forecast: next-period orders per restaurant are the mean of
 * its observed `orderCount`. The reported `mape` holds out each restaurant's
 * latest observation and scores the mean of the earlier ones against it.
 */
@Injectable()
export class ForecastExecutor implements TaskExecutor {
  readonly kind = 'forecast';

  async execute(
    batch: DataBatch | undefined,
    config: TaskConfig,
    context: TaskContext,
  ): Promise<TaskResult<ForecastOutput>> {
    const input = requireBatch(batch, context);
    const keyField =
      typeof config.keyField === 'string' ? config.keyField : 'restaurantId';
    const valueField =
      typeof config.valueField === 'string' ? config.valueField : 'orderCount';

    const series = new Map<string, number[]>();
    for (const record of input.records) {
      const key = stringField(record, keyField);
      const value = numberField(record, valueField);
      if (key === null || value === null) continue;
      series.set(key, [...(series.get(key) ?? []), value]);
    }
    throwIfAborted(context);

    if (series.size === 0) {
      throw new InputError(
        `No ${keyField}/${valueField} observations to forecast from`,
      );
    }

    const forecasts: DemandForecast[] = [];
    const holdoutErrors: number[] = [];
    for (const [restaurantId, values] of series) {
      forecasts.push({
        restaurantId,
        predictedOrders: roundTo(mean(values), 2),
        observations: values.length,
      });
      if (values.length >= 2) {
        const actual = values[values.length - 1];
        const predicted = mean(values.slice(0, -1));
        holdoutErrors.push(Math.abs(actual - predicted) / Math.max(actual, 1));
      }
    }
    forecasts.sort((a, b) => a.restaurantId.localeCompare(b.restaurantId));

    return {
      output: { forecasts },
      metrics: {
        mape: roundTo(mean(holdoutErrors) * 100),
        forecast_count: forecasts.length,
      },
    };
  }
}
