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

export type PriceTier = 'budget' | 'mid' | 'premium';

export interface ClusterOutput {
  clusters: Record<PriceTier, string[]>;
  thresholds: { low: number; high: number };
}

/**
 * Baseline market segmentation: restaurants are split into price tiers at the
 * terciles of their mean `averagePrice`.
 */
@Injectable()
export class ClusterExecutor implements TaskExecutor {
  readonly kind = 'cluster';

  async execute(
    batch: DataBatch | undefined,
    config: TaskConfig,
    context: TaskContext,
  ): Promise<TaskResult<ClusterOutput>> {
    const input = requireBatch(batch, context);
    const keyField =
      typeof config.keyField === 'string' ? config.keyField : 'restaurantId';
    const priceField =
      typeof config.priceField === 'string' ? config.priceField : 'averagePrice';

    const prices = new Map<string, number[]>();
    for (const record of input.records) {
      const key = stringField(record, keyField);
      const price = numberField(record, priceField);
      if (key === null || price === null) continue;
      prices.set(key, [...(prices.get(key) ?? []), price]);
    }
    throwIfAborted(context);

    if (prices.size === 0) {
      throw new InputError(`No ${priceField} values to cluster`);
    }

    const restaurants = Array.from(prices, ([id, values]) => ({
      id,
      price: mean(values),
    })).sort((a, b) => a.price - b.price || a.id.localeCompare(b.id));

    const low = restaurants[Math.floor((restaurants.length - 1) / 3)].price;
    const high =
      restaurants[Math.floor(((restaurants.length - 1) * 2) / 3)].price;

    const clusters: Record<PriceTier, string[]> = {
      budget: [],
      mid: [],
      premium: [],
    };
    for (const { id, price } of restaurants) {
      const tier: PriceTier =
        price <= low ? 'budget' : price <= high ? 'mid' : 'premium';
      clusters[tier].push(id);
    }

    const sizes = Object.values(clusters).map((members) => members.length);
    return {
      output: { clusters, thresholds: { low, high } },
      metrics: {
        cluster_count: sizes.filter((size) => size > 0).length,
        largest_cluster_share: roundTo(
          Math.max(...sizes) / restaurants.length,
        ),
      },
    };
  }
}
