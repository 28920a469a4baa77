import type { MetricSpec } from '@evalgate/schemas';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { Metric } from './metric.js';
import { CompositeMetric } from './metrics/composite.js';
import { ExactMatchMetric } from './metrics/exactMatch.js';
import { RankingSimilarityMetric } from './metrics/rankingSimilarity.js';

export interface MetricFactoryInput {
  name?: string;
  minimumScore?: number;
  options: Record<string, unknown>;
}

export type MetricFactory = (input: MetricFactoryInput) => Metric;

const exactMatchOptionsSchema = z.object({ caseSensitive: z.boolean().optional() }).strict();
const rankingOptionsSchema = z.object({ persistence: z.number().gt(0).lte(1).optional() }).strict();

function parseOptions<T>(metric: string, schema: z.ZodType<T>, options: Record<string, unknown>): T {
  const parsed = schema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid options for metric "${metric}": ${parsed.error.issues.map((i) => i.message).join('; ')}`
    );
  }
  return parsed.data;
}

const COMPOSITE = 'composite';

/**
 * Name → factory table used to build metrics from evaluation files. Custom
 * metrics are registered under new names.
 */
export class MetricRegistry {
  private readonly factories = new Map<string, MetricFactory>();

  register(name: string, factory: MetricFactory): this {
    if (name === COMPOSITE || this.factories.has(name)) {
      throw new ConfigurationError(`A metric named "${name}" is already registered`);
    }
    this.factories.set(name, factory);
    return this;
  }

  /** Independent registry with the same factories. */
  copy(): MetricRegistry {
    const copied = new MetricRegistry();
    for (const [name, factory] of this.factories) {
      copied.factories.set(name, factory);
    }
    return copied;
  }

  has(name: string): boolean {
    return name === COMPOSITE || this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys(), COMPOSITE].sort();
  }

  build(spec: MetricSpec): Metric {
    if (spec.metric === COMPOSITE) {
      if (spec.metrics === undefined || spec.metrics.length === 0) {
        throw new ConfigurationError('A composite metric needs a non-empty "metrics" list');
      }
      return new CompositeMetric({
        name: spec.name,
        minimumScore: spec.minimumScore,
        metrics: spec.metrics.map((child) => this.build(child))
      });
    }

    const factory = this.factories.get(spec.metric);
    if (factory === undefined) {
      throw new ConfigurationError(
        `Unknown metric "${spec.metric}". Registered metrics: ${this.names().join(', ')}`
      );
    }
    return factory({ name: spec.name, minimumScore: spec.minimumScore, options: spec.options ?? {} });
  }
}

export function createDefaultRegistry(): MetricRegistry {
  return new MetricRegistry()
    .register('exact_match', ({ name, minimumScore, options }) => {
      const { caseSensitive } = parseOptions('exact_match', exactMatchOptionsSchema, options);
      return new ExactMatchMetric({ name, minimumScore, caseSensitive });
    })
    .register('ranking_similarity', ({ name, minimumScore, options }) => {
      const { persistence } = parseOptions('ranking_similarity', rankingOptionsSchema, options);
      return new RankingSimilarityMetric({ name, minimumScore, persistence });
    });
}
