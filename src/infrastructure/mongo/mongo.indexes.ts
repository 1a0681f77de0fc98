import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

export type IndexPlanEntry = { keys: IndexSpecification; options: CreateIndexesOptions };

/**
 * Index plan for the failure collections (one pair per chain label):
 * - { job: 1 } for per-job lookups
 * - { timestamp: 1 } for time-window queries
 */
export const mongoIndexes: { failureCollection: IndexPlanEntry[] } = {
  failureCollection: [
    { keys: { job: 1 }, options: {} },
    { keys: { timestamp: 1 }, options: {} }
  ]
};

export const failureCollectionNames = (chainLabel: string) => ({
  reachability: `${chainLabel}_reachability_errors`,
  endpoint: `${chainLabel}_operator_errors`
});

export const COUNTERS_COLLECTION = "counters";
export const WATERMARKS_COLLECTION = "watermarks";
