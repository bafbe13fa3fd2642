/**
 * Pipeline component interfaces.
 *
 *   Source     -> produces raw candidates
 *   Hydrator   -> enriches candidates with lookup data
 *   Filter     -> partitions candidates into kept / removed
 *   Scorer     -> adds named scores
 *   Selector   -> orders candidates
 *   SideEffect -> runs after selection without blocking the result
 */

import type { FilterResult } from './types.js';

/**
 * Source fetches raw candidates. Multiple sources run in parallel and their
 * results are concatenated in declaration order.
 */
export interface Source<Q, C> {
  name: string;
  enable(query: Q): boolean;
  getCandidates(query: Q): Promise<C[]>;
}

/**
 * Hydrator enriches candidates with additional data after sourcing.
 * Must return the same number of candidates in the same order.
 */
export interface Hydrator<Q, C> {
  name: string;
  enable(query: Q): boolean;
  hydrate(query: Q, candidates: C[]): Promise<C[]>;
}

/**
 * Filter partitions candidates into kept and removed sets.
 * Filters run sequentially; each sees the output of the previous.
 */
export interface Filter<Q, C> {
  name: string;
  enable(query: Q): boolean;
  filter(query: Q, candidates: C[]): Promise<FilterResult<C>>;
}

/**
 * Scorer adds its own named scores to each candidate. Scorers run
 * concurrently over the same input and must not read each other's fields;
 * the pipeline merges their outputs once all have completed.
 *
 * IMPORTANT: Must return the same candidates in the same order.
 * Dropping candidates in a scorer is not allowed; use a Filter instead.
 */
export interface Scorer<Q, C> {
  name: string;
  enable(query: Q): boolean;
  score(query: Q, candidates: C[]): Promise<C[]>;
}

/** Selector orders scored candidates. Truncation is left to the pipeline. */
export interface Selector<Q, C> {
  name: string;
  enable(query: Q): boolean;
  select(query: Q, candidates: C[]): C[];
}

/**
 * SideEffect runs asynchronous operations after selection (logging, metrics).
 * Fire-and-forget: does not block the result.
 */
export interface SideEffect<Q, C> {
  name: string;
  enable(query: Q): boolean;
  run(query: Q, selectedCandidates: C[]): Promise<void>;
}
