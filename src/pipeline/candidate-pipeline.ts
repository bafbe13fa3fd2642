/**
 * CandidatePipeline: the core orchestrator.
 *
 * Executes: source -> hydrate -> filter -> score -> policy filter ->
 * select -> post-selection filter -> truncate -> side effects.
 *
 *   1. Sources run in parallel; results are concatenated in declaration order.
 *   2. Hydrators and filters run sequentially so each sees the prior output.
 *   3. Scorers run concurrently on the same input; their outputs are merged
 *      per candidate once every scorer has finished.
 *   4. Side effects are fire-and-forget (not awaited).
 *   5. A failing component aborts the run with PIPELINE_STAGE_FAILED. A ranking
 *      built on a skipped filter or a partial score vector is never returned.
 */

import { logger } from '../utils/logger.js';
import { AppError } from '../middleware/errorHandler.js';
import type { Source, Hydrator, Filter, Scorer, Selector, SideEffect } from './interfaces.js';
import { PipelineStage } from './types.js';
import type { FilterResult, PipelineResult, PipelineMetrics } from './types.js';

export interface CandidatePipelineConfig<Q, C> {
  name: string;
  sources: Source<Q, C>[];
  hydrators: Hydrator<Q, C>[];
  filters: Filter<Q, C>[];
  scorers: Scorer<Q, C>[];
  /** Join one candidate with each scorer's version of it (scorer order). */
  mergeScored: (base: C, scored: C[]) => C;
  policyFilters: Filter<Q, C>[];
  selector: Selector<Q, C>;
  postSelectionFilters: Filter<Q, C>[];
  sideEffects: SideEffect<Q, C>[];
}

export interface PipelineQuery {
  requestId: string;
  limit: number;
  offset: number;
}

export class CandidatePipeline<Q extends PipelineQuery, C> {
  private config: CandidatePipelineConfig<Q, C>;

  constructor(config: CandidatePipelineConfig<Q, C>) {
    this.config = config;
  }

  async execute(query: Q): Promise<PipelineResult<Q, C>> {
    const pipelineStart = Date.now();
    const stageMetrics: PipelineMetrics['stageMetrics'] = {};
    const requestId = query.requestId;

    // 1. Fetch candidates from all sources (parallel)
    const sourceStart = Date.now();
    const candidates = await this.fetchCandidates(query);
    stageMetrics[PipelineStage.Source] = {
      durationMs: Date.now() - sourceStart,
      candidateCount: candidates.length,
    };
    logger.debug({ requestId, count: candidates.length }, 'Pipeline: sourced candidates');

    // 2. Hydrate candidates
    const hydStart = Date.now();
    const hydratedCandidates = await this.hydrateCandidates(query, candidates);
    stageMetrics[PipelineStage.Hydrator] = {
      durationMs: Date.now() - hydStart,
      candidateCount: hydratedCandidates.length,
    };

    // 3. Filter (sequential)
    const filterStart = Date.now();
    const filtered = await this.runFilters(query, hydratedCandidates, this.config.filters, PipelineStage.Filter);
    stageMetrics[PipelineStage.Filter] = {
      durationMs: Date.now() - filterStart,
      candidateCount: filtered.kept.length,
    };
    logger.debug(
      { requestId, kept: filtered.kept.length, removed: filtered.removed.length },
      'Pipeline: filtered candidates',
    );

    // 4. Score (concurrent, merged)
    const scoreStart = Date.now();
    const scored = await this.scoreCandidates(query, filtered.kept);
    stageMetrics[PipelineStage.Scorer] = {
      durationMs: Date.now() - scoreStart,
      candidateCount: scored.length,
    };

    // 5. Policy filters
    const policyStart = Date.now();
    const policy = await this.runFilters(query, scored, this.config.policyFilters, PipelineStage.PolicyFilter);
    stageMetrics[PipelineStage.PolicyFilter] = {
      durationMs: Date.now() - policyStart,
      candidateCount: policy.kept.length,
    };

    // 6. Order
    const selectStart = Date.now();
    let selected = this.selectCandidates(query, policy.kept);
    stageMetrics[PipelineStage.Selector] = {
      durationMs: Date.now() - selectStart,
      candidateCount: selected.length,
    };

    // 7. Post-selection filters
    const postFilterStart = Date.now();
    const postFiltered = await this.runFilters(
      query,
      selected,
      this.config.postSelectionFilters,
      PipelineStage.PostSelectionFilter,
    );
    selected = postFiltered.kept;
    stageMetrics[PipelineStage.PostSelectionFilter] = {
      durationMs: Date.now() - postFilterStart,
      candidateCount: selected.length,
    };

    // 8. Page window
    selected = selected.slice(query.offset, query.offset + query.limit);

    // 9. Fire-and-forget side effects
    this.runSideEffects(query, selected);

    const totalMs = Date.now() - pipelineStart;
    logger.info(
      { requestId, totalMs, finalCount: selected.length, pipeline: this.config.name },
      'Pipeline: execution complete',
    );

    return {
      query,
      retrievedCandidates: hydratedCandidates,
      filteredCandidates: [...filtered.removed, ...policy.removed, ...postFiltered.removed],
      removedByStage: {
        [PipelineStage.Filter]: filtered.removed,
        [PipelineStage.PolicyFilter]: policy.removed,
        [PipelineStage.PostSelectionFilter]: postFiltered.removed,
      },
      scoredCandidates: scored,
      selectedCandidates: selected,
      pipelineMetrics: { totalMs, stageMetrics },
    };
  }

  // --- Private stage methods ---

  private async fetchCandidates(query: Q): Promise<C[]> {
    const enabled = this.config.sources.filter((s) => s.enable(query));
    const results = await Promise.allSettled(enabled.map((s) => s.getCandidates(query)));

    const collected: C[] = [];
    for (let i = 0; i < enabled.length; i++) {
      const result = results[i];
      if (result.status === 'rejected') {
        throw this.stageFailure(query, PipelineStage.Source, enabled[i].name, result.reason);
      }
      logger.debug(
        { requestId: query.requestId, source: enabled[i].name, count: result.value.length },
        'Pipeline: source fetched candidates',
      );
      collected.push(...result.value);
    }
    return collected;
  }

  private async hydrateCandidates(query: Q, candidates: C[]): Promise<C[]> {
    let current = candidates;
    for (const hydrator of this.config.hydrators.filter((h) => h.enable(query))) {
      let hydrated: C[];
      try {
        hydrated = await hydrator.hydrate(query, current);
      } catch (error) {
        throw this.stageFailure(query, PipelineStage.Hydrator, hydrator.name, error);
      }
      this.assertSameLength(query, PipelineStage.Hydrator, hydrator.name, current, hydrated);
      current = hydrated;
    }
    return current;
  }

  private async runFilters(
    query: Q,
    candidates: C[],
    filters: Filter<Q, C>[],
    stage: PipelineStage,
  ): Promise<FilterResult<C>> {
    let current = candidates;
    const allRemoved: C[] = [];

    for (const filter of filters.filter((f) => f.enable(query))) {
      let result: FilterResult<C>;
      try {
        result = await filter.filter(query, current);
      } catch (error) {
        throw this.stageFailure(query, stage, filter.name, error);
      }
      current = result.kept;
      allRemoved.push(...result.removed);
    }

    return { kept: current, removed: allRemoved };
  }

  private async scoreCandidates(query: Q, candidates: C[]): Promise<C[]> {
    const enabled = this.config.scorers.filter((s) => s.enable(query));
    if (enabled.length === 0) return candidates;

    const results = await Promise.allSettled(enabled.map((s) => s.score(query, candidates)));

    const outputs: C[][] = [];
    for (let i = 0; i < enabled.length; i++) {
      const result = results[i];
      if (result.status === 'rejected') {
        throw this.stageFailure(query, PipelineStage.Scorer, enabled[i].name, result.reason);
      }
      this.assertSameLength(query, PipelineStage.Scorer, enabled[i].name, candidates, result.value);
      outputs.push(result.value);
    }

    return candidates.map((candidate, index) =>
      this.config.mergeScored(
        candidate,
        outputs.map((output) => output[index]),
      ),
    );
  }

  private selectCandidates(query: Q, candidates: C[]): C[] {
    const selector = this.config.selector;
    if (!selector.enable(query)) return candidates;
    try {
      return selector.select(query, candidates);
    } catch (error) {
      throw this.stageFailure(query, PipelineStage.Selector, selector.name, error);
    }
  }

  private runSideEffects(query: Q, selected: C[]): void {
    const enabled = this.config.sideEffects.filter((se) => se.enable(query));
    Promise.allSettled(enabled.map((se) => se.run(query, selected)))
      .then((results) => {
        results.forEach((result, i) => {
          if (result.status === 'rejected') {
            logger.warn(
              { requestId: query.requestId, component: enabled[i].name, error: result.reason },
              'Pipeline: side effect failed',
            );
          }
        });
      })
      .catch((err) => {
        logger.error({ error: err }, 'Pipeline: side effect error');
      });
  }

  private assertSameLength(query: Q, stage: PipelineStage, component: string, before: C[], after: C[]): void {
    if (before.length !== after.length) {
      throw this.stageFailure(
        query,
        stage,
        component,
        new Error(`expected ${before.length} candidates, got ${after.length}`),
      );
    }
  }

  private stageFailure(query: Q, stage: PipelineStage, component: string, error: unknown): AppError {
    if (error instanceof AppError) return error;
    logger.error({ requestId: query.requestId, stage, component, error }, 'Pipeline: component failed');
    return new AppError(500, 'PIPELINE_STAGE_FAILED', `${stage} component ${component} failed`, {
      stage,
      component,
    });
  }
}
