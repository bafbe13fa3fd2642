/**
 * Candidate filters: partition candidates into kept and removed sets.
 *
 * Deduplication (pre-scoring, in this order):
 *   - UrlIdentityFilter        (stage A: normalized URL)
 *   - TitleIdentityFilter      (stage B: normalized title hash)
 *   - SimilarityClusterFilter  (stage C: Jaccard connected components)
 *
 * Policy (post-scoring):
 *   - PolicyFilter             (exclude low integrity / high spam, flag low credibility)
 *
 * Post-selection:
 *   - SourceDiversityFilter    (per-source cap, single order-preserving pass)
 */

import type { Filter } from './interfaces.js';
import type {
  ArticleCandidate,
  ClusterMember,
  FilterResult,
  PolicyThresholds,
  RankingQuery,
} from './types.js';
import { SimilarityGraph } from './similarity.js';
import type { SimilarityNode } from './similarity.js';
import { requireCompleteScores } from './score-vector.js';
import { hashTitle } from '../utils/helpers.js';

export const POLICY_FLAGS = {
  lowIntegrity: 'low_integrity',
  spamDetected: 'spam_detected',
  suspiciousCredibility: 'suspicious_credibility',
} as const;

function byArrival(a: ClusterMember, b: ClusterMember): number {
  return a.arrivalIndex - b.arrivalIndex;
}

/** Fold the clusters of `absorbed` into the cluster of `survivor`. */
export function absorbInto(survivor: ArticleCandidate, absorbed: ArticleCandidate[]): ArticleCandidate {
  if (absorbed.length === 0) return survivor;
  const members = [survivor, ...absorbed].flatMap((c) => c.cluster.members).sort(byArrival);
  return {
    ...survivor,
    cluster: { representativeId: survivor.article.id, members },
  };
}

export function toSimilarityNode(candidate: ArticleCandidate): SimilarityNode {
  return { key: candidate.arrivalIndex, title: candidate.article.title };
}

/**
 * Keep the first-seen candidate per key; later ones are absorbed into its
 * cluster. Candidates with an empty key are never grouped.
 */
function dedupeByKey(
  candidates: ArticleCandidate[],
  keyOf: (candidate: ArticleCandidate) => string,
): FilterResult<ArticleCandidate> {
  const firstSeen = new Map<string, number>();
  const absorbed = new Map<number, ArticleCandidate[]>();
  const survivors: ArticleCandidate[] = [];
  const removed: ArticleCandidate[] = [];

  for (const c of candidates) {
    const key = keyOf(c);
    const at = key ? firstSeen.get(key) : undefined;
    if (at === undefined) {
      if (key) firstSeen.set(key, survivors.length);
      survivors.push(c);
      continue;
    }
    const group = absorbed.get(at);
    if (group) group.push(c);
    else absorbed.set(at, [c]);
    removed.push(c);
  }

  const kept = survivors.map((c, i) => absorbInto(c, absorbed.get(i) ?? []));
  return { kept, removed };
}

/** Stage A: URLs that normalize identically are duplicates; first-seen wins. */
export class UrlIdentityFilter<Q = RankingQuery> implements Filter<Q, ArticleCandidate> {
  name = 'UrlIdentityFilter';

  enable(): boolean {
    return true;
  }

  async filter(_query: Q, candidates: ArticleCandidate[]): Promise<FilterResult<ArticleCandidate>> {
    return dedupeByKey(candidates, (c) => c.normalizedUrl);
  }
}

/** Stage B: byte-identical headlines after trim / case-fold; first-seen wins. */
export class TitleIdentityFilter<Q = RankingQuery> implements Filter<Q, ArticleCandidate> {
  name = 'TitleIdentityFilter';

  enable(): boolean {
    return true;
  }

  async filter(_query: Q, candidates: ArticleCandidate[]): Promise<FilterResult<ArticleCandidate>> {
    return dedupeByKey(candidates, (c) => (c.article.title.trim() ? hashTitle(c.article.title) : ''));
  }
}

/**
 * Longest body wins; ties go to the earliest arrival. `members` must be in
 * arrival order.
 */
export function pickRepresentative(members: ArticleCandidate[]): ArticleCandidate {
  let best = members[0];
  for (const c of members.slice(1)) {
    if (c.article.body.length > best.article.body.length) best = c;
  }
  return best;
}

/**
 * Stage C: title-token Jaccard clustering. Pairs at or above the threshold
 * are edges; clusters are connected components, so similarity is transitive.
 * All pairs are evaluated before components are merged.
 */
export class SimilarityClusterFilter<Q = RankingQuery> implements Filter<Q, ArticleCandidate> {
  name = 'SimilarityClusterFilter';
  private graph: SimilarityGraph;
  private threshold: number;

  constructor(graph: SimilarityGraph, threshold = 0.6) {
    this.graph = graph;
    this.threshold = threshold;
  }

  enable(): boolean {
    return true;
  }

  async filter(_query: Q, candidates: ArticleCandidate[]): Promise<FilterResult<ArticleCandidate>> {
    const nodes = candidates.map(toSimilarityNode);
    this.graph.build(nodes);

    const kept: ArticleCandidate[] = [];
    const removed: ArticleCandidate[] = [];

    for (const component of this.graph.components(nodes, this.threshold)) {
      const members = component.map((i) => candidates[i]);
      const representative = pickRepresentative(members);
      const others = members.filter((c) => c !== representative);
      kept.push(absorbInto(representative, others));
      removed.push(...others);
    }

    return { kept, removed };
  }
}

/**
 * Exclude candidates below the integrity floor or above the spam ceiling;
 * keep low-credibility candidates but flag them.
 */
export class PolicyFilter implements Filter<RankingQuery, ArticleCandidate> {
  name = 'PolicyFilter';
  private thresholds: PolicyThresholds;

  constructor(thresholds: PolicyThresholds) {
    this.thresholds = thresholds;
  }

  enable(): boolean {
    return true;
  }

  async filter(_query: RankingQuery, candidates: ArticleCandidate[]): Promise<FilterResult<ArticleCandidate>> {
    const kept: ArticleCandidate[] = [];
    const removed: ArticleCandidate[] = [];

    for (const c of candidates) {
      const scores = requireCompleteScores(c);
      const flags: string[] = [];
      let exclude = false;

      if (scores.integrity < this.thresholds.minIntegrity) {
        flags.push(POLICY_FLAGS.lowIntegrity);
        exclude = true;
      }
      if (scores.spam > this.thresholds.maxSpam) {
        flags.push(POLICY_FLAGS.spamDetected);
        exclude = true;
      }
      if (scores.credibility < this.thresholds.minCredibility) {
        flags.push(POLICY_FLAGS.suspiciousCredibility);
      }

      const flagged = { ...c, policyFlags: [...c.policyFlags, ...flags] };
      if (exclude) removed.push(flagged);
      else kept.push(flagged);
    }

    return { kept, removed };
  }
}

/**
 * Post-selection filter: at most `query.diversityCap` candidates per source.
 * One pass in ranked order; a skipped candidate is never replaced by a later
 * one from the same source.
 */
export class SourceDiversityFilter implements Filter<RankingQuery, ArticleCandidate> {
  name = 'SourceDiversityFilter';

  enable(): boolean {
    return true;
  }

  async filter(query: RankingQuery, candidates: ArticleCandidate[]): Promise<FilterResult<ArticleCandidate>> {
    const sourceCount = new Map<string, number>();
    const kept: ArticleCandidate[] = [];
    const removed: ArticleCandidate[] = [];

    for (const c of candidates) {
      const count = sourceCount.get(c.article.sourceId) || 0;
      if (count >= query.diversityCap) {
        removed.push(c);
      } else {
        sourceCount.set(c.article.sourceId, count + 1);
        kept.push(c);
      }
    }

    return { kept, removed };
  }
}
