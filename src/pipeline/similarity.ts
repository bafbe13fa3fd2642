/**
 * Lexical title similarity shared by clustering and corroboration.
 *
 * `SimilarityGraph` memoises pairwise Jaccard scores for one ranking run, so
 * the pairs evaluated while clustering are reused when counting corroborating
 * articles instead of being recomputed.
 */

export interface SimilarityNode {
  /** Unique per run; the candidate's arrival index. */
  key: number;
  title: string;
}

/** Lower-cased, whitespace-delimited title tokens. */
export function titleTokens(title: string): Set<string> {
  return new Set(
    title
      .toLowerCase()
      .split(/\s+/)
      .filter((token) => token.length > 0),
  );
}

/** |A ∩ B| / |A ∪ B|; 0 when either set is empty. */
export function jaccard<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

export class DisjointSet {
  private parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(x: number): number {
    let root = x;
    while (this.parent[root] !== root) root = this.parent[root];
    // path compression
    let node = x;
    while (this.parent[node] !== root) {
      const next = this.parent[node];
      this.parent[node] = root;
      node = next;
    }
    return root;
  }

  /** Union keeping the smaller index as root, so roots are deterministic. */
  union(a: number, b: number): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;
    if (rootA < rootB) this.parent[rootB] = rootA;
    else this.parent[rootA] = rootB;
  }
}

export class SimilarityGraph {
  private tokens = new Map<number, Set<string>>();
  private scores = new Map<string, number>();

  /** Evaluate every unordered pair of `nodes` up front. */
  build(nodes: readonly SimilarityNode[]): void {
    for (let i = 0; i < nodes.length; i++) {
      for (let j = i + 1; j < nodes.length; j++) {
        this.similarity(nodes[i], nodes[j]);
      }
    }
  }

  similarity(a: SimilarityNode, b: SimilarityNode): number {
    const pairKey = a.key < b.key ? `${a.key}:${b.key}` : `${b.key}:${a.key}`;
    const cached = this.scores.get(pairKey);
    if (cached !== undefined) return cached;

    const score = jaccard(this.tokensOf(a), this.tokensOf(b));
    this.scores.set(pairKey, score);
    return score;
  }

  tokenCount(node: SimilarityNode): number {
    return this.tokensOf(node).size;
  }

  /**
   * Connected components of the graph whose edges are pairs at or above
   * `threshold`. Each component lists positions into `nodes` in ascending
   * order; components are ordered by their first position.
   */
  components(nodes: readonly SimilarityNode[], threshold: number): number[][] {
    const sets = new DisjointSet(nodes.length);
    for (let i = 0; i < nodes.length; i++) {
      for (let j = i + 1; j < nodes.length; j++) {
        if (this.similarity(nodes[i], nodes[j]) >= threshold) {
          sets.union(i, j);
        }
      }
    }

    const byRoot = new Map<number, number[]>();
    for (let i = 0; i < nodes.length; i++) {
      const root = sets.find(i);
      const component = byRoot.get(root);
      if (component) component.push(i);
      else byRoot.set(root, [i]);
    }
    // Map preserves insertion order, and a root is first inserted at its smallest position
    return [...byRoot.values()];
  }

  private tokensOf(node: SimilarityNode): Set<string> {
    let tokens = this.tokens.get(node.key);
    if (!tokens) {
      tokens = titleTokens(node.title);
      this.tokens.set(node.key, tokens);
    }
    return tokens;
  }
}
