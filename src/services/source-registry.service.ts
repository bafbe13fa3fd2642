import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { SOURCE_TIERS } from '../pipeline/types.js';
import type { SourceTier, SourceTrust, SourceTrustLookup } from '../pipeline/types.js';
import { AppError } from '../middleware/errorHandler.js';
import { logger } from '../utils/logger.js';

export const INGESTION_TYPES = ['api', 'rss', 'web_crawl'] as const;

export type IngestionType = (typeof INGESTION_TYPES)[number];

const sourceRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  tier: z.enum(SOURCE_TIERS),
  baseTrust: z.number().min(0).max(100),
  active: z.boolean().default(true),
  ingestionType: z.enum(INGESTION_TYPES).default('rss'),
  categories: z.array(z.string()).default([]),
  locales: z.array(z.string()).default([]),
});

export const sourceRegistryFileSchema = z.object({
  sources: z.array(sourceRecordSchema),
});

export type SourceRecordInput = z.input<typeof sourceRecordSchema>;

export interface NewsSource extends z.infer<typeof sourceRecordSchema> {
  failureCount: number;
  lastCrawled: Date | null;
  lastSuccess: Date | null;
}

export interface SourceSelection {
  categories?: string[];
  locale?: string;
  verifiedOnly?: boolean;
  ingestionType?: IngestionType;
}

export interface RegistryStats {
  total: number;
  active: number;
  byTier: Partial<Record<SourceTier, number>>;
  byType: Partial<Record<IngestionType, number>>;
}

const VERIFIED_TIERS: ReadonlySet<SourceTier> = new Set(['whitelist', 'tier1']);

/**
 * In-memory registry of news sources and their runtime health. Serves as the
 * engine's trust lookup; it is never written to during a ranking run.
 */
export class SourceRegistry implements SourceTrustLookup {
  private sources = new Map<string, NewsSource>();
  private maxConsecutiveFailures: number;

  constructor(records: SourceRecordInput[], options: { maxConsecutiveFailures?: number } = {}) {
    this.maxConsecutiveFailures = options.maxConsecutiveFailures ?? 5;

    const parsed = sourceRegistryFileSchema.safeParse({ sources: records });
    if (!parsed.success) {
      throw new AppError(400, 'INVALID_CONFIG', 'Invalid source registry', parsed.error.issues);
    }

    for (const record of parsed.data.sources) {
      if (this.sources.has(record.id)) {
        throw new AppError(400, 'INVALID_CONFIG', `Duplicate source id: ${record.id}`);
      }
      this.sources.set(record.id, { ...record, failureCount: 0, lastCrawled: null, lastSuccess: null });
    }

    logger.info({ sources: this.sources.size }, 'Source registry loaded');
  }

  /** Read and validate a registry JSON file (`{ "sources": [...] }`). */
  static fromFile(filePath: string, options: { maxConsecutiveFailures?: number } = {}): SourceRegistry {
    const absolute = resolve(process.cwd(), filePath);
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(absolute, 'utf8'));
    } catch (error) {
      throw new AppError(500, 'INVALID_CONFIG', `Cannot read source registry at ${absolute}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const file = sourceRegistryFileSchema.safeParse(raw);
    if (!file.success) {
      throw new AppError(400, 'INVALID_CONFIG', 'Invalid source registry', file.error.issues);
    }
    return new SourceRegistry(file.data.sources, options);
  }

  getTrust(sourceId: string): SourceTrust | undefined {
    const source = this.sources.get(sourceId);
    if (!source) return undefined;
    return { sourceId: source.id, tier: source.tier, baseTrust: source.baseTrust };
  }

  get(sourceId: string): NewsSource | undefined {
    return this.sources.get(sourceId);
  }

  getAll(): NewsSource[] {
    return [...this.sources.values()];
  }

  /** Active and not blacklisted. */
  getActiveSources(): NewsSource[] {
    return this.getAll().filter((s) => s.active && s.tier !== 'blacklist');
  }

  getByTier(tier: SourceTier): NewsSource[] {
    return this.getAll().filter((s) => s.tier === tier && s.active);
  }

  getByCategory(category: string): NewsSource[] {
    return this.getActiveSources().filter((s) => s.categories.includes(category));
  }

  getVerifiedSources(): NewsSource[] {
    return this.getAll().filter((s) => s.active && VERIFIED_TIERS.has(s.tier));
  }

  /**
   * Active sources matching every given criterion, highest base trust first.
   * Sources without categories match any category filter.
   */
  selectSources(selection: SourceSelection = {}): NewsSource[] {
    let candidates = this.getActiveSources();

    if (selection.verifiedOnly) {
      candidates = candidates.filter((s) => VERIFIED_TIERS.has(s.tier));
    }
    const categories = selection.categories;
    if (categories && categories.length > 0) {
      candidates = candidates.filter(
        (s) => s.categories.length === 0 || categories.some((c) => s.categories.includes(c)),
      );
    }
    const locale = selection.locale;
    if (locale) {
      candidates = candidates.filter((s) => s.locales.includes(locale));
    }
    if (selection.ingestionType) {
      candidates = candidates.filter((s) => s.ingestionType === selection.ingestionType);
    }

    // stable sort keeps registry order among equal trust
    return candidates.sort((a, b) => b.baseTrust - a.baseTrust);
  }

  recordSuccess(sourceId: string): void {
    const source = this.sources.get(sourceId);
    if (!source) return;
    const now = new Date();
    source.lastCrawled = now;
    source.lastSuccess = now;
    source.failureCount = 0;
    logger.debug({ sourceId }, 'Source fetch succeeded');
  }

  /** Deactivates the source once it reaches the consecutive-failure limit. */
  recordFailure(sourceId: string): void {
    const source = this.sources.get(sourceId);
    if (!source) return;
    source.lastCrawled = new Date();
    source.failureCount += 1;
    logger.warn({ sourceId, failureCount: source.failureCount }, 'Source fetch failed');

    if (source.failureCount >= this.maxConsecutiveFailures && source.active) {
      source.active = false;
      logger.error({ sourceId, failureCount: source.failureCount }, 'Source deactivated after repeated failures');
    }
  }

  /** Blacklisted sources stay inactive. */
  reactivate(sourceId: string): boolean {
    const source = this.sources.get(sourceId);
    if (!source || source.tier === 'blacklist') return false;
    source.active = true;
    source.failureCount = 0;
    logger.info({ sourceId }, 'Source reactivated');
    return true;
  }

  getStats(): RegistryStats {
    const byTier: RegistryStats['byTier'] = {};
    const byType: RegistryStats['byType'] = {};
    for (const source of this.sources.values()) {
      byTier[source.tier] = (byTier[source.tier] ?? 0) + 1;
      byType[source.ingestionType] = (byType[source.ingestionType] ?? 0) + 1;
    }
    return {
      total: this.sources.size,
      active: this.getActiveSources().length,
      byTier,
      byType,
    };
  }
}
