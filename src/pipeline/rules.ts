/**
 * Rule tables for integrity, evidence and sensationalism scoring.
 *
 * Every detector is data: a name, a weight and a predicate. Scoring code
 * iterates the tables once per article, so adding a detector never touches
 * control flow.
 */

export interface TextContext {
  title: string;
  body: string;
  /** Lower-cased body + title. */
  text: string;
}

export interface Detector {
  name: string;
  weight: number;
  detect(ctx: TextContext): boolean;
}

export interface PatternRule {
  name: string;
  weight: number;
  pattern: RegExp;
}

export const AD_KEYWORDS = [
  'click here',
  'buy now',
  'shop now',
  'limited offer',
  'free shipping',
  'discount code',
  'sponsored',
  'promoted',
  '클릭',
  '지금구매',
  '할인',
  '특가',
  '무료배송',
  '광고',
];

export const ILLEGAL_KEYWORDS = ['gambling', 'casino', 'online betting', '도박', '카지노', '성인', '음란'];

export const SENSATIONAL_TITLE_PATTERNS: RegExp[] = [
  /\[(충격|경악)\]/,
  /놀라운\s(발표|비밀|진실)/,
  /\d+번\s(이것|저것)/,
  /이\s사실일\s리\s없다/,
  /you won'?t believe/i,
  /what happened next/i,
  /this one (weird )?(trick|secret)/i,
];

/** Tokens ignored when measuring vocabulary density. */
export const FUNCTION_WORDS = new Set([
  '의', '이', '가', '을', '를', '에', '에서', '로', '과', '그리고', '또는', '있다', '하다', '되다',
  'the', 'of', 'to', 'and', 'or', 'in', 'on', 'at', 'for', 'is', 'are', 'was', 'were', 'be', 'it',
  'that', 'this', 'with', 'as', 'by',
]);

/** Tokens ignored when building paragraph keyword sets. */
export const STOPWORDS = new Set([
  '의', '이', '그', '저', '것', '수', '등', '같은', '있다', '하다',
  'and', 'the', 'is', 'for', 'that', 'this', 'with', 'from', 'are', 'was', 'were', 'has', 'have',
  'but', 'not', 'its',
]);

export const REPETITION_RATIO_LIMIT = 0.3;
export const MIN_VOCABULARY_DENSITY = 0.4;

function sentences(body: string): string[] {
  return body
    .split(/[.!?。]/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function repeatedSentenceRatio(body: string): number {
  const all = sentences(body);
  if (all.length < 3) return 0;
  return 1 - new Set(all).size / all.length;
}

export function vocabularyDensity(text: string): number {
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  if (words.length === 0) return 1;
  const meaningful = words.filter((w) => w.length > 1 && !FUNCTION_WORDS.has(w));
  return meaningful.length / words.length;
}

/** Spam / advertising detectors; penalties are summed and capped at 1. */
export const SPAM_DETECTORS: Detector[] = [
  {
    name: 'repetitive_content',
    weight: 0.3,
    detect: (ctx) => repeatedSentenceRatio(ctx.body) > REPETITION_RATIO_LIMIT,
  },
  {
    name: 'ad_content',
    weight: 0.3,
    detect: (ctx) => AD_KEYWORDS.some((kw) => ctx.text.includes(kw)),
  },
  {
    name: 'illegal_content',
    weight: 0.5,
    detect: (ctx) => ILLEGAL_KEYWORDS.some((kw) => ctx.text.includes(kw)),
  },
  {
    name: 'low_content_quality',
    weight: 0.2,
    detect: (ctx) => vocabularyDensity(ctx.text) < MIN_VOCABULARY_DENSITY,
  },
  {
    name: 'sensational_title',
    weight: 0.1,
    detect: (ctx) => SENSATIONAL_TITLE_PATTERNS.some((p) => p.test(ctx.title)),
  },
];

export interface EvidenceRule {
  name: string;
  pattern: RegExp;
}

/**
 * Evidence signals in the body. Each matched rule adds an equal share, so a
 * body matching every rule scores 1 before the length bonus.
 */
export const EVIDENCE_RULES: EvidenceRule[] = [
  {
    name: 'numeric_statistics',
    pattern: /\d+(?:[.,]\d+)*\s*(?:%|percent\b|per cent\b|million\b|billion\b|trillion\b|억|만|조)/i,
  },
  {
    name: 'direct_quotation',
    pattern: /["“][^"”]{8,}["”]/,
  },
  {
    name: 'official_statement',
    pattern: /\b(?:according to|said in a statement|spokesperson|officials? (?:said|confirmed))\b|밝혔다|발표했다|관계자는|대변인/i,
  },
  {
    name: 'report_reference',
    pattern: /\b(?:reports?|stud(?:y|ies)|surveys?|research)\b|보고서|연구\s?결과|발표\s?자료/i,
  },
  {
    name: 'reference_link',
    pattern: /https?:\/\/[^\s)]+/i,
  },
];

export const LENGTH_BONUS_CAP = 0.2;
/** Body characters per 1.0 of length bonus, before the cap. */
export const LENGTH_BONUS_CHARS = 5000;

/** Matched case-insensitively as substrings of the title; each word counts once. */
export const SENSATIONAL_WORDS = [
  '충격',
  '경악',
  '발칵',
  '폭탄',
  '대박',
  '역대급',
  '초대형',
  '긴급',
  '속보',
  '단독',
  'breaking',
  'shock',
  'unbelievable',
  'jaw-dropping',
  'mind-blowing',
  'bombshell',
  'outrageous',
  'insane',
  '실화',
  '소름',
];

export const SENSATIONAL_WORD_PENALTY = 0.15;
export const SENSATIONAL_WORD_CAP = 0.5;

/** Every occurrence of a pattern adds its weight; patterns must be global. */
export const EMPHASIS_RULES: PatternRule[] = [
  { name: 'repeated_punctuation', weight: 0.1, pattern: /[!?]{2,}/g },
  { name: 'all_caps_run', weight: 0.1, pattern: /\b[A-Z]{3,}(?:\s+[A-Z]{3,})+\b/g },
  { name: 'laughter', weight: 0.1, pattern: /[ㅋㅎ]{2,}/g },
];

export const EMPHASIS_CAP = 0.2;
