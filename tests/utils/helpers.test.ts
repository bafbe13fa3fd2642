import { describe, it, expect } from 'vitest';
import {
  clamp,
  generateRequestId,
  hashTitle,
  hoursBetween,
  normalizeTitle,
  normalizeUrl,
  parseTimestamp,
  roundTo,
} from '../../src/utils/helpers.js';

describe('normalizeUrl', () => {
  it('should drop the query, fragment and trailing slash', () => {
    expect(normalizeUrl('https://News.Example.com/world/story/?utm_source=feed#top')).toBe(
      'https://news.example.com/world/story',
    );
  });

  it('should keep the path case', () => {
    expect(normalizeUrl('https://news.example.com/World/Story')).toBe('https://news.example.com/World/Story');
  });

  it('should normalize strings that are not absolute URLs', () => {
    expect(normalizeUrl('News.Example.com/a/b/?x=1')).toBe('news.example.com/a/b');
  });

  it('should return an empty string for blank input', () => {
    expect(normalizeUrl('   ')).toBe('');
  });
});

describe('title normalization', () => {
  it('should trim, case-fold and collapse whitespace', () => {
    expect(normalizeTitle('  Budget   Passes\tFinal VOTE ')).toBe('budget passes final vote');
  });

  it('should hash equivalent titles identically', () => {
    expect(hashTitle('Budget Passes')).toBe(hashTitle(' budget  passes'));
    expect(hashTitle('Budget Passes')).not.toBe(hashTitle('Budget Fails'));
    expect(hashTitle('x')).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('numeric helpers', () => {
  it('should clamp to the unit interval by default', () => {
    expect(clamp(1.2)).toBe(1);
    expect(clamp(-0.1)).toBe(0);
    expect(clamp(0.4)).toBe(0.4);
    expect(clamp(Number.NaN)).toBe(0);
    expect(clamp(150, 0, 100)).toBe(100);
  });

  it('should round to the given digits', () => {
    expect(roundTo(68.04, 1)).toBe(68);
    expect(roundTo(12.36, 1)).toBe(12.4);
  });

  it('should measure hours between timestamps', () => {
    expect(hoursBetween(0, 90 * 60 * 1000)).toBe(1.5);
  });
});

describe('parseTimestamp', () => {
  it('should parse ISO timestamps', () => {
    expect(parseTimestamp('2026-01-15T12:00:00Z')).toBe(Date.UTC(2026, 0, 15, 12));
  });

  it('should return null for missing or invalid values', () => {
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
    expect(parseTimestamp('')).toBeNull();
    expect(parseTimestamp('not a date')).toBeNull();
  });
});

describe('generateRequestId', () => {
  it('should prefix a UUID', () => {
    expect(generateRequestId()).toMatch(/^rank_[0-9a-f-]{36}$/);
  });
});
