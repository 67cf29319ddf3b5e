/**
 * Page parameter normalization
 */

import { describe, it, expect } from 'vitest';

import {
  MAX_PAGE,
  MAX_PAGE_OFFSET,
  MAX_PER_PAGE,
  countPages,
  normalizePageParams,
  pageOffset,
} from '@/types/index.js';

describe('normalizePageParams', () => {
  it('should default to page 1 of 10', () => {
    expect(normalizePageParams({})).toEqual({ page: 1, perPage: 10 });
  });

  it('should raise page and perPage to at least 1', () => {
    expect(normalizePageParams({ page: 0, perPage: -5 })).toEqual({
      page: 1,
      perPage: 1,
    });
  });

  it('should clamp perPage to 100', () => {
    expect(normalizePageParams({ perPage: 1000 }).perPage).toBe(100);
  });

  it('should floor fractional values', () => {
    expect(normalizePageParams({ page: 2.9, perPage: 15.5 })).toEqual({
      page: 2,
      perPage: 15,
    });
  });
});

describe('pageOffset', () => {
  it('should skip the earlier pages', () => {
    expect(pageOffset({ page: 1, perPage: 10 })).toBe(0);
    expect(pageOffset({ page: 4, perPage: 25 })).toBe(75);
  });
});

describe('countPages', () => {
  it('should round up partial pages', () => {
    expect(countPages(0, 10)).toBe(0);
    expect(countPages(10, 10)).toBe(1);
    expect(countPages(11, 10)).toBe(2);
  });
});

describe('MAX_PAGE', () => {
  it('should keep the offset of the last page within the query range', () => {
    expect(MAX_PAGE).toBe(21_474_837);
    expect(pageOffset({ page: MAX_PAGE, perPage: MAX_PER_PAGE })).toBe(
      2_147_483_600
    );
    expect(
      pageOffset({ page: MAX_PAGE + 1, perPage: MAX_PER_PAGE })
    ).toBeGreaterThan(MAX_PAGE_OFFSET);
  });
});
