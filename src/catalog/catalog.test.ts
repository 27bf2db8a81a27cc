/**
 * Query Catalog Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  buildQueryCatalog,
  renderQuery,
  CITIES,
  QUERY_TEMPLATES,
  LEGACY_QUERIES,
} from './queries.js';

describe('renderQuery', () => {
  it('replaces the city token', () => {
    expect(renderQuery('pickleball courts near {city}', 'Mesa, AZ')).toBe(
      'pickleball courts near Mesa, AZ'
    );
  });

  it('replaces every occurrence', () => {
    expect(renderQuery('{city} / {city}', 'Tampa, FL')).toBe('Tampa, FL / Tampa, FL');
  });
});

describe('buildQueryCatalog', () => {
  it('produces template × city in template-major order', () => {
    expect(buildQueryCatalog(['a {city}', 'b {city}'], ['X', 'Y'])).toEqual([
      'a X',
      'a Y',
      'b X',
      'b Y',
    ]);
  });

  it('drops duplicate queries but keeps first position', () => {
    expect(buildQueryCatalog(['courts {city}', 'courts {city}', 'static'], ['X', 'Y'])).toEqual([
      'courts X',
      'courts Y',
      'static',
    ]);
  });

  it('is deterministic', () => {
    expect(buildQueryCatalog()).toEqual(buildQueryCatalog());
  });

  it('covers every template and city by default', () => {
    expect(buildQueryCatalog()).toHaveLength(QUERY_TEMPLATES.length * CITIES.length);
  });

  it('returns an empty list for no cities', () => {
    expect(buildQueryCatalog(QUERY_TEMPLATES, [])).toEqual([]);
  });
});

describe('LEGACY_QUERIES', () => {
  it('is the first template over every city', () => {
    expect(LEGACY_QUERIES).toHaveLength(CITIES.length);
    expect(LEGACY_QUERIES[0]).toBe('pickleball courts near Phoenix, AZ');
    expect(LEGACY_QUERIES[LEGACY_QUERIES.length - 1]).toBe('pickleball courts near Pittsburgh, PA');
  });

  it('is the head of the default catalog', () => {
    expect(buildQueryCatalog().slice(0, LEGACY_QUERIES.length)).toEqual([...LEGACY_QUERIES]);
  });
});
