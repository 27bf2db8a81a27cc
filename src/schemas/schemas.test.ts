/**
 * Schema Tests
 */

import { describe, it, expect } from '@jest/globals';
import { CourtSchema, createCourt, isEnriched } from './court.js';
import { QueryCheckpointSchema, QueryLog } from './checkpoint.js';

describe('CourtSchema', () => {
  it('defaults missing nullable fields to null', () => {
    const court = CourtSchema.parse({ place_id: 'abc', name: 'Court' });
    expect(court).toEqual({
      place_id: 'abc',
      name: 'Court',
      address: null,
      lat: null,
      lng: null,
      types: [],
      rating: null,
      user_rating_count: null,
      phone: null,
      website: null,
      hours: null,
      photo: null,
      street_view_url: null,
    });
  });

  it('drops unknown keys', () => {
    const court = CourtSchema.parse({ place_id: 'abc', favourite: true });
    expect(court).not.toHaveProperty('favourite');
  });

  it('rejects a record without place_id', () => {
    expect(CourtSchema.safeParse({ name: 'Nameless' }).success).toBe(false);
  });

  it('rejects an empty place_id', () => {
    expect(CourtSchema.safeParse({ place_id: '' }).success).toBe(false);
  });

  it('rejects hours that are not a string map', () => {
    expect(CourtSchema.safeParse({ place_id: 'a', hours: { monday: 9 } }).success).toBe(false);
  });
});

describe('isEnriched', () => {
  it('is false for a fresh court', () => {
    expect(isEnriched(createCourt({ place_id: 'a' }))).toBe(false);
  });

  it.each([
    ['rating', { rating: 4 }],
    ['phone', { phone: '+1 555' }],
    ['website', { website: 'https://x.example.com' }],
    ['hours', { hours: {} }],
  ])('is true once %s is set', (_field, fields) => {
    expect(isEnriched(createCourt({ place_id: 'a', ...fields }))).toBe(true);
  });

  it('ignores rating count and photo', () => {
    expect(
      isEnriched(createCourt({ place_id: 'a', user_rating_count: 3, photo: 'photos/a.jpg' }))
    ).toBe(false);
  });
});

describe('QueryLog', () => {
  it('keeps insertion order and ignores duplicates', () => {
    const log = new QueryLog(['b', 'a', 'b']);
    expect(log.add('a')).toBe(false);
    expect(log.add('c')).toBe(true);
    expect(log.toArray()).toEqual(['b', 'a', 'c']);
    expect(log.size).toBe(3);
  });

  it('serializes to the checkpoint shape', () => {
    const checkpoint = new QueryLog(['q1']).toCheckpoint();
    expect(QueryCheckpointSchema.parse(checkpoint)).toEqual({ completed_queries: ['q1'] });
  });

  it('returns a copy from toArray', () => {
    const log = new QueryLog(['q1']);
    log.toArray().push('q2');
    expect(log.has('q2')).toBe(false);
  });
});
