import { describe, expect, it } from 'vitest';
import type { HistoryItem } from '../types/speech.js';
import { newestFirst, prependHistory } from './history.js';

const entry = (id: string): HistoryItem => ({
  id,
  mode: 'custom',
  text: `text ${id}`,
  params: {},
  audioId: null,
  createdAt: '2026-01-01T00:00:00.000Z',
});

describe('history ordering', () => {
  it('reverses the server listing without touching it', () => {
    const listed = [entry('a'), entry('b'), entry('c')];
    expect(newestFirst(listed).map((item) => item.id)).toEqual(['c', 'b', 'a']);
    expect(listed.map((item) => item.id)).toEqual(['a', 'b', 'c']);
  });

  it('puts a new entry on top and drops the oldest beyond the limit', () => {
    const shown = [entry('c'), entry('b')];
    expect(prependHistory(shown, entry('d'), 2).map((item) => item.id)).toEqual(['d', 'c']);
    expect(prependHistory(shown, entry('d'), 5).map((item) => item.id)).toEqual(['d', 'c', 'b']);
  });
});
