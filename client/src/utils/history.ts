import type { HistoryItem } from '../types/speech.js';

/** The server lists entries oldest first; the client shows the latest on top. */
export const newestFirst = (items: readonly HistoryItem[]): HistoryItem[] => items.slice().reverse();

/** Mirrors the server's trim so the local list never outgrows it. */
export const prependHistory = (items: readonly HistoryItem[], item: HistoryItem, maxItems: number): HistoryItem[] =>
  [item, ...items].slice(0, Math.max(0, maxItems));
