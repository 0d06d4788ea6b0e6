import { randomUUID } from 'node:crypto';
import type { HistoryItem, SpeechMode } from '../types.js';

export interface NewHistoryItem {
  mode: SpeechMode;
  text: string;
  language?: string;
  params?: Record<string, unknown>;
  audioId?: string | null;
}

/** Recent generations, oldest first. Audio lives in the result cache, not here. */
export class HistoryStore {
  private items: HistoryItem[] = [];

  constructor(private readonly maxItems: number) {}

  list(): HistoryItem[] {
    return this.items.slice(-this.maxItems);
  }

  add(input: NewHistoryItem, now = new Date()): HistoryItem {
    const item: HistoryItem = {
      id: randomUUID(),
      mode: input.mode,
      text: input.text,
      language: input.language,
      params: input.params ?? {},
      audioId: input.audioId ?? null,
      createdAt: now.toISOString(),
    };
    this.items.push(item);
    if (this.items.length > this.maxItems) {
      this.items = this.items.slice(-this.maxItems);
    }
    return item;
  }

  remove(id: string): boolean {
    const before = this.items.length;
    this.items = this.items.filter((item) => item.id !== id);
    return this.items.length !== before;
  }

  clear(): number {
    const removed = this.items.length;
    this.items = [];
    return removed;
  }
}
