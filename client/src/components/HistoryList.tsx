import { memo } from 'react';
import type { HistoryItem } from '../types/speech.js';

interface HistoryListProps {
  items: HistoryItem[];
  apiBase: string;
  onDelete: (id: string) => void;
  onClear: () => void;
}

export const HistoryList = memo(({ items, apiBase, onDelete, onClear }: HistoryListProps) => {
  if (items.length === 0) {
    return <p className="helper-text">No generations yet.</p>;
  }
  return (
    <section className="history">
      <header className="history__header">
        <h2>History</h2>
        <button type="button" onClick={onClear}>
          Clear
        </button>
      </header>
      <ul>
        {items.map((item) => (
          <li key={item.id} className="history__item">
            <span className="history__mode">{item.mode}</span>
            <span className="history__text">{item.text}</span>
            {/* Cached audio expires server-side; a 404 here just leaves the player empty. */}
            {item.audioId && <audio controls preload="none" src={`${apiBase}/api/history/audio/${item.audioId}`} />}
            <button type="button" onClick={() => onDelete(item.id)}>
              Delete
            </button>
          </li>
        ))}
      </ul>
    </section>
  );
});
