import { useCallback, useEffect, useState } from 'react';
import { HistoryList } from './components/HistoryList.js';
import { SpeechPanel } from './components/SpeechPanel.js';
import { useSpeechStream } from './hooks/useSpeechStream.js';
import type { ClientConfig, HistoryItem, SpeakerInfo, SpeechMode } from './types/speech.js';
import { fetchJson, postJson } from './utils/fetchJson.js';
import { newestFirst, prependHistory } from './utils/history.js';

const API_BASE = import.meta.env.VITE_API_BASE_URL ?? '';
const DEFAULT_CHUNK_BYTES = 4800;
const DEFAULT_HISTORY_LIMIT = 50;

export default function App() {
  const [chunkBytes, setChunkBytes] = useState(DEFAULT_CHUNK_BYTES);
  const [speakers, setSpeakers] = useState<SpeakerInfo[]>([]);
  const [languages, setLanguages] = useState<string[]>(['English']);
  const [history, setHistory] = useState<HistoryItem[]>([]);
  const [historyLimit, setHistoryLimit] = useState(DEFAULT_HISTORY_LIMIT);
  const [loadError, setLoadError] = useState<string | null>(null);

  const speech = useSpeechStream({ apiBase: API_BASE, chunkBytes });

  useEffect(() => {
    Promise.all([
      fetchJson<ClientConfig>(`${API_BASE}/api/config`),
      fetchJson<SpeakerInfo[]>(`${API_BASE}/api/tts/speakers`),
      fetchJson<string[]>(`${API_BASE}/api/tts/languages`),
      fetchJson<HistoryItem[]>(`${API_BASE}/api/history`),
    ])
      .then(([config, speakerList, languageList, historyItems]) => {
        setChunkBytes(config.audio.streamChunkBytes);
        setSpeakers(speakerList);
        setLanguages(languageList);
        setHistoryLimit(config.history.maxItems);
        setHistory(newestFirst(historyItems));
      })
      .catch((err: unknown) => setLoadError(err instanceof Error ? err.message : String(err)));
  }, []);

  const handleGenerate = useCallback(
    (mode: SpeechMode, body: Record<string, unknown>) => {
      const run = async () => {
        const result = await speech.generate(mode, body);
        if (!result) return;
        const { text, language, ...params } = body;
        const item = await postJson<HistoryItem>(`${API_BASE}/api/history`, {
          mode,
          text,
          language,
          params,
          audioId: result.jobId,
        });
        setHistory((prev) => prependHistory(prev, item, historyLimit));
      };
      run().catch((err: unknown) => console.warn('failed to record history', err));
    },
    [speech.generate, historyLimit]
  );

  const handleDelete = useCallback((id: string) => {
    fetchJson<{ success: boolean }>(`${API_BASE}/api/history/${id}`, { method: 'DELETE' })
      .then(() => setHistory((prev) => prev.filter((item) => item.id !== id)))
      .catch((err: unknown) => console.warn('failed to delete history item', err));
  }, []);

  const handleClear = useCallback(() => {
    postJson<{ success: boolean }>(`${API_BASE}/api/history/clear`, {})
      .then(() => setHistory([]))
      .catch((err: unknown) => console.warn('failed to clear history', err));
  }, []);

  return (
    <main className="app">
      <h1>Speech Stream Studio</h1>
      {loadError && (
        <p className="error" role="alert">
          {loadError}
        </p>
      )}
      <SpeechPanel
        speakers={speakers}
        languages={languages}
        status={speech.status}
        error={speech.error}
        audioUrl={speech.audioUrl}
        downloadUrl={speech.downloadUrl}
        onGenerate={handleGenerate}
        onStop={speech.stop}
      />
      {speech.stats && (
        <p className="helper-text">
          {speech.stats.chunks} chunks · {(speech.stats.pcmBytes / 2 / speech.stats.sampleRate).toFixed(2)}s at{' '}
          {speech.stats.sampleRate} Hz
        </p>
      )}
      <HistoryList items={history} apiBase={API_BASE} onDelete={handleDelete} onClear={handleClear} />
    </main>
  );
}
