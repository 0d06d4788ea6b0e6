import { useCallback, useEffect, useRef, useState } from 'react';
import type { SpeechStreamResult } from '../audio/consumeSpeechStream.js';
import { SpeechSession } from '../audio/speechSession.js';
import { StreamingPlayer, type SpeechPlayer } from '../audio/streamingPlayer.js';
import type { SpeechMode, SpeechStatus } from '../types/speech.js';

interface UseSpeechStreamConfig {
  apiBase: string;
  chunkBytes: number;
  createPlayer?: () => SpeechPlayer;
  fetchImpl?: typeof fetch;
}

export interface SpeechStats {
  chunks: number;
  pcmBytes: number;
  sampleRate: number;
}

const defaultPlayerFactory = () => new StreamingPlayer();

export const useSpeechStream = ({
  apiBase,
  chunkBytes,
  createPlayer = defaultPlayerFactory,
  fetchImpl,
}: UseSpeechStreamConfig) => {
  const [status, setStatus] = useState<SpeechStatus>('idle');
  const [jobId, setJobId] = useState<string | null>(null);
  const [audioUrl, setAudioUrl] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [stats, setStats] = useState<SpeechStats | null>(null);

  const sessionRef = useRef<SpeechSession | null>(null);
  const playerRef = useRef<SpeechPlayer | null>(null);
  const audioUrlRef = useRef<string | null>(null);

  const replaceAudioUrl = useCallback((next: string | null) => {
    if (audioUrlRef.current) URL.revokeObjectURL(audioUrlRef.current);
    audioUrlRef.current = next;
    setAudioUrl(next);
  }, []);

  useEffect(() => {
    return () => {
      const player = playerRef.current;
      sessionRef.current = null;
      playerRef.current = null;
      if (player) {
        player.close().catch((err: unknown) => console.warn('failed to close audio output', err));
      }
    };
  }, [apiBase, chunkBytes, createPlayer, fetchImpl]);

  useEffect(() => () => replaceAudioUrl(null), [replaceAudioUrl]);

  const getSession = useCallback(() => {
    if (!sessionRef.current) {
      const player = createPlayer();
      playerRef.current = player;
      sessionRef.current = new SpeechSession({ player, chunkBytes, apiBase, fetchImpl });
    }
    return sessionRef.current;
  }, [apiBase, chunkBytes, createPlayer, fetchImpl]);

  const generate = useCallback(
    async (mode: SpeechMode, body: Record<string, unknown>): Promise<SpeechStreamResult | null> => {
      const session = getSession();
      setStatus('streaming');
      setError(null);
      setJobId(null);
      setStats(null);
      replaceAudioUrl(null);
      try {
        const outcome = await session.generate(mode, body);
        if (outcome.status === 'superseded') return null;
        const { result } = outcome;
        setJobId(result.jobId);
        setStats({ chunks: result.chunks, pcmBytes: result.pcmBytes, sampleRate: result.sampleRate });
        replaceAudioUrl(URL.createObjectURL(result.wav));
        setStatus('completed');
        return result;
      } catch (err) {
        setError(err instanceof Error ? err.message : String(err));
        setStatus('failed');
        return null;
      }
    },
    [getSession, replaceAudioUrl]
  );

  const stop = useCallback(() => {
    sessionRef.current?.cancel();
    setStatus('idle');
  }, []);

  const downloadUrl = status === 'completed' && jobId ? `${apiBase}/api/tts/download/${jobId}` : null;

  return { status, jobId, audioUrl, downloadUrl, error, stats, generate, stop };
};
