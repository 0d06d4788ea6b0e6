// @vitest-environment jsdom
import { act, renderHook } from '@testing-library/react';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { SpeechPlayer } from '../audio/streamingPlayer.js';
import { buildWavFile } from '../audio/wav.js';
import { useSpeechStream } from './useSpeechStream.js';

const text = (value: string) => new TextEncoder().encode(value);

const responseOf = (parts: Uint8Array[]) =>
  new Response(
    new ReadableStream<Uint8Array>({
      start(controller) {
        parts.forEach((part) => controller.enqueue(part));
        controller.close();
      },
    })
  );

const player: SpeechPlayer = {
  ensure: vi.fn(),
  enqueuePcm: vi.fn(() => 0),
  clear: vi.fn(),
  close: vi.fn(() => Promise.resolve()),
};
const createPlayer = () => player;
const fetchImpl = vi.fn<typeof fetch>();

describe('useSpeechStream', () => {
  beforeEach(() => {
    fetchImpl.mockReset();
    URL.createObjectURL = vi.fn(() => 'blob:speech');
    URL.revokeObjectURL = vi.fn();
  });

  it('exposes the replay url and download link once the job id arrives', async () => {
    fetchImpl.mockResolvedValueOnce(
      responseOf([buildWavFile([], 24_000), new Uint8Array(4800), new Uint8Array(1200), text('<!--JOB_ID:abc123-->')])
    );
    const { result } = renderHook(() => useSpeechStream({ apiBase: '', chunkBytes: 4800, createPlayer, fetchImpl }));
    expect(result.current.downloadUrl).toBeNull();

    await act(async () => {
      await result.current.generate('custom', { text: 'hello', speaker: 'Ryan' });
    });

    expect(result.current.status).toBe('completed');
    expect(result.current.jobId).toBe('abc123');
    expect(result.current.downloadUrl).toBe('/api/tts/download/abc123');
    expect(result.current.audioUrl).toBe('blob:speech');
    expect(result.current.stats).toEqual({ chunks: 2, pcmBytes: 6000, sampleRate: 24_000 });
  });

  it('keeps download disabled after a failed generation', async () => {
    fetchImpl.mockResolvedValueOnce(responseOf([text('<!--ERROR:model not loaded-->')]));
    const { result } = renderHook(() => useSpeechStream({ apiBase: '', chunkBytes: 4800, createPlayer, fetchImpl }));

    await act(async () => {
      await result.current.generate('custom', { text: 'hello', speaker: 'Ryan' });
    });

    expect(result.current.status).toBe('failed');
    expect(result.current.error).toBe('model not loaded');
    expect(result.current.downloadUrl).toBeNull();
    expect(result.current.audioUrl).toBeNull();
  });
});
