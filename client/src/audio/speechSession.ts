import type { SpeechMode } from '../types/speech.js';
import { readErrorMessage } from '../utils/fetchJson.js';
import { SpeechStreamError, consumeSpeechStream, type SpeechStreamResult } from './consumeSpeechStream.js';
import type { SpeechPlayer } from './streamingPlayer.js';

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

export type SpeechOutcome = { status: 'completed'; result: SpeechStreamResult } | { status: 'superseded' };

export interface SpeechSessionOptions {
  player: SpeechPlayer;
  chunkBytes: number;
  apiBase?: string;
  fetchImpl?: typeof fetch;
  /** Upper bound on one generation, including the time spent queued for the device. */
  timeoutMs?: number;
}

/**
 * Owns the player for a sequence of generations. Starting a new generation clears
 * anything still scheduled; bytes from an older request are read to the end and dropped.
 */
export class SpeechSession {
  private generation = 0;
  private readonly player: SpeechPlayer;
  private readonly chunkBytes: number;
  private readonly apiBase: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor({ player, chunkBytes, apiBase = '', fetchImpl, timeoutMs = DEFAULT_TIMEOUT_MS }: SpeechSessionOptions) {
    this.player = player;
    this.chunkBytes = chunkBytes;
    this.apiBase = apiBase;
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = timeoutMs;
  }

  get currentGeneration(): number {
    return this.generation;
  }

  async generate(mode: SpeechMode, body: Record<string, unknown>): Promise<SpeechOutcome> {
    this.generation += 1;
    const generation = this.generation;
    const isCurrent = () => generation === this.generation;
    this.player.clear();

    try {
      const res = await this.fetchImpl(`${this.apiBase}/api/tts/${mode}/stream`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!res.ok) {
        throw new SpeechStreamError('http', await readErrorMessage(res));
      }
      if (!res.body) {
        throw new SpeechStreamError('protocol', 'response has no body');
      }
      const result = await consumeSpeechStream(
        res.body,
        {
          onHeader: (sampleRate) => {
            if (isCurrent()) this.player.ensure(sampleRate);
          },
          onPcm: (bytes) => {
            if (isCurrent()) this.player.enqueuePcm(bytes);
          },
        },
        { chunkBytes: this.chunkBytes }
      );
      return isCurrent() ? { status: 'completed', result } : { status: 'superseded' };
    } catch (err) {
      if (!isCurrent()) return { status: 'superseded' };
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new SpeechStreamError('aborted', 'generation timed out');
      }
      throw err;
    }
  }

  /** Stops playback and marks any in-flight generation as stale. */
  cancel() {
    this.generation += 1;
    this.player.clear();
  }
}
