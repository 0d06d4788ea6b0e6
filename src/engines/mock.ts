import { setTimeout as delay } from 'node:timers/promises';
import type { AudioChunk, SpeakerInfo, SpeechRequest } from '../types.js';
import { BaseEngine } from './base.js';

const SPEAKERS: SpeakerInfo[] = [
  { name: 'Vivian', description: 'Bright, slightly edgy young female voice', language: 'Chinese' },
  { name: 'Serena', description: 'Warm, gentle young female voice', language: 'Chinese' },
  { name: 'Ryan', description: 'Dynamic male voice with strong rhythmic drive', language: 'English' },
  { name: 'Aiden', description: 'Sunny American male voice with clear midrange', language: 'English' },
  { name: 'Ono_Anna', description: 'Playful Japanese female voice with light, nimble timbre', language: 'Japanese' },
  { name: 'Sohee', description: 'Warm Korean female voice with rich emotion', language: 'Korean' },
];

const LANGUAGES = [
  'Chinese',
  'English',
  'Japanese',
  'Korean',
  'German',
  'French',
  'Russian',
  'Portuguese',
  'Spanish',
  'Italian',
  'Auto',
];

const MS_PER_CHARACTER = 60;
const MIN_DURATION_MS = 300;
const MAX_DURATION_MS = 30_000;

export interface MockEngineOptions {
  device?: number;
  sampleRate: number;
  /** Length of each yielded block. */
  chunkMs?: number;
  /** Wait roughly one block length between blocks, like a real-time model would. */
  realtime?: boolean;
}

function pitchFor(request: SpeechRequest): number {
  const seed = request.mode === 'custom' ? request.speaker : request.mode;
  let hash = 0;
  for (const ch of seed) {
    hash = (hash * 31 + ch.charCodeAt(0)) >>> 0;
  }
  return 180 + (hash % 160);
}

/** Tone generator standing in for a model; output length follows the text length. */
export class MockSpeechEngine extends BaseEngine {
  id = 'mock' as const;
  private readonly sampleRate: number;
  private readonly chunkMs: number;
  private readonly realtime: boolean;

  constructor(options: MockEngineOptions) {
    super(options.device ?? 0);
    this.sampleRate = options.sampleRate;
    this.chunkMs = options.chunkMs ?? 80;
    this.realtime = options.realtime ?? false;
  }

  async *stream(request: SpeechRequest, signal?: AbortSignal): AsyncGenerator<AudioChunk> {
    const durationMs = Math.min(MAX_DURATION_MS, Math.max(MIN_DURATION_MS, request.text.length * MS_PER_CHARACTER));
    const totalSamples = Math.round((durationMs / 1000) * this.sampleRate);
    const blockSamples = Math.max(1, Math.round((this.chunkMs / 1000) * this.sampleRate));
    const frequency = pitchFor(request);

    for (let offset = 0; offset < totalSamples; offset += blockSamples) {
      signal?.throwIfAborted();
      const length = Math.min(blockSamples, totalSamples - offset);
      const samples = new Float32Array(length);
      for (let i = 0; i < length; i += 1) {
        const t = (offset + i) / this.sampleRate;
        samples[i] = 0.3 * Math.sin(2 * Math.PI * frequency * t);
      }
      yield { samples, sampleRate: this.sampleRate };
      if (this.realtime) {
        await delay(this.chunkMs, undefined, { signal });
      }
    }
  }

  speakers(): SpeakerInfo[] {
    return SPEAKERS.map((speaker) => ({ ...speaker }));
  }

  languages(): string[] {
    return [...LANGUAGES];
  }
}
