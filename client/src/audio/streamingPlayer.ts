import { PlaybackScheduler } from './playbackScheduler.js';
import { pcm16ToFloat32 } from './wav.js';

export const DEFAULT_OUTPUT_SAMPLE_RATE = 24000;

export interface SpeechPlayer {
  ensure(sampleRate: number): void;
  enqueuePcm(bytes: Uint8Array): number | null;
  clear(): void;
  close(): Promise<void>;
}

export type AudioContextFactory = () => AudioContext;

const defaultContextFactory: AudioContextFactory = () => new AudioContext({ latencyHint: 'interactive' });

/** Web Audio sink that queues int16 PCM slices back to back. */
export class StreamingPlayer implements SpeechPlayer {
  private ctx: AudioContext | null = null;
  private scheduler: PlaybackScheduler | null = null;
  private scheduled: AudioBufferSourceNode[] = [];
  private sampleRate = DEFAULT_OUTPUT_SAMPLE_RATE;

  constructor(private readonly createContext: AudioContextFactory = defaultContextFactory) {}

  ensure(sampleRate: number) {
    this.sampleRate = sampleRate;
    if (!this.ctx) {
      const context = this.createContext();
      this.ctx = context;
      this.scheduler = new PlaybackScheduler(() => context.currentTime);
    }
    return this.ctx;
  }

  get pendingSources(): number {
    return this.scheduled.length;
  }

  /** Returns the start time on the audio clock, or null when nothing was scheduled. */
  enqueuePcm(bytes: Uint8Array): number | null {
    if (!this.ctx || !this.scheduler) return null;
    const samples = pcm16ToFloat32(bytes);
    if (samples.length === 0) return null;

    const ctx = this.ctx;
    const audioBuffer = ctx.createBuffer(1, samples.length, this.sampleRate);
    audioBuffer.copyToChannel(samples, 0);
    const source = ctx.createBufferSource();
    source.buffer = audioBuffer;
    source.connect(ctx.destination);

    const startAt = this.scheduler.scheduleNext(audioBuffer.duration);
    source.start(startAt);
    this.scheduled.push(source);
    source.onended = () => {
      this.scheduled = this.scheduled.filter((n) => n !== source);
    };
    if (ctx.state === 'suspended') {
      ctx.resume().catch((err: unknown) => console.warn('audio context resume failed', err));
    }
    return startAt;
  }

  clear() {
    this.scheduled.forEach((node) => {
      try {
        node.stop();
      } catch {
        // already stopped
      }
    });
    this.scheduled = [];
    this.scheduler?.reset();
  }

  async close() {
    this.clear();
    const ctx = this.ctx;
    this.ctx = null;
    this.scheduler = null;
    if (ctx) {
      await ctx.close();
    }
  }
}
