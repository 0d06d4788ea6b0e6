import {
  MAX_MARKER_BYTES,
  findErrorMarker,
  findTrailingMarker,
  lastMarkerStart,
  trailingPrefixLength,
} from './streamMarkers.js';
import { WAV_HEADER_BYTES, parseWavHeader } from './wav.js';

export type DecoderState = 'awaiting_header' | 'streaming' | 'terminated';

export type StreamFailureKind = 'generation' | 'protocol';

export type DecoderEvent =
  | { type: 'header'; sampleRate: number }
  | { type: 'pcm'; bytes: Uint8Array }
  | { type: 'error'; kind: StreamFailureKind; message: string }
  | { type: 'complete'; jobId: string };

export interface SpeechStreamDecoderOptions {
  /** Buffered PCM bytes that trigger scheduling (~100ms of audio). */
  chunkBytes: number;
  /** Bytes inspected for a header-less error marker before giving up on the stream. */
  maxProbeBytes?: number;
}

const concat = (a: Uint8Array, b: Uint8Array): Uint8Array => {
  if (a.length === 0) return b;
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
};

const startsWithComment = (bytes: Uint8Array) => bytes[0] === 0x3c; // '<'

/**
 * Incremental parser for the streamed speech response:
 * a 44-byte WAV header, raw int16 PCM of unknown length, then one trailing marker.
 * Emitted PCM slices are always a whole number of samples.
 */
export class SpeechStreamDecoder {
  private buffer: Uint8Array = new Uint8Array(0);
  private current: DecoderState = 'awaiting_header';
  private readonly chunkBytes: number;
  private readonly maxProbeBytes: number;

  constructor({ chunkBytes, maxProbeBytes = MAX_MARKER_BYTES }: SpeechStreamDecoderOptions) {
    if (chunkBytes < 2 || chunkBytes % 2 !== 0) {
      throw new RangeError(`chunkBytes must be a positive even number, got ${chunkBytes}`);
    }
    this.chunkBytes = chunkBytes;
    this.maxProbeBytes = maxProbeBytes;
  }

  get state(): DecoderState {
    return this.current;
  }

  push(bytes: Uint8Array): DecoderEvent[] {
    if (this.current === 'terminated' || bytes.length === 0) return [];
    this.buffer = concat(this.buffer, bytes);
    const events: DecoderEvent[] = [];

    if (this.current === 'awaiting_header') {
      this.readHeader(events);
    }
    if (this.current === 'streaming') {
      this.drainPlayable(events);
    }
    return events;
  }

  finish(): DecoderEvent[] {
    if (this.current === 'terminated') return [];
    const events: DecoderEvent[] = [];

    if (this.current === 'awaiting_header') {
      const marker = findErrorMarker(this.buffer);
      if (marker?.kind === 'error') {
        this.fail(events, 'generation', marker.message);
      } else {
        this.fail(events, 'protocol', this.buffer.length === 0 ? 'empty response' : 'stream ended before the WAV header');
      }
      return events;
    }

    const marker = findTrailingMarker(this.buffer);
    if (marker?.kind === 'error') {
      this.fail(events, 'generation', marker.message);
      return events;
    }
    if (!marker) {
      this.fail(events, 'protocol', 'stream ended without a completion marker');
      return events;
    }

    const pcmEnd = marker.start - (marker.start % 2);
    if (pcmEnd > 0) {
      events.push({ type: 'pcm', bytes: this.buffer.slice(0, pcmEnd) });
    }
    this.buffer = new Uint8Array(0);
    this.current = 'terminated';
    events.push({ type: 'complete', jobId: marker.jobId });
    return events;
  }

  private readHeader(events: DecoderEvent[]) {
    const marker = findErrorMarker(this.buffer);
    if (marker?.kind === 'error') {
      this.fail(events, 'generation', marker.message);
      return;
    }
    if (startsWithComment(this.buffer)) {
      if (this.buffer.length > this.maxProbeBytes) {
        this.fail(events, 'protocol', 'unterminated marker before the WAV header');
      }
      return;
    }
    if (this.buffer.length < WAV_HEADER_BYTES) return;

    const header = parseWavHeader(this.buffer);
    if (!header.ok) {
      this.fail(events, 'protocol', header.reason);
      return;
    }
    this.buffer = this.buffer.slice(WAV_HEADER_BYTES);
    this.current = 'streaming';
    events.push({ type: 'header', sampleRate: header.sampleRate });
  }

  private drainPlayable(events: DecoderEvent[]) {
    const playable = this.playableLength();
    if (playable < this.chunkBytes) return;
    const even = playable - (playable % 2);
    events.push({ type: 'pcm', bytes: this.buffer.slice(0, even) });
    this.buffer = this.buffer.slice(even);
  }

  // Bytes that may belong to the trailing marker are held back until finish().
  private playableLength(): number {
    const markerStart = lastMarkerStart(this.buffer);
    if (markerStart >= 0 && this.buffer.length - markerStart <= this.maxProbeBytes) {
      return markerStart;
    }
    return this.buffer.length - trailingPrefixLength(this.buffer);
  }

  private fail(events: DecoderEvent[], kind: StreamFailureKind, message: string) {
    this.buffer = new Uint8Array(0);
    this.current = 'terminated';
    events.push({ type: 'error', kind, message });
  }
}
