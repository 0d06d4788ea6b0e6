import { randomUUID } from 'node:crypto';
import type { ResultStore } from '../cache/resultCache.js';
import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { AudioChunk, CachedAudio } from '../types.js';
import { formatErrorMarker, formatJobIdMarker } from './markers.js';
import { concatInt16, floatToInt16, int16ToBuffer } from './pcm.js';
import { createStreamingWavHeader } from './wavHeader.js';

export interface EncodeSpeechStreamOptions {
  cache: ResultStore;
  createJobId?: () => string;
  logger?: Logger;
  /** Aborted when the client disconnects; failures after that are not reported in-band. */
  signal?: AbortSignal;
}

/**
 * Turns engine output into a length-unknown WAV byte stream:
 * header, raw PCM per chunk, then `<!--JOB_ID:..-->` or `<!--ERROR:..-->`.
 */
export async function* encodeSpeechStream(
  source: AsyncIterable<AudioChunk>,
  options: EncodeSpeechStreamOptions
): AsyncGenerator<Buffer> {
  const log = options.logger ?? defaultLogger;
  const createJobId = options.createJobId ?? randomUUID;
  const chunks: Int16Array[] = [];
  let sampleRate: number | null = null;
  // set while suspended at a yield: an error thrown there comes from the consumer, not the engine
  let yielding = false;

  try {
    for await (const chunk of source) {
      if (sampleRate === null) {
        sampleRate = chunk.sampleRate;
        yielding = true;
        yield createStreamingWavHeader(sampleRate);
        yielding = false;
      } else if (chunk.sampleRate !== sampleRate) {
        throw new Error(`sample rate changed mid-stream (${sampleRate} -> ${chunk.sampleRate})`);
      }
      const pcm = floatToInt16(chunk.samples);
      if (pcm.length === 0) continue;
      chunks.push(pcm);
      yielding = true;
      yield int16ToBuffer(pcm);
      yielding = false;
    }
  } catch (error) {
    if (yielding || options.signal?.aborted) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    log.error({ event: 'stream_failed', message, headerSent: sampleRate !== null });
    yield formatErrorMarker(message);
    return;
  }

  if (sampleRate === null || chunks.length === 0) {
    log.warn({ event: 'stream_empty', headerSent: sampleRate !== null });
    yield formatErrorMarker('no audio generated');
    return;
  }

  const samples = concatInt16(chunks);
  const jobId = createJobId();
  options.cache.put(jobId, samples, sampleRate);
  log.info({ event: 'stream_completed', jobId, sampleRate, samples: samples.length });
  yield formatJobIdMarker(jobId);
}

/** Drains a source completely; used by the non-streaming endpoints. */
export async function collectSpeech(source: AsyncIterable<AudioChunk>): Promise<CachedAudio> {
  const chunks: Int16Array[] = [];
  let sampleRate: number | null = null;
  for await (const chunk of source) {
    if (sampleRate === null) {
      sampleRate = chunk.sampleRate;
    } else if (chunk.sampleRate !== sampleRate) {
      throw new Error(`sample rate changed mid-stream (${sampleRate} -> ${chunk.sampleRate})`);
    }
    chunks.push(floatToInt16(chunk.samples));
  }
  const samples = concatInt16(chunks);
  if (sampleRate === null || samples.length === 0) {
    throw new Error('no audio generated');
  }
  return { samples, sampleRate };
}
