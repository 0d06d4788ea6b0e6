import { describe, expect, it, vi } from 'vitest';
import pino from 'pino';
import { consumeSpeechStream } from '../../client/src/audio/consumeSpeechStream.js';
import { ResultCache } from '../cache/resultCache.js';
import type { AudioChunk } from '../types.js';
import { collectSpeech, encodeSpeechStream } from './speechStream.js';
import { WAV_HEADER_BYTES } from './wavHeader.js';

const silentLogger = pino({ level: 'silent' });

async function* chunks(list: AudioChunk[], failWith?: Error): AsyncGenerator<AudioChunk> {
  for (const chunk of list) {
    yield chunk;
  }
  if (failWith) throw failWith;
}

const block = (values: number[], sampleRate = 24_000): AudioChunk => ({
  samples: Float32Array.from(values),
  sampleRate,
});

async function drain(stream: AsyncIterable<Buffer>): Promise<Buffer[]> {
  const parts: Buffer[] = [];
  for await (const part of stream) parts.push(part);
  return parts;
}

describe('encodeSpeechStream', () => {
  it('emits header, pcm per chunk, then the job id marker and caches the job', async () => {
    const cache = new ResultCache({ ttlMs: 60_000, maxEntries: 10 });
    const parts = await drain(
      encodeSpeechStream(chunks([block([1, 0]), block([-1])]), {
        cache,
        createJobId: () => 'job-1',
        logger: silentLogger,
      })
    );

    expect(parts).toHaveLength(4);
    expect(parts[0].length).toBe(WAV_HEADER_BYTES);
    expect(parts[0].readUInt32LE(24)).toBe(24_000);
    expect(Array.from(parts[1])).toEqual([0xff, 0x7f, 0x00, 0x00]);
    expect(Array.from(parts[2])).toEqual([0x00, 0x80]);
    expect(parts[3].toString('ascii')).toBe('<!--JOB_ID:job-1-->');

    const cached = cache.get('job-1');
    expect(Array.from(cached?.samples ?? [])).toEqual([32767, 0, -32768]);
    expect(cached?.sampleRate).toBe(24_000);
  });

  it('ends with an error marker when the source fails after the header', async () => {
    const cache = new ResultCache({ ttlMs: 60_000, maxEntries: 10 });
    const put = vi.spyOn(cache, 'put');
    const parts = await drain(
      encodeSpeechStream(chunks([block([0.5])], new Error('CUDA out of memory')), {
        cache,
        logger: silentLogger,
      })
    );

    expect(parts).toHaveLength(3);
    expect(parts[2].toString('utf-8')).toBe('<!--ERROR:CUDA out of memory-->');
    expect(put).not.toHaveBeenCalled();
  });

  it('emits a header-less error marker when the source fails before any audio', async () => {
    const cache = new ResultCache({ ttlMs: 60_000, maxEntries: 10 });
    const parts = await drain(
      encodeSpeechStream(chunks([], new Error('model not loaded')), { cache, logger: silentLogger })
    );

    expect(parts.map((part) => part.toString('utf-8'))).toEqual(['<!--ERROR:model not loaded-->']);
    expect(cache.size).toBe(0);
  });

  it('reports an empty generation instead of caching nothing', async () => {
    const cache = new ResultCache({ ttlMs: 60_000, maxEntries: 10 });
    const parts = await drain(encodeSpeechStream(chunks([]), { cache, logger: silentLogger }));

    expect(parts.map((part) => part.toString('utf-8'))).toEqual(['<!--ERROR:no audio generated-->']);
  });

  it('rejects a sample rate change inside one stream', async () => {
    const cache = new ResultCache({ ttlMs: 60_000, maxEntries: 10 });
    const parts = await drain(
      encodeSpeechStream(chunks([block([0]), block([0], 16_000)]), { cache, logger: silentLogger })
    );

    expect(parts.at(-1)?.toString('utf-8')).toBe('<!--ERROR:sample rate changed mid-stream (24000 -> 16000)-->');
  });

  it('stops pulling from the source when the consumer returns early', async () => {
    const cache = new ResultCache({ ttlMs: 60_000, maxEntries: 10 });
    let finalized = false;
    async function* endless(): AsyncGenerator<AudioChunk> {
      try {
        for (;;) yield block([0.1]);
      } finally {
        finalized = true;
      }
    }

    const stream = encodeSpeechStream(endless(), { cache, logger: silentLogger });
    await stream.next();
    await stream.next();
    await stream.return(undefined);

    expect(finalized).toBe(true);
    expect(cache.size).toBe(0);
  });
});

describe('encodeSpeechStream when the consumer goes away', () => {
  it('lets the consumer error through without logging a generation failure', async () => {
    const cache = new ResultCache({ ttlMs: 60_000, maxEntries: 10 });
    const logger = pino({ level: 'silent' });
    const logError = vi.spyOn(logger, 'error');
    let finalized = false;
    async function* endless(): AsyncGenerator<AudioChunk> {
      try {
        for (;;) yield block([0.1]);
      } finally {
        finalized = true;
      }
    }

    const stream = encodeSpeechStream(endless(), { cache, logger });
    await stream.next();
    const closed = new Error('Premature close');

    await expect(stream.throw(closed)).rejects.toBe(closed);
    expect(finalized).toBe(true);
    expect(logError).not.toHaveBeenCalled();
    expect(await stream.next()).toEqual({ done: true, value: undefined });
  });

  it('does not emit an error marker once the request is aborted', async () => {
    const cache = new ResultCache({ ttlMs: 60_000, maxEntries: 10 });
    const controller = new AbortController();
    async function* interrupted(): AsyncGenerator<AudioChunk> {
      yield block([0.1]);
      controller.abort(new Error('client went away'));
      controller.signal.throwIfAborted();
    }

    const parts: Buffer[] = [];
    const stream = encodeSpeechStream(interrupted(), { cache, logger: silentLogger, signal: controller.signal });
    await expect(
      (async () => {
        for await (const part of stream) parts.push(part);
      })()
    ).rejects.toThrow('client went away');
    expect(parts).toHaveLength(2);
    expect(cache.size).toBe(0);
  });
});

describe('encodeSpeechStream read by the browser consumer', () => {
  const toWebStream = (parts: AsyncIterable<Buffer>) =>
    new ReadableStream<Uint8Array>({
      async start(controller) {
        for await (const part of parts) controller.enqueue(new Uint8Array(part));
        controller.close();
      },
    });
  const sink = { onHeader: () => {}, onPcm: () => {} };

  it('keeps a failure quoting a job id marker a failure', async () => {
    const cache = new ResultCache({ ttlMs: 60_000, maxEntries: 10 });
    const quoted = 'cannot synthesize "<!--JOB_ID:00000000-0000-0000-0000-000000000000"';
    const encoded = encodeSpeechStream(chunks([block(new Array<number>(16).fill(0.1))], new Error(quoted)), {
      cache,
      logger: silentLogger,
    });

    await expect(consumeSpeechStream(toWebStream(encoded), sink, { chunkBytes: 4800 })).rejects.toMatchObject({
      kind: 'generation',
      message: 'cannot synthesize "<! --JOB_ID:00000000-0000-0000-0000-000000000000"',
    });
  });

  it('hands the consumer the job id of a finished stream', async () => {
    const cache = new ResultCache({ ttlMs: 60_000, maxEntries: 10 });
    const encoded = encodeSpeechStream(chunks([block([0.5, -0.5]), block([0.25])]), {
      cache,
      createJobId: () => 'job-42',
      logger: silentLogger,
    });

    const result = await consumeSpeechStream(toWebStream(encoded), sink, { chunkBytes: 4800 });
    expect(result).toMatchObject({ jobId: 'job-42', sampleRate: 24_000, pcmBytes: 6, chunks: 1 });
  });
});

describe('collectSpeech', () => {
  it('joins every chunk into one job', async () => {
    const result = await collectSpeech(chunks([block([1]), block([0, -1])]));
    expect(Array.from(result.samples)).toEqual([32767, 0, -32768]);
    expect(result.sampleRate).toBe(24_000);
  });

  it('throws when nothing was generated', async () => {
    await expect(collectSpeech(chunks([]))).rejects.toThrow('no audio generated');
  });
});
