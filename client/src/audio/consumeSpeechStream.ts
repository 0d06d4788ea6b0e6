import { SpeechStreamDecoder, type DecoderEvent, type StreamFailureKind } from './speechStreamDecoder.js';
import { buildWavFile } from './wav.js';

export type SpeechStreamErrorKind = StreamFailureKind | 'http' | 'aborted';

export class SpeechStreamError extends Error {
  constructor(
    readonly kind: SpeechStreamErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'SpeechStreamError';
  }
}

export interface SpeechStreamSink {
  onHeader(sampleRate: number): void;
  onPcm(bytes: Uint8Array): void;
}

export interface SpeechStreamResult {
  jobId: string;
  sampleRate: number;
  pcmBytes: number;
  chunks: number;
  /** Finite WAV rebuilt from the received PCM, for replay without another request. */
  wav: Blob;
}

/**
 * Reads a streamed speech response to the end, forwarding playable PCM to the sink
 * as it crosses the decoder threshold. Resolves only when a job id marker closes the stream.
 */
export async function consumeSpeechStream(
  body: ReadableStream<Uint8Array>,
  sink: SpeechStreamSink,
  { chunkBytes }: { chunkBytes: number }
): Promise<SpeechStreamResult> {
  const decoder = new SpeechStreamDecoder({ chunkBytes });
  const reader = body.getReader();
  const pcmChunks: Uint8Array[] = [];
  const received: { sampleRate: number; jobId: string | null } = { sampleRate: 0, jobId: null };

  const apply = (events: DecoderEvent[]): SpeechStreamError | null => {
    for (const event of events) {
      switch (event.type) {
        case 'header':
          received.sampleRate = event.sampleRate;
          sink.onHeader(event.sampleRate);
          break;
        case 'pcm':
          pcmChunks.push(event.bytes);
          sink.onPcm(event.bytes);
          break;
        case 'error':
          return new SpeechStreamError(event.kind, event.message);
        case 'complete':
          received.jobId = event.jobId;
          break;
      }
    }
    return null;
  };

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      const failure = apply(decoder.push(value));
      if (failure) {
        await reader.cancel(failure.message);
        throw failure;
      }
    }
  } finally {
    reader.releaseLock();
  }

  const failure = apply(decoder.finish());
  if (failure) throw failure;
  const { jobId, sampleRate } = received;
  if (jobId === null) {
    throw new SpeechStreamError('protocol', 'stream ended without a completion marker');
  }

  const wav = new Blob([buildWavFile(pcmChunks, sampleRate)], { type: 'audio/wav' });
  return {
    jobId,
    sampleRate,
    pcmBytes: pcmChunks.reduce((sum, chunk) => sum + chunk.length, 0),
    chunks: pcmChunks.length,
    wav,
  };
}
