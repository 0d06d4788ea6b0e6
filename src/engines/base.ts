import type { AudioChunk, EngineId, SpeakerInfo, SpeechEngine, SpeechRequest } from '../types.js';

export abstract class BaseEngine implements SpeechEngine {
  abstract id: EngineId;

  constructor(readonly device: number) {}

  abstract stream(request: SpeechRequest, signal?: AbortSignal): AsyncIterable<AudioChunk>;

  abstract speakers(): SpeakerInfo[];

  abstract languages(): string[];
}
