export const SPEECH_MODES = ['clone', 'custom', 'design'] as const;

export type SpeechMode = (typeof SPEECH_MODES)[number];

export const ENGINE_IDS = ['mock'] as const;

export type EngineId = (typeof ENGINE_IDS)[number];

export interface AppConfig {
  audio: {
    /** Sample rate engines are asked to produce. */
    sampleRate: number;
    /** Client-side PCM threshold before a chunk is scheduled (~100ms at sampleRate). */
    streamChunkBytes: number;
  };
  cache: {
    ttlMs: number;
    maxEntries: number;
  };
  devices: {
    count: number;
  };
  limits: {
    maxTextLength: number;
    maxInstructLength: number;
  };
  history: {
    maxItems: number;
  };
  engine: EngineId;
}

/** One block of engine output; sampleRate is constant across a single stream. */
export interface AudioChunk {
  samples: Float32Array;
  sampleRate: number;
}

export interface CloneSpeechRequest {
  mode: 'clone';
  text: string;
  language: string;
  refAudioIds: string[];
  refTexts: (string | null)[];
  fast: boolean;
}

export interface CustomSpeechRequest {
  mode: 'custom';
  text: string;
  language: string;
  speaker: string;
  instruct?: string;
  fast: boolean;
}

export interface DesignSpeechRequest {
  mode: 'design';
  text: string;
  language: string;
  instruct: string;
}

export type SpeechRequest = CloneSpeechRequest | CustomSpeechRequest | DesignSpeechRequest;

export interface SpeakerInfo {
  name: string;
  description: string;
  language: string;
}

export interface SpeechEngine {
  id: EngineId;
  /** Accelerator index whose lock must be held while the engine generates. */
  device: number;
  stream(request: SpeechRequest, signal?: AbortSignal): AsyncIterable<AudioChunk>;
  speakers(): SpeakerInfo[];
  languages(): string[];
}

/** Finished generation held by the result cache. */
export interface CachedAudio {
  samples: Int16Array;
  sampleRate: number;
}

export interface HistoryItem {
  id: string;
  mode: SpeechMode;
  text: string;
  language?: string;
  params: Record<string, unknown>;
  audioId: string | null;
  createdAt: string;
}
