export type SpeechMode = 'clone' | 'custom' | 'design';

export interface SpeakerInfo {
  name: string;
  description: string;
  language: string;
}

export interface ClientConfig {
  audio: { sampleRate: number; streamChunkBytes: number };
  history: { maxItems: number };
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

export type SpeechStatus = 'idle' | 'streaming' | 'completed' | 'failed';
