import type { AppConfig, EngineId, SpeechEngine } from '../types.js';
import { MockSpeechEngine } from './mock.js';

export type EngineRegistry = ReadonlyMap<EngineId, SpeechEngine>;

export function createEngines(config: AppConfig): EngineRegistry {
  const engines = new Map<EngineId, SpeechEngine>();
  engines.set('mock', new MockSpeechEngine({ device: 0, sampleRate: config.audio.sampleRate, realtime: true }));
  return engines;
}

export function getEngine(registry: EngineRegistry, id: EngineId): SpeechEngine {
  const engine = registry.get(id);
  if (!engine) {
    throw new Error(`Unknown engine: ${id}`);
  }
  return engine;
}
