import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ENGINE_IDS } from './types.js';
import type { AppConfig } from './types.js';

const configSchema = z.object({
  audio: z
    .object({
      sampleRate: z.number().int().min(8_000).max(192_000).default(24_000),
      // 4800 bytes = 2400 int16 samples = 100ms at 24kHz
      streamChunkBytes: z.number().int().min(2).max(1024 * 1024).default(4_800),
    })
    .default({}),
  cache: z
    .object({
      ttlMs: z.number().int().min(1).default(60 * 60 * 1000),
      maxEntries: z.number().int().min(1).max(100_000).default(100),
    })
    .default({}),
  devices: z
    .object({
      count: z.number().int().min(1).max(64).default(1),
    })
    .default({}),
  limits: z
    .object({
      maxTextLength: z.number().int().min(1).default(5_000),
      maxInstructLength: z.number().int().min(1).default(500),
    })
    .default({}),
  history: z
    .object({
      maxItems: z.number().int().min(1).max(10_000).default(50),
    })
    .default({}),
  engine: z.enum(ENGINE_IDS).default('mock'),
});

let cachedConfig: AppConfig | null = null;

export function parseConfig(raw: unknown): AppConfig {
  const parsed = configSchema.parse(raw);
  if (parsed.audio.streamChunkBytes % 2 !== 0) {
    throw new Error('audio.streamChunkBytes must be a whole number of int16 samples');
  }
  return parsed;
}

export async function loadConfig(configPath = path.resolve('config.json')): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const raw = await readFile(configPath, 'utf-8');
  const typed = parseConfig(JSON.parse(raw));
  cachedConfig = typed;
  return typed;
}

export function reloadConfig(): void {
  cachedConfig = null;
}
