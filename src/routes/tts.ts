import { randomUUID } from 'node:crypto';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import express from 'express';
import { HttpError } from '../errors.js';
import { getEngine } from '../engines/index.js';
import type { AppServices } from '../services.js';
import { collectSpeech, encodeSpeechStream } from '../streaming/speechStream.js';
import { createWavFile } from '../streaming/wavHeader.js';
import type { SpeechMode } from '../types.js';
import { createSpeechRequestSchemas, isSpeechMode, isValidJobId, parseSpeechRequest } from '../validation.js';

function requireMode(raw: string): SpeechMode {
  if (!isSpeechMode(raw)) {
    throw new HttpError(404, `Unknown mode: ${raw}`);
  }
  return raw;
}

export function sendWav(res: express.Response, wav: Buffer, disposition?: string): void {
  res.type('audio/wav');
  if (disposition) {
    res.set('Content-Disposition', disposition);
  }
  res.send(wav);
}

export function createTtsRouter(services: AppServices): express.Router {
  const router = express.Router();
  const schemas = createSpeechRequestSchemas(services.config.limits);
  const { cache, locks, logger } = services;

  router.get('/speakers', (_req, res) => {
    res.json(getEngine(services.engines, services.config.engine).speakers());
  });

  router.get('/languages', (_req, res) => {
    res.json(getEngine(services.engines, services.config.engine).languages());
  });

  router.get('/download/:jobId', (req, res) => {
    const { jobId } = req.params;
    if (!isValidJobId(jobId)) {
      res.status(400).json({ message: 'Invalid job ID' });
      return;
    }
    const entry = cache.get(jobId);
    if (!entry) {
      res.status(404).json({ message: 'Audio not found or expired' });
      return;
    }
    sendWav(
      res,
      createWavFile(entry.samples, entry.sampleRate),
      `attachment; filename="generated_${jobId.slice(0, 8)}.wav"`
    );
  });

  router.post('/:mode/stream', async (req, res, next) => {
    let headersCommitted = false;
    try {
      const mode = requireMode(req.params.mode);
      const request = parseSpeechRequest(schemas, mode, req.body);
      const engine = getEngine(services.engines, services.config.engine);
      const abort = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) abort.abort();
      });

      // the device stays locked for as long as the engine is being drained
      const source = locks.hold(engine.device, () => engine.stream(request, abort.signal));
      const body = Readable.from(encodeSpeechStream(source, { cache, logger, signal: abort.signal }));

      res.status(200).set({
        'Content-Type': 'audio/wav',
        'Cache-Control': 'no-cache',
        'X-Accel-Buffering': 'no',
      });
      headersCommitted = true;
      logger.info({ event: 'stream_started', mode, engine: engine.id, device: engine.device });
      await pipeline(body, res);
    } catch (error) {
      if (headersCommitted) {
        // client went away; nothing left to report to it
        logger.warn({
          event: 'stream_aborted',
          message: error instanceof Error ? error.message : String(error),
        });
        return;
      }
      next(error);
    }
  });

  router.post('/:mode', async (req, res, next) => {
    try {
      const mode = requireMode(req.params.mode);
      const request = parseSpeechRequest(schemas, mode, req.body);
      const engine = getEngine(services.engines, services.config.engine);
      const { samples, sampleRate } = await locks.runExclusive(engine.device, () =>
        collectSpeech(engine.stream(request))
      );
      const jobId = randomUUID();
      cache.put(jobId, samples, sampleRate);
      logger.info({ event: 'generation_completed', mode, jobId, samples: samples.length });
      res.set('X-Job-Id', jobId);
      sendWav(res, createWavFile(samples, sampleRate), 'inline; filename="output.wav"');
    } catch (error) {
      next(error);
    }
  });

  return router;
}
