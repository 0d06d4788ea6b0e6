import express from 'express';
import type { AppServices } from '../services.js';
import { createWavFile } from '../streaming/wavHeader.js';
import { historyItemSchema, isValidJobId } from '../validation.js';
import { HttpError } from '../errors.js';
import { sendWav } from './tts.js';

export function createHistoryRouter(services: AppServices): express.Router {
  const router = express.Router();
  const { history, cache } = services;

  router.get('/', (_req, res) => {
    res.json(history.list());
  });

  router.post('/', (req, res) => {
    const parsed = historyItemSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw new HttpError(400, parsed.error.issues[0]?.message ?? 'invalid history item');
    }
    res.json(history.add(parsed.data));
  });

  router.post('/clear', (_req, res) => {
    const removed = history.clear();
    res.json({ success: true, removed });
  });

  router.delete('/:id', (req, res) => {
    const removed = history.remove(req.params.id);
    res.json({ success: true, removed });
  });

  router.get('/audio/:audioId', (req, res) => {
    const { audioId } = req.params;
    if (!isValidJobId(audioId)) {
      res.status(400).json({ message: 'Invalid audio ID' });
      return;
    }
    const entry = cache.get(audioId);
    if (!entry) {
      res.status(404).json({ message: 'Audio not found or expired' });
      return;
    }
    sendWav(res, createWavFile(entry.samples, entry.sampleRate));
  });

  return router;
}
