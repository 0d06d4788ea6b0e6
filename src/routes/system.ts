import express from 'express';
import type { AppServices } from '../services.js';

export function createSystemRouter(services: AppServices): express.Router {
  const router = express.Router();

  router.get('/devices', (_req, res) => {
    res.json(services.locks.status());
  });

  return router;
}
