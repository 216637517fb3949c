import { Router } from 'express';
import type { CallRegistry } from '../calls/callRegistry';

export function createHealthRouter(registry: CallRegistry): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json({ status: 'ok', active_calls: registry.size });
  });

  return router;
}
