import { Router } from 'express';
import type { ResponderId } from '../ai/types';

export interface HealthInfo {
  responder: ResponderId;
  services: {
    tts: string;
    asr: string;
    llm: string;
    langflow: string;
  };
}

const startTime = Date.now();

export function createHealthRouter(info: HealthInfo): Router {
  const router = Router();

  // Liveness only; backends are not probed.
  router.get('/live', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  router.get('/', (_req, res) => {
    res.status(200).json({
      status: 'ok',
      service: 'ai-hotline-webhook',
      responder: info.responder,
      services: info.services,
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
    });
  });

  return router;
}
