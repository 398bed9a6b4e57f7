import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import type { TurnEngine } from './calls/turnEngine';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import type { ProviderAdapter } from './providers/types';
import { createAudioRouter } from './routes/audio';
import type { AudioReader } from './routes/audio';
import { createHealthRouter } from './routes/health';
import type { HealthInfo } from './routes/health';
import { createTranscribeRouter } from './routes/transcribe';
import { createVoiceWebhookRouter, createWebhookBodyErrorHandler } from './routes/voiceWebhook';
import type { Transcriber } from './stt/types';
import { createTwilioSignatureGuard } from './twilio/twilioVerify';

export interface ServerDeps {
  engine: TurnEngine;
  adapters: ProviderAdapter[];
  audioStore: AudioReader;
  transcriber: Transcriber;
  health: HealthInfo;
  publicBaseUrl: string;
  language: string;
  twilioAuthToken?: string;
}

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  res.locals.requestId = requestId;
  next();
}

function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  log.error({ err }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export function buildServer(deps: ServerDeps): { app: express.Express; server: http.Server } {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use('/health', createHealthRouter(deps.health));
  app.get('/metrics', metricsHandler);
  app.use('/audio', createAudioRouter(deps.audioStore));
  app.use('/v1/transcribe', createTranscribeRouter(deps.transcriber, deps.language));

  const twilioGuard = createTwilioSignatureGuard({
    authToken: deps.twilioAuthToken,
    publicBaseUrl: deps.publicBaseUrl,
  });

  for (const adapter of deps.adapters) {
    if (adapter.id === 'twilio') {
      app.use([adapter.greetingPath, adapter.turnPath], twilioGuard);
    }
    app.use(createVoiceWebhookRouter(adapter, deps.engine));
    app.use([adapter.greetingPath, adapter.turnPath], createWebhookBodyErrorHandler(adapter));
  }

  app.use(errorHandler);

  const server = http.createServer(app);

  return { app, server };
}
