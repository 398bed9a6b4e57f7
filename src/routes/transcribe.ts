import express, { Router } from 'express';
import { ValidationError } from '../errors';
import { log } from '../log';
import type { Transcriber } from '../stt/types';

const MAX_AUDIO_BYTES = '10mb';

export function createTranscribeRouter(transcriber: Transcriber, language: string): Router {
  const router = Router();

  router.post('/', express.raw({ type: 'audio/*', limit: MAX_AUDIO_BYTES }), async (req, res) => {
    const body: unknown = req.body;
    if (!Buffer.isBuffer(body) || body.length === 0) {
      const error = new ValidationError('body', 'expected a non-empty audio/* request body');
      res.status(400).json({ error: error.code, field: error.field });
      return;
    }

    const result = await transcriber.transcribe({
      audio: body,
      language,
      contentType: req.header('content-type') ?? 'audio/wav',
    });

    if (!result.ok) {
      res.status(502).json({ error: result.error.code, backend: result.error.backend });
      return;
    }

    log.info(
      { event: 'transcribed', audio_bytes: body.length, text_len: result.value.length, requestId: res.locals.requestId },
      'audio transcribed',
    );
    res.status(200).json({ text: result.value });
  });

  return router;
}
