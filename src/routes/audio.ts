import { Router } from 'express';
import { NotFound } from '../errors';
import type { StoredAudio } from '../storage/types';

export interface AudioReader {
  get(idOrFileName: string): Promise<StoredAudio>;
}

export function createAudioRouter(store: AudioReader): Router {
  const router = Router();

  router.get('/:fileName', async (req, res, next) => {
    try {
      const audio = await store.get(req.params.fileName);
      res.status(200).type('audio/wav').send(audio.data);
    } catch (error) {
      if (error instanceof NotFound) {
        res.status(404).json({ error: 'audio_not_found', id: error.id });
        return;
      }
      next(error);
    }
  });

  return router;
}
