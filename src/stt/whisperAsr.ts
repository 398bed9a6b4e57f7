import { z } from 'zod';
import { backendFailure, backendOk, BackendUnavailable, toBackendUnavailable } from '../errors';
import type { BackendResult } from '../errors';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import type { HttpBackendOptions } from '../tts/types';
import type { STTRequest, Transcriber } from './types';

const AsrResponseSchema = z.object({ text: z.string() });

/**
 * Whisper ASR webservice client: multipart `POST {baseUrl}/asr` with the
 * WAV under `audio_file`, returns `{ text }`.
 */
export class WhisperAsrClient implements Transcriber {
  public readonly id = 'whisper_asr';
  private readonly url: string;

  constructor(private readonly options: HttpBackendOptions) {
    this.url = `${options.baseUrl.replace(/\/+$/, '')}/asr`;
  }

  public async transcribe(request: STTRequest): Promise<BackendResult<string>> {
    const endTimer = startStageTimer('transcribe', this.id);

    const form = new FormData();
    form.append(
      'audio_file',
      new Blob([new Uint8Array(request.audio)], { type: request.contentType ?? 'audio/wav' }),
      request.fileName ?? 'audio.wav',
    );
    form.append('task', 'transcribe');
    form.append('language', request.language);

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        body: form,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        const body = await response.text();
        const preview = body.length > 500 ? `${body.slice(0, 500)}...` : body;
        throw new BackendUnavailable('transcribe', `asr error ${response.status}: ${preview}`, response.status);
      }

      const parsed = AsrResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new BackendUnavailable('transcribe', 'asr response missing text', response.status);
      }

      return backendOk(parsed.data.text.trim());
    } catch (error) {
      const failure = toBackendUnavailable('transcribe', error);
      incStageError('transcribe', this.id);
      log.error(
        { err: failure, event: 'asr_failed', audio_bytes: request.audio.length },
        'asr transcription failed',
      );
      return backendFailure(failure);
    } finally {
      endTimer();
    }
  }
}
