import { backendFailure, backendOk, BackendUnavailable, toBackendUnavailable } from '../errors';
import type { BackendResult } from '../errors';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import type { HttpBackendOptions, Synthesizer, TTSRequest, TTSResult } from './types';

/**
 * XTTS HTTP client: `POST {baseUrl}/tts` with `{ text, language }`, WAV bytes back.
 * Single attempt; failures come back as BackendUnavailable.
 */
export class XttsHttpClient implements Synthesizer {
  public readonly id = 'xtts_http';
  private readonly url: string;

  constructor(private readonly options: HttpBackendOptions) {
    this.url = `${options.baseUrl.replace(/\/+$/, '')}/tts`;
  }

  public async synthesize(request: TTSRequest): Promise<BackendResult<TTSResult>> {
    const endTimer = startStageTimer('synthesize', this.id);

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ text: request.text, language: request.language }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      const contentType = response.headers.get('content-type') ?? '';
      const audio = Buffer.from(await response.arrayBuffer());

      if (!response.ok) {
        const preview = audio.toString('utf8').slice(0, 500);
        throw new BackendUnavailable(
          'synthesize',
          `tts error ${response.status}: ${preview}`,
          response.status,
        );
      }

      if (contentType.includes('application/json')) {
        throw new BackendUnavailable('synthesize', 'tts returned JSON instead of audio', response.status);
      }

      if (audio.length === 0) {
        throw new BackendUnavailable('synthesize', 'tts returned an empty body', response.status);
      }

      return backendOk({ audio, contentType: contentType || 'audio/wav' });
    } catch (error) {
      const failure = toBackendUnavailable('synthesize', error);
      incStageError('synthesize', this.id);
      log.error(
        { err: failure, event: 'tts_failed', text_len: request.text.length },
        'tts synthesis failed',
      );
      return backendFailure(failure);
    } finally {
      endTimer();
    }
  }
}
