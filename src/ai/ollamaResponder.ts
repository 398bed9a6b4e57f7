import { z } from 'zod';
import { backendFailure, backendOk, BackendUnavailable, toBackendUnavailable } from '../errors';
import type { BackendResult } from '../errors';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import { formatHistory } from './types';
import type { Responder, RespondInput } from './types';

export interface OllamaResponderOptions {
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

const GenerateResponseSchema = z.object({ response: z.string() });

export function buildPrompt(input: RespondInput): string {
  return `${input.systemPrompt}\n\n${formatHistory(input.history)}User: ${input.message}\nAssistant:`;
}

/**
 * Direct completion against an Ollama-compatible `/api/generate` endpoint.
 */
export class OllamaResponder implements Responder {
  public readonly id = 'ollama';
  private readonly url: string;

  constructor(private readonly options: OllamaResponderOptions) {
    this.url = `${options.baseUrl.replace(/\/+$/, '')}/api/generate`;
  }

  public async respond(input: RespondInput): Promise<BackendResult<string>> {
    const endTimer = startStageTimer('respond', this.id);

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.options.model,
          prompt: buildPrompt(input),
          stream: false,
          options: {
            temperature: this.options.temperature,
            num_predict: this.options.maxTokens,
          },
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        const body = await response.text();
        const preview = body.length > 500 ? `${body.slice(0, 500)}...` : body;
        throw new BackendUnavailable('respond', `llm error ${response.status}: ${preview}`, response.status);
      }

      const parsed = GenerateResponseSchema.safeParse(await response.json());
      const text = parsed.success ? parsed.data.response.trim() : '';
      if (!text) {
        throw new BackendUnavailable('respond', 'llm reply missing text', response.status);
      }

      return backendOk(text);
    } catch (error) {
      const failure = toBackendUnavailable('respond', error);
      incStageError('respond', this.id);
      log.error(
        { err: failure, event: 'llm_reply_failed', call_sid: input.callId },
        'llm reply failed',
      );
      return backendFailure(failure);
    } finally {
      endTimer();
    }
  }
}
