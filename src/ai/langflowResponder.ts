import { z } from 'zod';
import { backendFailure, backendOk, BackendUnavailable, toBackendUnavailable } from '../errors';
import type { BackendResult } from '../errors';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import { formatHistory } from './types';
import type { Responder, RespondInput } from './types';

export interface LangflowResponderOptions {
  baseUrl: string;
  flowId: string;
  timeoutMs: number;
}

// outputs[0].outputs[0].results.message.text
const RunResponseSchema = z.object({
  outputs: z
    .array(
      z.object({
        outputs: z
          .array(
            z.object({
              results: z.object({
                message: z.object({ text: z.string() }),
              }),
            }),
          )
          .min(1),
      }),
    )
    .min(1),
});

export function extractWorkflowText(payload: unknown): string | null {
  const parsed = RunResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  const text = parsed.data.outputs[0].outputs[0].results.message.text.trim();
  return text === '' ? null : text;
}

/**
 * Workflow responder: runs a Langflow flow with the caller's words as chat input.
 * The flow owns its prompt, so the persona in RespondInput is not sent.
 */
export class LangflowResponder implements Responder {
  public readonly id = 'langflow';
  private readonly url: string;

  constructor(private readonly options: LangflowResponderOptions) {
    const base = options.baseUrl.replace(/\/+$/, '');
    this.url = `${base}/api/v1/run/${encodeURIComponent(options.flowId)}`;
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
          input_value: `${formatHistory(input.history)}${input.message}`,
          output_type: 'chat',
          input_type: 'chat',
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        const body = await response.text();
        const preview = body.length > 500 ? `${body.slice(0, 500)}...` : body;
        throw new BackendUnavailable(
          'respond',
          `workflow error ${response.status}: ${preview}`,
          response.status,
        );
      }

      const text = extractWorkflowText(await response.json());
      if (!text) {
        throw new BackendUnavailable('respond', 'workflow response has no message text', response.status);
      }

      return backendOk(text);
    } catch (error) {
      const failure = toBackendUnavailable('respond', error);
      incStageError('respond', this.id);
      log.error(
        { err: failure, event: 'workflow_reply_failed', call_sid: input.callId },
        'workflow reply failed',
      );
      return backendFailure(failure);
    } finally {
      endTimer();
    }
  }
}
