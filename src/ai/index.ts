import type { Env } from '../env';
import { LangflowResponder } from './langflowResponder';
import { OllamaResponder } from './ollamaResponder';
import type { Responder } from './types';

/** Selected once per process: a configured flow id means the workflow backend. */
export function createResponder(config: Env): Responder {
  if (config.LANGFLOW_FLOW_ID) {
    return new LangflowResponder({
      baseUrl: config.LANGFLOW_URL,
      flowId: config.LANGFLOW_FLOW_ID,
      timeoutMs: config.LLM_TIMEOUT_MS,
    });
  }

  return new OllamaResponder({
    baseUrl: config.LLM_URL,
    model: config.LLM_MODEL,
    temperature: config.LLM_TEMPERATURE,
    maxTokens: config.LLM_MAX_TOKENS,
    timeoutMs: config.LLM_TIMEOUT_MS,
  });
}

export type { ConversationTurn, Responder, RespondInput, ResponderId } from './types';
