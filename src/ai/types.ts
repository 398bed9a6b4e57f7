import type { BackendResult } from '../errors';

export interface ConversationTurn {
  role: 'user' | 'assistant';
  text: string;
}

export interface RespondInput {
  message: string;
  /** Persona / system instruction. Workflow backends carry their own and ignore it. */
  systemPrompt: string;
  history?: ConversationTurn[];
  callId?: string;
}

export type ResponderId = 'ollama' | 'langflow';

export interface Responder {
  readonly id: ResponderId;
  respond(input: RespondInput): Promise<BackendResult<string>>;
}

/** Render prior turns as `User:` / `Assistant:` lines. */
export function formatHistory(history: ConversationTurn[] | undefined): string {
  if (!history || history.length === 0) {
    return '';
  }
  return history
    .map((turn) => `${turn.role === 'user' ? 'User' : 'Assistant'}: ${turn.text}`)
    .join('\n')
    .concat('\n');
}
