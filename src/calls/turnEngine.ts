import type { Responder } from '../ai/types';
import { log } from '../log';
import type { AudioSink } from '../storage/types';
import type { Synthesizer } from '../tts/types';
import type { CallSid, TurnKind, TurnOutcome, Utterance } from './types';

export const GREETING_TEXT = "Hello! I'm your AI assistant. How can I help you today?";
export const REPROMPT_TEXT = "I didn't catch that, could you repeat?";
export const FAREWELL_TEXT = 'Thank you for calling! Have a great day. Goodbye!';
export const APOLOGY_TEXT = "I'm sorry, I had trouble understanding. Could you repeat that?";

export const CLOSING_PHRASES = ['goodbye', 'bye', 'hang up', 'end call', "that's all"] as const;

export function normalizeUtterance(text: string): string {
  return text.replace(/[‘’]/g, "'").trim().toLowerCase();
}

/** Case-insensitive substring match; "bye" also matches inside longer words. */
export function isClosingPhrase(text: string): boolean {
  const normalized = normalizeUtterance(text);
  return CLOSING_PHRASES.some((phrase) => normalized.includes(phrase));
}

export interface TurnEngine {
  greet(callId: CallSid): Promise<TurnOutcome>;
  processTurn(utterance: Utterance): Promise<TurnOutcome>;
}

export interface TurnEngineDeps {
  responder: Responder;
  synthesizer: Synthesizer;
  audioStore: AudioSink;
  systemPrompt: string;
  language: string;
}

/**
 * Decides what the caller hears next. Holds no per-call state: every turn
 * is computed from the single utterance it is given.
 */
export class DialogueTurnEngine implements TurnEngine {
  constructor(private readonly deps: TurnEngineDeps) {}

  public async greet(callId: CallSid): Promise<TurnOutcome> {
    return this.speak(callId, 'greeting', GREETING_TEXT, false);
  }

  public async processTurn(utterance: Utterance): Promise<TurnOutcome> {
    const text = utterance.text.trim();

    if (!text) {
      return this.speak(utterance.callId, 'reprompt', REPROMPT_TEXT, false);
    }

    if (isClosingPhrase(text)) {
      return this.speak(utterance.callId, 'farewell', FAREWELL_TEXT, true);
    }

    const reply = await this.deps.responder.respond({
      message: text,
      systemPrompt: this.deps.systemPrompt,
      callId: utterance.callId,
    });

    if (!reply.ok) {
      log.warn(
        { event: 'reply_fallback', call_sid: utterance.callId, responder: this.deps.responder.id },
        'responder unavailable, apologizing',
      );
      return this.speak(utterance.callId, 'apology', APOLOGY_TEXT, false);
    }

    log.info(
      { event: 'reply_generated', call_sid: utterance.callId, reply_len: reply.value.length },
      'reply generated',
    );
    return this.speak(utterance.callId, 'reply', reply.value, false);
  }

  private async speak(
    callId: CallSid,
    kind: TurnKind,
    spokenText: string,
    shouldTerminate: boolean,
  ): Promise<TurnOutcome> {
    const audioRef = await this.synthesizeToUrl(callId, spokenText);
    const outcome: TurnOutcome = { kind, spokenText, shouldTerminate };
    if (audioRef) {
      outcome.audioRef = audioRef;
    }

    log.info(
      { event: 'turn_outcome', call_sid: callId, kind, terminate: shouldTerminate, cloned_voice: Boolean(audioRef) },
      'turn outcome',
    );
    return outcome;
  }

  /** Returns undefined when synthesis or storage fails; the adapter then falls back to the provider voice. */
  private async synthesizeToUrl(callId: CallSid, text: string): Promise<string | undefined> {
    const result = await this.deps.synthesizer.synthesize({ text, language: this.deps.language });
    if (!result.ok) {
      return undefined;
    }

    try {
      const artifact = await this.deps.audioStore.put(result.value.audio);
      return artifact.publicUrl;
    } catch (error) {
      log.error({ err: error, event: 'audio_store_failed', call_sid: callId }, 'failed to store synthesized audio');
      return undefined;
    }
  }
}
