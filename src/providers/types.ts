import type { CallStart, TurnOutcome, Utterance } from '../calls/types';

export type ProviderId = 'twilio' | 'jambonz';

/** Provider-specific response body telling the telephony platform what to do next. */
export interface ControlDocument {
  contentType: string;
  body: string;
}

/**
 * Translates between one telephony provider's webhook protocol and the
 * provider-agnostic dialogue engine.
 */
export interface ProviderAdapter {
  readonly id: ProviderId;
  /** Route the provider calls when a call arrives. */
  readonly greetingPath: string;
  /** Route the provider calls with each gathered utterance. */
  readonly turnPath: string;

  /** Never throws; unknown fields fall back to `unknown`. */
  decodeCallStart(raw: unknown): CallStart;
  /** Throws ValidationError when the payload carries no transcript field. */
  decodeInbound(raw: unknown): Utterance;
  encodeGreeting(outcome: TurnOutcome): ControlDocument;
  encodeTurnOutcome(outcome: TurnOutcome): ControlDocument;
}

export interface ProviderAdapterOptions {
  publicBaseUrl: string;
}

export const NO_SPEECH_GOODBYE = "I didn't hear anything. Goodbye!";
export const LISTENING_PROMPT = "I'm listening.";
export const STILL_THERE_PROMPT = 'Are you still there?';
export const STILL_NOTHING_GOODBYE = 'Still nothing. Goodbye!';

/** Message spoken by the provider if the gather after this outcome times out. */
export function gatherTimeoutMessage(outcome: TurnOutcome): string {
  return outcome.kind === 'reprompt' ? STILL_NOTHING_GOODBYE : STILL_THERE_PROMPT;
}
