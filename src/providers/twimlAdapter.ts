import twilio from 'twilio';
import { z } from 'zod';
import type { CallStart, TurnOutcome, Utterance } from '../calls/types';
import { ValidationError } from '../errors';
import {
  gatherTimeoutMessage,
  LISTENING_PROMPT,
  NO_SPEECH_GOODBYE,
} from './types';
import type { ControlDocument, ProviderAdapter, ProviderAdapterOptions } from './types';

const { VoiceResponse } = twilio.twiml;
type TwimlResponse = InstanceType<typeof VoiceResponse>;

const CallStartSchema = z.object({
  CallSid: z.string().min(1).optional(),
  From: z.string().min(1).optional(),
});

const GatherResultSchema = z.object({
  CallSid: z.string().min(1).optional(),
  SpeechResult: z.string(),
});

/**
 * TwiML adapter. Inbound webhooks are form-encoded; responses are
 * `<Response>` documents built with the twilio helper library.
 */
export class TwimlAdapter implements ProviderAdapter {
  public readonly id = 'twilio';
  public readonly greetingPath = '/voice';
  public readonly turnPath = '/gather';
  private readonly actionUrl: string;

  constructor(options: ProviderAdapterOptions) {
    this.actionUrl = `${options.publicBaseUrl.replace(/\/+$/, '')}${this.turnPath}`;
  }

  public decodeCallStart(raw: unknown): CallStart {
    const parsed = CallStartSchema.safeParse(raw);
    if (!parsed.success) {
      return { callId: 'unknown' };
    }
    return { callId: parsed.data.CallSid ?? 'unknown', from: parsed.data.From };
  }

  public decodeInbound(raw: unknown): Utterance {
    const parsed = GatherResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError('SpeechResult', 'gather callback has no SpeechResult');
    }
    return { text: parsed.data.SpeechResult, callId: parsed.data.CallSid ?? 'unknown' };
  }

  public encodeGreeting(outcome: TurnOutcome): ControlDocument {
    const response = new VoiceResponse();
    this.speak(response, outcome);
    const gather = this.gather(response);
    gather.say(LISTENING_PROMPT);
    response.say(NO_SPEECH_GOODBYE);
    response.hangup();
    return this.toDocument(response);
  }

  public encodeTurnOutcome(outcome: TurnOutcome): ControlDocument {
    const response = new VoiceResponse();
    this.speak(response, outcome);

    if (!outcome.shouldTerminate) {
      this.gather(response);
      response.say(gatherTimeoutMessage(outcome));
    }

    response.hangup();
    return this.toDocument(response);
  }

  // Cloned-voice audio when we have it, otherwise Twilio's own voice.
  private speak(response: TwimlResponse, outcome: TurnOutcome): void {
    if (outcome.audioRef) {
      response.play(outcome.audioRef);
    } else {
      response.say({ voice: 'alice' }, outcome.spokenText);
    }
  }

  private gather(response: TwimlResponse): ReturnType<TwimlResponse['gather']> {
    return response.gather({
      input: ['speech'],
      action: this.actionUrl,
      method: 'POST',
      speechTimeout: 'auto',
      language: 'en-US',
    });
  }

  private toDocument(response: TwimlResponse): ControlDocument {
    return { contentType: 'text/xml', body: response.toString() };
  }
}
