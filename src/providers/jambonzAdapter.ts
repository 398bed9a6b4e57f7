import { z } from 'zod';
import type { CallStart, TurnOutcome, Utterance } from '../calls/types';
import { ValidationError } from '../errors';
import { gatherTimeoutMessage, NO_SPEECH_GOODBYE } from './types';
import type { ControlDocument, ProviderAdapter, ProviderAdapterOptions } from './types';

export interface JambonzSynthesizer {
  vendor: string;
  language: string;
  voice: string;
}

export interface JambonzRecognizer {
  vendor: string;
  language: string;
}

export interface PlayVerb {
  verb: 'play';
  url: string;
}

export interface SayVerb {
  verb: 'say';
  text: string;
  synthesizer?: JambonzSynthesizer;
}

export interface GatherVerb {
  verb: 'gather';
  input: Array<'speech' | 'digits'>;
  actionHook: string;
  timeout: number;
  speechTimeout?: 'auto' | number;
  recognizer?: JambonzRecognizer;
}

export interface HangupVerb {
  verb: 'hangup';
}

export type JambonzVerb = PlayVerb | SayVerb | GatherVerb | HangupVerb;

export interface JambonzAdapterOptions extends ProviderAdapterOptions {
  speechVendor: string;
  ttsVoice: string;
  language?: string;
}

const GATHER_TIMEOUT_SECONDS = 10;

const CallStartSchema = z.object({
  call_sid: z.string().min(1).optional(),
  from: z.string().min(1).optional(),
});

const GatherResultSchema = z.object({
  call_sid: z.string().min(1).optional(),
  speech: z.object({
    alternatives: z.array(z.object({ transcript: z.string() })).min(1),
  }),
});

/**
 * jambonz adapter. Webhooks are JSON; responses are arrays of verbs
 * executed in order by the platform.
 */
export class JambonzAdapter implements ProviderAdapter {
  public readonly id = 'jambonz';
  public readonly greetingPath = '/jambonz';
  public readonly turnPath = '/jambonz-gather';
  private readonly actionHook: string;
  private readonly synthesizer: JambonzSynthesizer;
  private readonly recognizer: JambonzRecognizer;

  constructor(options: JambonzAdapterOptions) {
    const language = options.language ?? 'en-US';
    this.actionHook = `${options.publicBaseUrl.replace(/\/+$/, '')}${this.turnPath}`;
    this.synthesizer = { vendor: options.speechVendor, language, voice: options.ttsVoice };
    this.recognizer = { vendor: options.speechVendor, language };
  }

  public decodeCallStart(raw: unknown): CallStart {
    const parsed = CallStartSchema.safeParse(raw);
    if (!parsed.success) {
      return { callId: 'unknown' };
    }
    return { callId: parsed.data.call_sid ?? 'unknown', from: parsed.data.from };
  }

  public decodeInbound(raw: unknown): Utterance {
    const parsed = GatherResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError('speech.alternatives[0].transcript', 'gather action has no transcript');
    }
    return {
      text: parsed.data.speech.alternatives[0].transcript,
      callId: parsed.data.call_sid ?? 'unknown',
    };
  }

  public buildGreeting(outcome: TurnOutcome): JambonzVerb[] {
    return [
      this.speak(outcome),
      this.gather(),
      { verb: 'say', text: NO_SPEECH_GOODBYE, synthesizer: this.synthesizer },
      { verb: 'hangup' },
    ];
  }

  public buildTurnOutcome(outcome: TurnOutcome): JambonzVerb[] {
    if (outcome.shouldTerminate) {
      return [this.speak(outcome), { verb: 'hangup' }];
    }

    return [
      this.speak(outcome),
      this.gather(),
      { verb: 'say', text: gatherTimeoutMessage(outcome), synthesizer: this.synthesizer },
      { verb: 'hangup' },
    ];
  }

  public encodeGreeting(outcome: TurnOutcome): ControlDocument {
    return this.toDocument(this.buildGreeting(outcome));
  }

  public encodeTurnOutcome(outcome: TurnOutcome): ControlDocument {
    return this.toDocument(this.buildTurnOutcome(outcome));
  }

  private speak(outcome: TurnOutcome): PlayVerb | SayVerb {
    if (outcome.audioRef) {
      return { verb: 'play', url: outcome.audioRef };
    }
    return { verb: 'say', text: outcome.spokenText, synthesizer: this.synthesizer };
  }

  private gather(): GatherVerb {
    return {
      verb: 'gather',
      input: ['speech'],
      actionHook: this.actionHook,
      timeout: GATHER_TIMEOUT_SECONDS,
      speechTimeout: 'auto',
      recognizer: this.recognizer,
    };
  }

  private toDocument(verbs: JambonzVerb[]): ControlDocument {
    return { contentType: 'application/json', body: JSON.stringify(verbs) };
  }
}
