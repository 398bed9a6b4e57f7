export type CallSid = string;

export interface CallStart {
  callId: CallSid;
  from?: string;
}

/** One decoded caller utterance. Empty text means no speech was detected. */
export interface Utterance {
  text: string;
  callId: CallSid;
}

export type TurnKind = 'greeting' | 'reprompt' | 'reply' | 'apology' | 'farewell';

export interface TurnOutcome {
  kind: TurnKind;
  spokenText: string;
  /** Public URL of the synthesized reply; absent when synthesis failed. */
  audioRef?: string;
  shouldTerminate: boolean;
}
