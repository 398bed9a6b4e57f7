import type { BackendResult } from '../errors';

export interface STTRequest {
  audio: Buffer;
  language: string;
  fileName?: string;
  contentType?: string;
}

export interface Transcriber {
  readonly id: string;
  transcribe(request: STTRequest): Promise<BackendResult<string>>;
}
