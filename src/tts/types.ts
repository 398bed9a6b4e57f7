import type { BackendResult } from '../errors';

export interface TTSRequest {
  text: string;
  language: string;
}

export interface TTSResult {
  audio: Buffer;
  contentType: string;
}

export interface Synthesizer {
  readonly id: string;
  synthesize(request: TTSRequest): Promise<BackendResult<TTSResult>>;
}

export interface HttpBackendOptions {
  baseUrl: string;
  timeoutMs: number;
}
