import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const DEFAULT_SYSTEM_PROMPT = [
  'You are a helpful AI voice assistant.',
  'Keep your responses brief and conversational - aim for 1-2 sentences.',
  "You're speaking on a phone call, so be natural and friendly.",
].join('\n');

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const optionalString = () => z.preprocess(emptyToUndefined, z.string().min(1).optional());

const urlWithDefault = (fallback: string) =>
  z.preprocess(emptyToUndefined, z.string().url().default(fallback));

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const EnvSchema = z.object({
  PORT: positiveInt(8080),
  PUBLIC_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  TTS_URL: urlWithDefault('http://localhost:5000'),
  ASR_URL: urlWithDefault('http://localhost:9000'),
  LLM_URL: urlWithDefault('http://localhost:11434'),
  LLM_MODEL: z.preprocess(emptyToUndefined, z.string().min(1).default('llama3.1:8b')),
  LLM_TEMPERATURE: z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(2).default(0.7)),
  LLM_MAX_TOKENS: positiveInt(150),
  LANGFLOW_URL: urlWithDefault('http://localhost:7860'),
  LANGFLOW_FLOW_ID: optionalString(),
  SYSTEM_PROMPT: z.preprocess(emptyToUndefined, z.string().min(1).default(DEFAULT_SYSTEM_PROMPT)),
  TTS_TIMEOUT_MS: positiveInt(30_000),
  ASR_TIMEOUT_MS: positiveInt(30_000),
  LLM_TIMEOUT_MS: positiveInt(60_000),
  TTS_LANGUAGE: z.preprocess(emptyToUndefined, z.string().min(2).default('en')),
  AUDIO_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('./audio_cache')),
  AUDIO_MAX_AGE_HOURS: positiveInt(24),
  AUDIO_SWEEP_INTERVAL_MS: positiveInt(60 * 60 * 1000),
  TWILIO_AUTH_TOKEN: optionalString(),
  JAMBONZ_SPEECH_VENDOR: z.preprocess(emptyToUndefined, z.string().min(1).default('google')),
  JAMBONZ_TTS_VOICE: z.preprocess(emptyToUndefined, z.string().min(1).default('en-US-Wavenet-D')),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
});

export type Env = Omit<z.infer<typeof EnvSchema>, 'PUBLIC_BASE_URL'> & {
  PUBLIC_BASE_URL: string;
};

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  const data = parsed.data;
  const publicBaseUrl = (data.PUBLIC_BASE_URL ?? `http://localhost:${data.PORT}`).replace(/\/+$/, '');

  return { ...data, PUBLIC_BASE_URL: publicBaseUrl };
}

export const env = parseEnv(process.env);
