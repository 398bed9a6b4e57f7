import { createResponder } from './ai';
import { DialogueTurnEngine } from './calls/turnEngine';
import { env } from './env';
import { log } from './log';
import { JambonzAdapter } from './providers/jambonzAdapter';
import { TwimlAdapter } from './providers/twimlAdapter';
import { buildServer } from './server';
import { AudioStore } from './storage/audioStore';
import { WhisperAsrClient } from './stt/whisperAsr';
import { XttsHttpClient } from './tts/xttsHttp';

const audioStore = new AudioStore({
  dir: env.AUDIO_DIR,
  publicBaseUrl: env.PUBLIC_BASE_URL,
  maxAgeMs: env.AUDIO_MAX_AGE_HOURS * 60 * 60 * 1000,
  sweepIntervalMs: env.AUDIO_SWEEP_INTERVAL_MS,
});

const responder = createResponder(env);

const engine = new DialogueTurnEngine({
  responder,
  synthesizer: new XttsHttpClient({ baseUrl: env.TTS_URL, timeoutMs: env.TTS_TIMEOUT_MS }),
  audioStore,
  systemPrompt: env.SYSTEM_PROMPT,
  language: env.TTS_LANGUAGE,
});

const { server } = buildServer({
  engine,
  adapters: [
    new TwimlAdapter({ publicBaseUrl: env.PUBLIC_BASE_URL }),
    new JambonzAdapter({
      publicBaseUrl: env.PUBLIC_BASE_URL,
      speechVendor: env.JAMBONZ_SPEECH_VENDOR,
      ttsVoice: env.JAMBONZ_TTS_VOICE,
    }),
  ],
  audioStore,
  transcriber: new WhisperAsrClient({ baseUrl: env.ASR_URL, timeoutMs: env.ASR_TIMEOUT_MS }),
  health: {
    responder: responder.id,
    services: {
      tts: env.TTS_URL,
      asr: env.ASR_URL,
      llm: env.LLM_URL,
      langflow: env.LANGFLOW_FLOW_ID ? env.LANGFLOW_URL : 'not configured',
    },
  },
  publicBaseUrl: env.PUBLIC_BASE_URL,
  language: env.TTS_LANGUAGE,
  twilioAuthToken: env.TWILIO_AUTH_TOKEN,
});

audioStore.startSweeper();

server.listen(env.PORT, () => {
  log.info(
    {
      port: env.PORT,
      public_base_url: env.PUBLIC_BASE_URL,
      responder: responder.id,
      twilio_signature_check: Boolean(env.TWILIO_AUTH_TOKEN),
    },
    'server listening',
  );
});

const shutdown = (signal: NodeJS.Signals): void => {
  log.info({ signal }, 'shutting down');
  audioStore.stopSweeper();
  server.close(() => {
    log.info('server closed');
    process.exit(0);
  });
  setTimeout(() => {
    log.warn('forced shutdown after timeout');
    process.exit(1);
  }, 10_000).unref();
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
