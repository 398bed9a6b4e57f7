import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import type http from 'node:http';
import os from 'node:os';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';
import { z } from 'zod';
import type { TurnEngine } from '../src/calls/turnEngine';
import { backendFailure, backendOk, BackendUnavailable } from '../src/errors';
import type { ServerDeps } from '../src/server';
import { FakeResponder, FakeSynthesizer, FakeTranscriber } from './fakes';
import { close, listen, postForm, postJson, request } from './httpClient';
import { setTestEnv } from './testEnv';
import { signTwilioRequest } from './twilioSign';

setTestEnv();

const PUBLIC_BASE_URL = 'http://hotline.test';
const AUDIO_URL_PATTERN = /http:\/\/hotline\.test\/audio\/([0-9a-f-]{36}\.wav)/;

const VerbsSchema = z.array(
  z.object({ verb: z.string(), actionHook: z.string().optional(), text: z.string().optional() }).passthrough(),
);

function verbsOf(body: Buffer) {
  return VerbsSchema.parse(JSON.parse(body.toString('utf8')));
}

const health = {
  responder: 'ollama' as const,
  services: { tts: 'http://tts.test', asr: 'http://asr.test', llm: 'http://llm.test', langflow: 'not configured' },
};

async function startServer(overrides: Partial<ServerDeps> = {}) {
  const { buildServer } = await import('../src/server');
  const { DialogueTurnEngine } = await import('../src/calls/turnEngine');
  const { AudioStore } = await import('../src/storage/audioStore');
  const { TwimlAdapter } = await import('../src/providers/twimlAdapter');
  const { JambonzAdapter } = await import('../src/providers/jambonzAdapter');

  const responder = new FakeResponder(backendOk('It is sunny today.'));
  const synthesizer = new FakeSynthesizer();
  const transcriber = new FakeTranscriber(backendOk('hello there'));
  const audioStore = new AudioStore({
    dir: await fs.mkdtemp(path.join(os.tmpdir(), 'hotline-server-')),
    publicBaseUrl: PUBLIC_BASE_URL,
    maxAgeMs: 60_000,
    sweepIntervalMs: 60_000,
  });
  const engine = new DialogueTurnEngine({
    responder,
    synthesizer,
    audioStore,
    systemPrompt: 'Be brief.',
    language: 'en',
  });

  const { server } = buildServer({
    engine,
    adapters: [
      new TwimlAdapter({ publicBaseUrl: PUBLIC_BASE_URL }),
      new JambonzAdapter({ publicBaseUrl: PUBLIC_BASE_URL, speechVendor: 'google', ttsVoice: 'en-US-Wavenet-D' }),
    ],
    audioStore,
    transcriber,
    health,
    publicBaseUrl: PUBLIC_BASE_URL,
    language: 'en',
    ...overrides,
  });
  const baseUrl = await listen(server);

  return { server, baseUrl, responder, synthesizer, transcriber };
}

describe('voice webhooks', () => {
  let server: http.Server;
  let baseUrl: string;
  let responder: FakeResponder;
  let synthesizer: FakeSynthesizer;

  before(async () => {
    ({ server, baseUrl, responder, synthesizer } = await startServer());
  });

  after(async () => {
    await close(server);
  });

  it('answers an incoming Twilio call with a greeting and a speech gather', async () => {
    const res = await postForm(baseUrl, '/voice', { CallSid: 'CA100', From: '+15550001111' });

    assert.equal(res.status, 200);
    assert.match(String(res.headers['content-type']), /^text\/xml/);
    const body = res.body.toString('utf8');
    assert.match(body, /<Play>http:\/\/hotline\.test\/audio\/[0-9a-f-]{36}\.wav<\/Play>/);
    assert.ok(body.includes('action="http://hotline.test/gather"'));
    assert.ok(body.includes('<Hangup/>'));
  });

  it('replies to a question with playable audio and gathers again', async () => {
    responder.calls.length = 0;

    const res = await postForm(baseUrl, '/gather', { CallSid: 'CA100', SpeechResult: "What's the weather" });
    const body = res.body.toString('utf8');

    assert.equal(res.status, 200);
    assert.deepEqual(responder.calls, [{ message: "What's the weather", systemPrompt: 'Be brief.', callId: 'CA100' }]);
    assert.ok(body.includes('<Gather '));
    assert.ok(body.includes('<Say>Are you still there?</Say>'));

    const match = AUDIO_URL_PATTERN.exec(body);
    assert.ok(match);
    const audio = await request(baseUrl, 'GET', `/audio/${match[1]}`);
    assert.equal(audio.status, 200);
    assert.match(String(audio.headers['content-type']), /^audio\/wav/);
    assert.deepEqual(audio.body, Buffer.from('wav:It is sunny today.'));
  });

  it('ends the call on a closing phrase without asking the responder', async () => {
    responder.calls.length = 0;

    const res = await postForm(baseUrl, '/gather', { CallSid: 'CA100', SpeechResult: 'okay goodbye' });
    const body = res.body.toString('utf8');

    assert.equal(res.status, 200);
    assert.equal(responder.calls.length, 0);
    assert.match(body, /<Play>[^<]+<\/Play><Hangup\/>/);
    assert.equal(body.includes('<Gather'), false);
  });

  it('re-prompts on empty speech in the provider voice when synthesis is down', async () => {
    responder.calls.length = 0;
    synthesizer.failing = true;

    try {
      const cases: Array<Record<string, string>> = [{ CallSid: 'CA100', SpeechResult: '' }, { CallSid: 'CA100' }];
      for (const fields of cases) {
        const res = await postForm(baseUrl, '/gather', fields);
        const body = res.body.toString('utf8');

        assert.equal(res.status, 200);
        assert.ok(body.includes('catch that, could you repeat?</Say>'));
        assert.ok(body.includes('<Say>Still nothing. Goodbye!</Say>'));
        assert.equal(body.includes('<Play>'), false);
      }
      assert.equal(responder.calls.length, 0);
    } finally {
      synthesizer.failing = false;
    }
  });

  it('apologizes when the responder is unavailable', async () => {
    const previous = responder.result;
    responder.result = backendFailure(new BackendUnavailable('respond', 'respond timed out'));
    synthesizer.failing = true;

    try {
      const res = await postForm(baseUrl, '/gather', { CallSid: 'CA100', SpeechResult: 'Tell me a joke' });
      const body = res.body.toString('utf8');

      assert.equal(res.status, 200);
      assert.ok(body.includes('had trouble understanding. Could you repeat that?</Say>'));
      assert.ok(body.includes('<Gather '));
    } finally {
      responder.result = previous;
      synthesizer.failing = false;
    }
  });

  it('answers jambonz calls with verb arrays', async () => {
    responder.calls.length = 0;

    const greeting = await postJson(baseUrl, '/jambonz', { call_sid: 'j-1', from: '+15550002222' });
    assert.equal(greeting.status, 200);
    assert.match(String(greeting.headers['content-type']), /^application\/json/);
    const greetingVerbs = verbsOf(greeting.body);
    assert.deepEqual(
      greetingVerbs.map((verb) => verb.verb),
      ['play', 'gather', 'say', 'hangup'],
    );
    assert.equal(greetingVerbs[1].actionHook, 'http://hotline.test/jambonz-gather');

    const turn = await postJson(baseUrl, '/jambonz-gather', {
      call_sid: 'j-1',
      speech: { alternatives: [{ transcript: 'Tell me a joke' }] },
    });
    assert.deepEqual(
      verbsOf(turn.body).map((verb) => verb.verb),
      ['play', 'gather', 'say', 'hangup'],
    );
    assert.deepEqual(responder.calls, [{ message: 'Tell me a joke', systemPrompt: 'Be brief.', callId: 'j-1' }]);

    const farewell = await postJson(baseUrl, '/jambonz-gather', {
      call_sid: 'j-1',
      speech: { alternatives: [{ transcript: "that's all" }] },
    });
    assert.deepEqual(
      verbsOf(farewell.body).map((verb) => verb.verb),
      ['play', 'hangup'],
    );
  });

  it('re-prompts a jambonz gather that timed out without speech', async () => {
    responder.calls.length = 0;

    const res = await postJson(baseUrl, '/jambonz-gather', { call_sid: 'j-1', reason: 'timeout' });
    const verbs = verbsOf(res.body);

    assert.equal(res.status, 200);
    assert.deepEqual(
      verbs.map((verb) => verb.verb),
      ['play', 'gather', 'say', 'hangup'],
    );
    assert.equal(verbs[2].text, 'Still nothing. Goodbye!');
    assert.equal(responder.calls.length, 0);
  });

  it('answers a malformed jambonz greeting body with the greeting', async () => {
    const res = await request(baseUrl, 'POST', '/jambonz', {
      body: '{"speech":',
      headers: { 'Content-Type': 'application/json' },
    });
    const verbs = verbsOf(res.body);

    assert.equal(res.status, 200);
    assert.match(String(res.headers['content-type']), /^application\/json/);
    assert.deepEqual(
      verbs.map((verb) => verb.verb),
      ['say', 'gather', 'say', 'hangup'],
    );
    assert.equal(verbs[0].text, "Hello! I'm your AI assistant. How can I help you today?");
  });

  it('answers a malformed jambonz gather body with a re-prompt', async () => {
    responder.calls.length = 0;

    const res = await request(baseUrl, 'POST', '/jambonz-gather', {
      body: '{"speech":',
      headers: { 'Content-Type': 'application/json' },
    });
    const verbs = verbsOf(res.body);

    assert.equal(res.status, 200);
    assert.deepEqual(
      verbs.map((verb) => verb.verb),
      ['say', 'gather', 'say', 'hangup'],
    );
    assert.equal(verbs[0].text, "I didn't catch that, could you repeat?");
    assert.equal(verbs[2].text, 'Still nothing. Goodbye!');
    assert.equal(responder.calls.length, 0);
  });

  it('answers an oversized Twilio gather body with a re-prompt', async () => {
    const res = await postForm(baseUrl, '/gather', { CallSid: 'CA100', SpeechResult: 'a'.repeat(200_000) });
    const body = res.body.toString('utf8');

    assert.equal(res.status, 200);
    assert.match(String(res.headers['content-type']), /^text\/xml/);
    assert.ok(body.includes('catch that, could you repeat?</Say>'));
    assert.ok(body.includes('<Say>Still nothing. Goodbye!</Say>'));
  });

  it('returns 404 for audio that was never stored', async () => {
    const res = await request(baseUrl, 'GET', '/audio/00000000-0000-4000-8000-000000000000.wav');

    assert.equal(res.status, 404);
    assert.deepEqual(JSON.parse(res.body.toString('utf8')), {
      error: 'audio_not_found',
      id: '00000000-0000-4000-8000-000000000000.wav',
    });
  });

  it('reports health and liveness', async () => {
    const res = await request(baseUrl, 'GET', '/health');
    const payload: unknown = JSON.parse(res.body.toString('utf8'));

    assert.equal(res.status, 200);
    assert.ok(typeof payload === 'object' && payload !== null);
    assert.deepEqual({ ...payload, uptime_seconds: 0 }, {
      status: 'ok',
      service: 'ai-hotline-webhook',
      responder: 'ollama',
      services: health.services,
      uptime_seconds: 0,
    });

    const live = await request(baseUrl, 'GET', '/health/live');
    assert.deepEqual(JSON.parse(live.body.toString('utf8')), { status: 'ok' });
  });

  it('echoes a caller-supplied request id', async () => {
    const res = await request(baseUrl, 'GET', '/health/live', { headers: { 'x-request-id': 'req-42' } });

    assert.equal(res.headers['x-request-id'], 'req-42');
  });

  it('exposes turn counters on /metrics', async () => {
    const res = await request(baseUrl, 'GET', '/metrics');

    assert.equal(res.status, 200);
    assert.ok(res.body.toString('utf8').includes('hotline_voice_runtime_turns_total{provider="twilio",kind="greeting",audio="cloned"}'));
  });
});

describe('transcription endpoint', () => {
  let server: http.Server;
  let baseUrl: string;
  let transcriber: FakeTranscriber;

  before(async () => {
    ({ server, baseUrl, transcriber } = await startServer());
  });

  after(async () => {
    await close(server);
  });

  it('transcribes an uploaded audio body', async () => {
    const res = await request(baseUrl, 'POST', '/v1/transcribe', {
      body: Buffer.from('RIFF-audio'),
      headers: { 'Content-Type': 'audio/wav' },
    });

    assert.equal(res.status, 200);
    assert.deepEqual(JSON.parse(res.body.toString('utf8')), { text: 'hello there' });
    assert.deepEqual(transcriber.calls[0].audio, Buffer.from('RIFF-audio'));
    assert.equal(transcriber.calls[0].language, 'en');
  });

  it('rejects an empty body', async () => {
    const res = await request(baseUrl, 'POST', '/v1/transcribe', {
      body: '',
      headers: { 'Content-Type': 'audio/wav' },
    });

    assert.equal(res.status, 400);
    assert.deepEqual(JSON.parse(res.body.toString('utf8')), { error: 'validation_error', field: 'body' });
  });

  it('maps a backend failure to 502', async () => {
    transcriber.result = backendFailure(new BackendUnavailable('transcribe', 'asr error 503: busy', 503));

    const res = await request(baseUrl, 'POST', '/v1/transcribe', {
      body: Buffer.from('RIFF-audio'),
      headers: { 'Content-Type': 'audio/wav' },
    });

    assert.equal(res.status, 502);
    assert.deepEqual(JSON.parse(res.body.toString('utf8')), {
      error: 'backend_unavailable',
      backend: 'transcribe',
    });
  });
});

describe('engine failures', () => {
  let server: http.Server;
  let baseUrl: string;

  before(async () => {
    const failingEngine: TurnEngine = {
      greet: async () => {
        throw new Error('engine exploded');
      },
      processTurn: async () => {
        throw new Error('engine exploded');
      },
    };
    ({ server, baseUrl } = await startServer({ engine: failingEngine }));
  });

  after(async () => {
    await close(server);
  });

  it('still answers the greeting with the provider voice', async () => {
    const res = await postForm(baseUrl, '/voice', { CallSid: 'CA200' });
    const body = res.body.toString('utf8');

    assert.equal(res.status, 200);
    assert.ok(body.includes('How can I help you today?</Say>'));
    assert.ok(body.includes('<Gather '));
  });

  it('still answers a turn with an apology', async () => {
    const res = await postForm(baseUrl, '/gather', { CallSid: 'CA200', SpeechResult: 'hello' });
    const body = res.body.toString('utf8');

    assert.equal(res.status, 200);
    assert.ok(body.includes('had trouble understanding. Could you repeat that?</Say>'));
    assert.ok(body.includes('<Say>Are you still there?</Say>'));
  });
});

describe('twilio signature check', () => {
  let server: http.Server;
  let baseUrl: string;

  before(async () => {
    ({ server, baseUrl } = await startServer({ twilioAuthToken: 'test-secret' }));
  });

  after(async () => {
    await close(server);
  });

  it('rejects unsigned webhooks', async () => {
    const res = await postForm(baseUrl, '/voice', { CallSid: 'CA300' });

    assert.equal(res.status, 401);
    assert.deepEqual(JSON.parse(res.body.toString('utf8')), { error: 'invalid_signature' });
  });

  it('accepts webhooks signed for the public URL', async () => {
    const fields = { CallSid: 'CA300', From: '+15550003333' };
    const signature = signTwilioRequest('test-secret', 'http://hotline.test/voice', fields);

    const res = await postForm(baseUrl, '/voice', fields, { 'X-Twilio-Signature': signature });

    assert.equal(res.status, 200);
    assert.ok(res.body.toString('utf8').includes('<Gather '));
  });

  it('leaves jambonz routes unguarded', async () => {
    const res = await postJson(baseUrl, '/jambonz', { call_sid: 'j-2' });

    assert.equal(res.status, 200);
  });
});
