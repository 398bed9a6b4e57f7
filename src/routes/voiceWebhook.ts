import { ErrorRequestHandler, Response, Router } from 'express';
import { APOLOGY_TEXT, GREETING_TEXT, REPROMPT_TEXT } from '../calls/turnEngine';
import type { TurnEngine } from '../calls/turnEngine';
import type { TurnOutcome, Utterance } from '../calls/types';
import { ValidationError } from '../errors';
import { log } from '../log';
import { recordTurn } from '../metrics';
import type { ControlDocument, ProviderAdapter } from '../providers/types';

const GREETING_FALLBACK: TurnOutcome = {
  kind: 'greeting',
  spokenText: GREETING_TEXT,
  shouldTerminate: false,
};

const APOLOGY_FALLBACK: TurnOutcome = {
  kind: 'apology',
  spokenText: APOLOGY_TEXT,
  shouldTerminate: false,
};

const REPROMPT_FALLBACK: TurnOutcome = {
  kind: 'reprompt',
  spokenText: REPROMPT_TEXT,
  shouldTerminate: false,
};

/** body-parser error types, e.g. `entity.parse.failed` or `entity.too.large`. */
function bodyParserErrorType(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string') {
    return error.type;
  }
  return undefined;
}

function sendDocument(res: Response, document: ControlDocument): void {
  res.status(200).type(document.contentType).send(document.body);
}

/**
 * Greeting and turn webhooks for one provider. Every request is answered
 * with a control document, including when decoding or a backend fails.
 */
export function createVoiceWebhookRouter(adapter: ProviderAdapter, engine: TurnEngine): Router {
  const router = Router();

  router.post(adapter.greetingPath, async (req, res) => {
    const requestId: unknown = res.locals.requestId;
    const call = adapter.decodeCallStart(req.body);
    const context = { provider: adapter.id, call_sid: call.callId, requestId };

    log.info({ event: 'call_incoming', from: call.from, ...context }, 'incoming call');

    let document: ControlDocument;
    try {
      const outcome = await engine.greet(call.callId);
      recordTurn(adapter.id, outcome.kind, Boolean(outcome.audioRef));
      document = adapter.encodeGreeting(outcome);
    } catch (error) {
      log.error({ err: error, event: 'greeting_failed', ...context }, 'greeting failed, using provider voice');
      document = adapter.encodeGreeting(GREETING_FALLBACK);
    }

    sendDocument(res, document);
  });

  router.post(adapter.turnPath, async (req, res) => {
    const requestId: unknown = res.locals.requestId;
    const call = adapter.decodeCallStart(req.body);

    let utterance: Utterance;
    try {
      utterance = adapter.decodeInbound(req.body);
    } catch (error) {
      const field = error instanceof ValidationError ? error.field : undefined;
      log.warn(
        { err: error, event: 'utterance_invalid', provider: adapter.id, call_sid: call.callId, field, requestId },
        'gather payload without transcript, treating as silence',
      );
      utterance = { text: '', callId: call.callId };
    }

    const context = { provider: adapter.id, call_sid: utterance.callId, requestId };
    log.info({ event: 'speech_input', text: utterance.text, ...context }, 'speech input');

    let document: ControlDocument;
    try {
      const outcome = await engine.processTurn(utterance);
      recordTurn(adapter.id, outcome.kind, Boolean(outcome.audioRef));
      document = adapter.encodeTurnOutcome(outcome);
    } catch (error) {
      log.error({ err: error, event: 'turn_failed', ...context }, 'turn failed, apologizing');
      document = adapter.encodeTurnOutcome(APOLOGY_FALLBACK);
    }

    sendDocument(res, document);
  });

  return router;
}

/**
 * Answers webhook bodies the app-level parsers rejected (malformed JSON,
 * oversized payloads) with a control document instead of an error page.
 * Mount on the adapter's paths, after its router.
 */
export function createWebhookBodyErrorHandler(adapter: ProviderAdapter): ErrorRequestHandler {
  return (err, req, res, next) => {
    const errorType = bodyParserErrorType(err);
    if (!errorType) {
      next(err);
      return;
    }

    const isGreeting = req.baseUrl === adapter.greetingPath;
    log.warn(
      {
        err,
        event: 'webhook_body_rejected',
        provider: adapter.id,
        path: req.originalUrl,
        error_type: errorType,
        requestId: res.locals.requestId,
      },
      'unreadable webhook body, answering with fallback document',
    );

    sendDocument(
      res,
      isGreeting ? adapter.encodeGreeting(GREETING_FALLBACK) : adapter.encodeTurnOutcome(REPROMPT_FALLBACK),
    );
  };
}
