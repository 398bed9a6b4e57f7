import type { NextFunction, Request, RequestHandler, Response } from 'express';
import twilio from 'twilio';
import { log } from '../log';

export interface TwilioSignatureInput {
  authToken: string;
  signature: string;
  url: string;
  params: Record<string, unknown>;
}

export function verifyTwilioSignature(input: TwilioSignatureInput): boolean {
  if (!input.signature) {
    return false;
  }
  return twilio.validateRequest(input.authToken, input.signature, input.url, input.params);
}

/**
 * Rejects form webhooks whose X-Twilio-Signature does not match. The signed
 * URL is the public one Twilio was configured with, not the local address.
 * Without an auth token every request passes.
 */
export function createTwilioSignatureGuard(options: {
  authToken?: string;
  publicBaseUrl: string;
}): RequestHandler {
  const { authToken } = options;
  const baseUrl = options.publicBaseUrl.replace(/\/+$/, '');

  return (req: Request, res: Response, next: NextFunction) => {
    if (!authToken) {
      next();
      return;
    }

    const params: Record<string, unknown> =
      typeof req.body === 'object' && req.body !== null ? req.body : {};
    const ok = verifyTwilioSignature({
      authToken,
      signature: req.header('x-twilio-signature') ?? '',
      url: `${baseUrl}${req.originalUrl}`,
      params,
    });

    if (!ok) {
      log.warn(
        { event: 'twilio_signature_rejected', path: req.originalUrl, requestId: res.locals.requestId },
        'twilio webhook rejected',
      );
      res.status(401).json({ error: 'invalid_signature' });
      return;
    }

    next();
  };
}
