/**
 * Error taxonomy for the hotline runtime.
 *
 * Webhook handlers never let these escape to the telephony provider: a
 * ValidationError becomes a re-prompt, a BackendUnavailable becomes a
 * fallback utterance or native-voice speech, and NotFound maps to a 404.
 */

export type BackendName = 'synthesize' | 'transcribe' | 'respond';

export abstract class HotlineError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.cause != null ? { cause: String(this.cause) } : {}),
    };
  }
}

/** A required inbound field is missing or malformed. */
export class ValidationError extends HotlineError {
  readonly code = 'validation_error';

  constructor(
    readonly field: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), field: this.field };
  }
}

/** A backend call failed at the transport or status level, or returned an unusable payload. */
export class BackendUnavailable extends HotlineError {
  readonly code = 'backend_unavailable';

  constructor(
    readonly backend: BackendName,
    message: string,
    readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      backend: this.backend,
      ...(this.status !== undefined ? { status: this.status } : {}),
    };
  }
}

export class NotFound extends HotlineError {
  readonly code = 'not_found';

  constructor(
    readonly resource: string,
    readonly id: string,
  ) {
    super(`${resource} not found: ${id}`);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), resource: this.resource, id: this.id };
  }
}

export type BackendResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: BackendUnavailable };

export function backendOk<T>(value: T): BackendResult<T> {
  return { ok: true, value };
}

export function backendFailure<T>(error: BackendUnavailable): BackendResult<T> {
  return { ok: false, error };
}

/**
 * Wrap a thrown transport error (abort, timeout, connection refused) as BackendUnavailable.
 */
export function toBackendUnavailable(backend: BackendName, error: unknown): BackendUnavailable {
  if (error instanceof BackendUnavailable) {
    return error;
  }
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new BackendUnavailable(backend, `${backend} timed out`, undefined, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new BackendUnavailable(backend, `${backend} request failed: ${message}`, undefined, {
    cause: error,
  });
}
