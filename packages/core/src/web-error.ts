import { HTTP_INTERNAL_SERVER_ERROR } from '#constants/http';

/**
 * every failure origin this layer knows about
 * - `endpoint`: protocol error raised by the engine
 * - `header`: a response header value could not be constructed
 * - `encoding`: the request payload was not decodable
 * - `form`: the request body is not a form
 * - `query`: the request query was absent or could not be parsed
 * - `body`: the request had no body
 * - `authorization`: the request carried more than one authorization header
 * - `canceled`: processing was canceled or timed out
 * - `mailbox`: a worker's mailbox was full or closed
 */
export type WebErrorKind =
  | 'endpoint'
  | 'header'
  | 'encoding'
  | 'form'
  | 'query'
  | 'body'
  | 'authorization'
  | 'canceled'
  | 'mailbox';

/** status codes to use instead of the default 500, keyed by error kind */
export type StatusOverrides = Partial<Record<WebErrorKind, number>>;

/** protocol failures reported by the engine */
export type OAuthProtocolErrorKind =
  | 'denied_access'
  | 'bad_request'
  | 'primitive_error';

/**
 * status codes for endpoint failures, keyed by the engine's protocol error
 * @example
 * ```typescript
 * { denied_access: 400, bad_request: 400 }
 * ```
 */
export type ProtocolStatusOverrides = Partial<
  Record<OAuthProtocolErrorKind, number>
>;

const PROTOCOL_DESCRIPTIONS: Record<OAuthProtocolErrorKind, string> = {
  denied_access: 'OAuth access was denied',
  bad_request: 'OAuth request was malformed',
  primitive_error: 'OAuth primitive failed',
};

const DESCRIPTIONS: Record<Exclude<WebErrorKind, 'endpoint' | 'header'>, string> =
  {
    encoding: 'Error decoding request',
    form: 'Request is not a form',
    query: 'No query present',
    body: 'No body present',
    authorization: 'Request has invalid Authorization headers',
    canceled: 'Operation canceled',
    mailbox: "A worker's mailbox was full or closed",
  };

/** error raised by an engine when the protocol itself fails */
export class OAuthProtocolError extends Error {
  public readonly kind: OAuthProtocolErrorKind;

  /**
   * @param kind the protocol failure
   * @param options standard error options, typically carrying the cause
   */
  constructor(kind: OAuthProtocolErrorKind, options?: ErrorOptions) {
    super(PROTOCOL_DESCRIPTIONS[kind], options);
    this.name = 'OAuthProtocolError';
    this.kind = kind;
  }
}

/** reasons a dispatch to a worker fails */
export type MailboxErrorReason = 'full' | 'closed' | 'timeout';

/** error raised when an operation cannot be delivered to, or answered by, a worker */
export class MailboxError extends Error {
  public readonly reason: MailboxErrorReason;

  constructor(reason: MailboxErrorReason) {
    super(
      reason === 'timeout'
        ? 'Timed out waiting for the worker to reply'
        : `Worker mailbox is ${reason}`,
    );
    this.name = 'MailboxError';
    this.reason = reason;
  }
}

/** error raised when a pending operation is abandoned by its caller */
export class CanceledError extends Error {
  constructor(options?: ErrorOptions) {
    super('Operation canceled', options);
    this.name = 'CanceledError';
  }
}

/**
 * the single error type surfaced by the adapter layer
 *
 * conversions only go into this type; the original failure stays on `cause`
 */
export class WebError extends Error {
  public readonly kind: WebErrorKind;

  /**
   * @param kind origin of the failure
   * @param options standard error options, typically carrying the cause
   */
  constructor(kind: WebErrorKind, options?: ErrorOptions) {
    super(describeKind(kind, options?.cause), options);
    this.name = 'WebError';
    this.kind = kind;
  }

  /**
   * absorbs any thrown value into a web error without losing its origin
   * @param error value caught from a request, response, engine or worker call
   * @returns the unified error
   */
  public static from(error: unknown): WebError {
    if (error instanceof WebError) {
      return error;
    }

    if (error instanceof OAuthProtocolError) {
      return new WebError('endpoint', { cause: error });
    }

    if (error instanceof MailboxError) {
      return new WebError(error.reason === 'timeout' ? 'canceled' : 'mailbox', {
        cause: error,
      });
    }

    if (
      error instanceof CanceledError ||
      (error instanceof Error && error.name === 'AbortError')
    ) {
      return new WebError('canceled', { cause: error });
    }

    const code = readErrorCode(error);
    if (code === 'ERR_INVALID_CHAR' || code === 'ERR_HTTP_INVALID_HEADER_VALUE') {
      return new WebError('header', { cause: error });
    }

    if (code?.startsWith('FST_ERR_CTP_')) {
      return new WebError('encoding', { cause: error });
    }

    // anything else escaped the engine's own error handling
    return new WebError('endpoint', {
      cause: new OAuthProtocolError('primitive_error', { cause: error }),
    });
  }
}

/**
 * produces the human-readable description of an error kind
 * @param error the web error to describe
 * @returns description suitable for operators
 */
export function describeWebError(error: WebError): string {
  return describeKind(error.kind, error.cause);
}

/**
 * tells whether retrying the same request may succeed
 * @param error the web error to inspect
 * @returns true for canceled and mailbox failures
 */
export function isTransient(error: WebError): boolean {
  return error.kind === 'canceled' || error.kind === 'mailbox';
}

/**
 * maps an error to the status code sent to the client
 *
 * every kind fails closed to 500 unless the caller names it in `overrides`;
 * an endpoint failure carrying a protocol error is looked up in
 * `protocolOverrides` first
 * @param error the web error to map
 * @param overrides per-kind status codes
 * @param protocolOverrides per-protocol-error status codes for endpoint failures
 * @returns http status code
 */
export function resolveStatus(
  error: WebError,
  overrides: StatusOverrides = {},
  protocolOverrides: ProtocolStatusOverrides = {},
): number {
  const protocolStatus =
    error.kind === 'endpoint' && error.cause instanceof OAuthProtocolError
      ? protocolOverrides[error.cause.kind]
      : undefined;

  return protocolStatus ?? overrides[error.kind] ?? HTTP_INTERNAL_SERVER_ERROR;
}

/**
 * builds the message for a kind, including the cause's message where the kind wraps one
 * @param kind the error kind
 * @param cause the wrapped failure
 * @returns human-readable description
 */
function describeKind(kind: WebErrorKind, cause: unknown): string {
  switch (kind) {
    case 'endpoint':
      return `Endpoint, ${causeMessage(cause)}`;
    case 'header':
      return `Couldn't set header, ${causeMessage(cause)}`;
    default:
      return DESCRIPTIONS[kind];
  }
}

/**
 * @param cause any wrapped failure
 * @returns its message, or a placeholder when there is none
 */
function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : 'unknown failure';
}

/**
 * @param error any thrown value
 * @returns the node or fastify error code if the value carries one
 */
function readErrorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }

  const code: unknown = Reflect.get(error, 'code');

  return typeof code === 'string' ? code : undefined;
}
