import { STATUS_CODES } from 'node:http';

import {
  isTransient,
  jsonifyError,
  resolveStatus,
  WebError,
} from '@oauth-bridge/core';

import type {
  ProtocolStatusOverrides,
  StatusOverrides,
} from '@oauth-bridge/core';
import type { FastifyInstance } from 'fastify';

/** options for the oauth error handler */
export interface ErrorHandlerOptions {
  /**
   * status codes to use per error kind instead of 500
   * @example
   * ```typescript
   * { authorization: 400, query: 400, body: 400, form: 400, mailbox: 503 }
   * ```
   */
  statusOverrides?: StatusOverrides;
  /**
   * status codes for engine failures per protocol error, checked before
   * `statusOverrides`
   * @example
   * ```typescript
   * { denied_access: 400, bad_request: 400 }
   * ```
   */
  protocolOverrides?: ProtocolStatusOverrides;
}

/**
 * installs the error handler turning every failure into a generic response
 *
 * the client only learns the status; the structured error goes to the request log
 * @param server the fastify server instance to configure
 * @param options status policy
 */
export function setupErrorHandler(
  server: FastifyInstance,
  options: ErrorHandlerOptions = {},
): void {
  server.setErrorHandler(async (error, request, reply) => {
    const webError = WebError.from(error);
    const status = resolveStatus(
      webError,
      options.statusOverrides,
      options.protocolOverrides,
    );

    request.log.error(
      {
        error: jsonifyError(webError),
        kind: webError.kind,
        transient: isTransient(webError),
        url: request.url,
      },
      'OAuth request failed',
    );

    return reply.code(status).send({ error: STATUS_CODES[status] ?? 'Error' });
  });
}
