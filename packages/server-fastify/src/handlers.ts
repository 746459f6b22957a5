import { Resource } from '@oauth-bridge/core';

import '#types';
import { sendOAuthResponse } from '#reply';
import {
  createAbortSignal,
  extractOAuthRequest,
  extractOAuthResource,
} from '#request-context';

import type {
  Executor,
  OAuthOperation,
  OAuthRequest,
  OAuthResponse,
} from '@oauth-bridge/core';
import type { preHandlerAsyncHookHandler, RouteHandlerMethod } from 'fastify';

/** builds the operation a route runs for a request */
export type OperationFactory = (
  request: OAuthRequest,
) => OAuthOperation<OAuthResponse>;

/**
 * creates a route handler running one oauth operation per request
 * @param params handler configuration
 * @param params.operation builds the operation from the normalized request
 * @param params.execute runs the operation, directly or through a worker
 * @returns fastify route handler
 * @example
 * ```typescript
 * server.post('/token', createOAuthHandler({
 *   operation: (request) => new Token(request),
 *   execute: dispatchTo(worker),
 * }));
 * ```
 */
export function createOAuthHandler(params: {
  operation: OperationFactory;
  execute: Executor;
}): RouteHandlerMethod {
  const { operation, execute } = params;

  return async (request, reply) => {
    const oauthRequest = await extractOAuthRequest(request);
    const response = await execute(operation(oauthRequest), {
      signal: createAbortSignal(request, reply),
    });

    return sendOAuthResponse(reply, response);
  };
}

/**
 * creates a hook that lets a request through only with a valid access token
 *
 * the body is not read, so the protected handler can still consume it;
 * a refused request is answered with the engine's challenge
 * @param params guard configuration
 * @param params.execute runs the resource check, directly or through a worker
 * @returns fastify preHandler hook
 */
export function createResourceGuard(params: {
  execute: Executor;
}): preHandlerAsyncHookHandler {
  const { execute } = params;

  return async function (request, reply) {
    const resource = extractOAuthResource(request);
    const outcome = await execute(new Resource(resource.toRequest()), {
      signal: createAbortSignal(request, reply),
    });

    if (outcome.status === 'denied') {
      return sendOAuthResponse(reply, outcome.response);
    }

    request.oauthGrant = outcome.grant;
  };
}
