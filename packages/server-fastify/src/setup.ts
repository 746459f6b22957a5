import formbody from '@fastify/formbody';
import { Authorize, Refresh, Token } from '@oauth-bridge/core';

import { DEFAULT_ROUTES } from '#constants/defaults';
import { setupErrorHandler } from '#errors';
import { createOAuthHandler } from '#handlers';

import type { Executor } from '@oauth-bridge/core';
import type { FastifyInstance, FastifyPluginAsync } from 'fastify';

import type { ErrorHandlerOptions } from '#errors';

/** paths of the oauth endpoints */
export interface OAuthRoutes {
  /** authorization endpoint, served for GET and POST (default: /authorize) */
  authorize: string;
  /** token endpoint (default: /token) */
  token: string;
  /** refresh endpoint (default: /refresh) */
  refresh: string;
}

/** options for the oauth endpoints plugin */
export interface OAuthEndpointOptions extends ErrorHandlerOptions {
  /** runs operations, directly against an engine or through a worker */
  execute: Executor;
  /** endpoint paths overriding the defaults */
  routes?: Partial<OAuthRoutes>;
}

/**
 * prepares a fastify scope for oauth handlers
 *
 * the scope's parsers are replaced: form bodies are parsed and any other
 * payload, json included, is kept as text, so a body the engine never reads
 * cannot fail the request. failures are rendered by the oauth error handler
 * @param server the fastify server instance to configure
 * @param options status policy for the error handler
 */
export async function setupOAuthAdapter(
  server: FastifyInstance,
  options: ErrorHandlerOptions = {},
): Promise<void> {
  server.removeAllContentTypeParsers();
  await server.register(formbody);

  server.addContentTypeParser(
    '*',
    { parseAs: 'string' },
    (_request, body, done) => {
      done(null, body);
    },
  );

  if (!server.hasRequestDecorator('oauthGrant')) {
    server.decorateRequest('oauthGrant', null);
  }

  setupErrorHandler(server, options);
}

/**
 * registers the authorization, token and refresh endpoints
 * @param options executor, paths and status policy
 * @returns fastify plugin async function
 * @example
 * ```typescript
 * const worker = new EndpointWorker(endpoint);
 * await server.register(registerOAuthRoutes({ execute: dispatchTo(worker) }), {
 *   prefix: '/oauth',
 * });
 * ```
 */
export function registerOAuthRoutes(
  options: OAuthEndpointOptions,
): FastifyPluginAsync {
  const { execute, statusOverrides, protocolOverrides } = options;
  const routes: OAuthRoutes = { ...DEFAULT_ROUTES, ...options.routes };

  return async (fastify) => {
    await setupOAuthAdapter(fastify, { statusOverrides, protocolOverrides });

    const authorize = createOAuthHandler({
      operation: (request) => new Authorize(request),
      execute,
    });

    fastify.get(routes.authorize, authorize);
    // consent forms post back to the authorization endpoint
    fastify.post(routes.authorize, authorize);
    fastify.post(
      routes.token,
      createOAuthHandler({
        operation: (request) => new Token(request),
        execute,
      }),
    );
    fastify.post(
      routes.refresh,
      createOAuthHandler({
        operation: (request) => new Refresh(request),
        execute,
      }),
    );
  };
}
