import type { OAuthResponse } from '@oauth-bridge/core';
import type { FastifyReply } from 'fastify';

/**
 * renders an oauth response onto the outgoing reply
 *
 * headers are copied verbatim; a response without a body is sent empty
 * @param reply fastify reply object
 * @param response response filled by the engine
 * @returns the sent reply
 */
export async function sendOAuthResponse(
  reply: FastifyReply,
  response: OAuthResponse,
): Promise<FastifyReply> {
  reply.code(response.status).headers(response.headers);

  return response.body === undefined
    ? reply.send()
    : reply.send(response.body);
}
