import type { Grant } from '@oauth-bridge/core';

declare module 'fastify' {
  interface FastifyRequest {
    /** grant of the access token that passed the resource guard */
    oauthGrant: Grant | null;
  }
}
