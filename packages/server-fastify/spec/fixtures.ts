import { vi } from 'vitest';

import type { Endpoint, Grant } from '@oauth-bridge/core';
import type { FastifyReply, FastifyRequest } from 'fastify';

// common mock engine for adapter tests

export const authorize = vi.fn<Endpoint['authorize']>();
export const token = vi.fn<Endpoint['token']>();
export const refresh = vi.fn<Endpoint['refresh']>();
export const resource = vi.fn<Endpoint['resource']>();

export const endpoint: Endpoint = { authorize, token, refresh, resource };

export const grant: Grant = {
  ownerId: 'test-owner',
  clientId: 'test-client',
  scope: ['read'],
  redirectUri: 'https://client.example/cb',
  until: new Date('2030-01-01T00:00:00Z'),
};

/**
 * builds a minimal fastify request for extraction tests
 * @param params request parts
 * @param params.rawHeaders alternating raw header names and values
 * @param params.url request url
 * @param params.contentType content-type header
 * @param params.body body as left by the content parser
 * @returns request object cast to the fastify type
 */
export function createRequest(params: {
  rawHeaders?: string[];
  url?: string;
  contentType?: string;
  body?: unknown;
}): FastifyRequest {
  const { rawHeaders = [], url = '/', contentType, body } = params;

  return {
    raw: { rawHeaders, once: vi.fn() },
    url,
    headers: contentType ? { 'content-type': contentType } : {},
    body,
  } as unknown as FastifyRequest;
}

/**
 * builds a chainable fastify reply mock
 * @returns reply object cast to the fastify type
 */
export function createReply(): FastifyReply {
  const reply: Partial<FastifyReply> = {
    code: vi.fn().mockReturnThis(),
    headers: vi.fn().mockReturnThis(),
    send: vi.fn().mockReturnThis(),
  };

  return reply as FastifyReply;
}
