import { vi } from 'vitest';

import type { Endpoint, Grant } from '#contract';
import type { RequestPayload, RequestSource } from '#request';

export const grant: Grant = {
  ownerId: 'test-owner',
  clientId: 'test-client',
  scope: ['read'],
  redirectUri: 'https://client.example/cb',
  until: new Date('2030-01-01T00:00:00Z'),
};

export const authorize = vi.fn<Endpoint['authorize']>();
export const token = vi.fn<Endpoint['token']>();
export const refresh = vi.fn<Endpoint['refresh']>();
export const resource = vi.fn<Endpoint['resource']>();

export const endpoint: Endpoint = { authorize, token, refresh, resource };

/**
 * builds a request source for tests
 * @param overrides fields to replace
 * @returns request source with no headers, an empty query and no body
 */
export function createSource(
  overrides: Partial<RequestSource> = {},
): RequestSource {
  return {
    authorization: [],
    query: '',
    readBody: async (): Promise<RequestPayload> => ({ type: 'none' }),
    ...overrides,
  };
}

/**
 * runs a function expected to throw
 * @param fn function to run
 * @returns the thrown value
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }

  throw new Error('expected function to throw');
}
