import {
  FORM_CONTENT_TYPE,
  NormalizedParameter,
  OAuthRequest,
  OAuthResource,
} from '@oauth-bridge/core';

import type { ParameterRecord, RequestPayload } from '@oauth-bridge/core';
import type { FastifyReply, FastifyRequest } from 'fastify';

/**
 * collects every value of a header from the raw header list
 *
 * node's parsed `headers` object drops or joins duplicates, so repeated
 * headers are only visible in `rawHeaders`
 * @param rawHeaders alternating names and values as received
 * @param header header name to collect
 * @returns values in the order received
 */
export function collectHeaderValues(
  rawHeaders: readonly string[],
  header: string,
): string[] {
  const targetHeader = header.toLowerCase();
  const values: string[] = [];

  for (let index = 0; index + 1 < rawHeaders.length; index += 2) {
    if (rawHeaders[index]?.toLowerCase() === targetHeader) {
      values.push(rawHeaders[index + 1] ?? '');
    }
  }

  return values;
}

/**
 * extracts the raw query string from a request url
 * @param url request url as received, e.g. `/authorize?code=abc`
 * @returns query string without the leading `?`, empty when there is none
 */
export function extractQueryString(url: string): string {
  const separator = url.indexOf('?');

  return separator === -1 ? '' : url.slice(separator + 1);
}

/**
 * describes the body fastify has already parsed
 *
 * the oauth scope only parses forms; every other payload arrives as text
 * @param request fastify request after body parsing
 * @returns the payload in the shape the oauth request expects
 */
export function describePayload(request: FastifyRequest): RequestPayload {
  const { body } = request;
  const contentType = request.headers['content-type'];

  if (body === undefined || body === null || body === '') {
    return { type: 'none' };
  }

  if (typeof body === 'string') {
    return { type: 'text', contentType, text: body };
  }

  const mediaType = contentType?.split(';')[0]?.trim().toLowerCase();
  if (mediaType === FORM_CONTENT_TYPE && typeof body === 'object') {
    return {
      type: 'form',
      parameters: NormalizedParameter.fromRecord(toParameterRecord(body)),
    };
  }

  // decoded by a parser outside the oauth scope, so it is not a form
  return { type: 'text', contentType, text: '' };
}

/**
 * builds the oauth request for a route handler
 * @param request fastify request
 * @returns normalized request
 * @throws {WebError} `authorization` when more than one authorization header was sent
 */
export async function extractOAuthRequest(
  request: FastifyRequest,
): Promise<OAuthRequest> {
  return OAuthRequest.create({
    authorization: collectAuthorization(request),
    query: extractQueryString(request.url),
    readBody: async () => describePayload(request),
  });
}

/**
 * builds the header-only oauth request used to guard resources
 * @param request fastify request
 * @returns resource request; the body is left untouched
 * @throws {WebError} `authorization` when more than one authorization header was sent
 */
export function extractOAuthResource(request: FastifyRequest): OAuthResource {
  return OAuthResource.create(collectAuthorization(request));
}

/**
 * creates a signal aborted when the client drops the connection
 * @param request fastify request
 * @param reply fastify reply
 * @returns signal to cancel work done on behalf of the request
 */
export function createAbortSignal(
  request: FastifyRequest,
  reply: FastifyReply,
): AbortSignal {
  const abortController = new AbortController();

  request.raw.once('close', () => {
    // NOTE: a destroyed request whose reply was never completed means the client went away
    if (request.raw.destroyed && !reply.raw.writableEnded) {
      abortController.abort();
    }
  });

  return abortController.signal;
}

/**
 * keeps the string and string array values of a parsed form
 * @param body object produced by the form parser
 * @returns parameter record
 */
function toParameterRecord(body: object): ParameterRecord {
  const record: ParameterRecord = {};

  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      record[key] = value;
    } else if (Array.isArray(value)) {
      record[key] = value.filter(
        (item): item is string => typeof item === 'string',
      );
    }
  }

  return record;
}

/**
 * collects the authorization header values of a request
 * @param request fastify request
 * @returns every authorization value received
 */
function collectAuthorization(request: FastifyRequest): string[] {
  // NOTE: injected requests may not carry a raw header list
  const rawHeaders: readonly string[] = request.raw.rawHeaders ?? [];
  const values = collectHeaderValues(rawHeaders, 'authorization');
  if (values.length > 0) {
    return values;
  }

  const { authorization } = request.headers;

  return authorization === undefined ? [] : [authorization];
}
