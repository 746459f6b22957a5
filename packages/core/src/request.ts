import { parseUrlEncoded } from '#parameter';
import { WebError } from '#web-error';

import type { WebRequest } from '#contract';
import type { NormalizedParameter } from '#parameter';

/** media type a body must carry to be read as form parameters */
export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/** a request payload as handed over by the http framework */
export type RequestPayload =
  | { type: 'none' }
  | { type: 'form'; parameters: NormalizedParameter }
  | { type: 'text'; contentType?: string; text: string };

/**
 * what the http framework provides to build an oauth request
 * @example
 * ```typescript
 * const source: RequestSource = {
 *   authorization: ['Bearer test-token'],
 *   query: 'code=abc&state=xyz',
 *   readBody: async () => ({ type: 'none' }),
 * };
 * ```
 */
export interface RequestSource {
  /** every raw authorization header value, in the order received */
  authorization: readonly string[];
  /** raw query string without the leading `?`, or undefined when it could not be obtained */
  query?: string;
  /** reads the payload; called at most once */
  readBody: () => Promise<RequestPayload>;
}

/** field state: either the parsed parameters or why they are unavailable */
type Extracted =
  | { present: true; parameters: NormalizedParameter }
  | { present: false; reason: 'query' | 'body' | 'form' | 'encoding' };

// visible ascii and horizontal tab
const HEADER_TEXT = /^[\t\x20-\x7e]*$/;

/**
 * picks the single authorization header value
 * @param values raw header values
 * @returns the value, or undefined when none was sent or it is not visible ascii
 * @throws {WebError} `authorization` when more than one header was sent
 */
function selectAuthorization(values: readonly string[]): string | undefined {
  if (values.length > 1) {
    throw new WebError('authorization');
  }

  const [value] = values;

  return value !== undefined && HEADER_TEXT.test(value) ? value : undefined;
}

/**
 * @param payload body read from the framework
 * @returns the form parameters or the reason they are unavailable
 */
function extractBody(payload: RequestPayload): Extracted {
  switch (payload.type) {
    case 'none':
      return { present: false, reason: 'body' };
    case 'form':
      return { present: true, parameters: payload.parameters };
    case 'text': {
      const mediaType = payload.contentType?.split(';')[0]?.trim().toLowerCase();
      if (mediaType !== FORM_CONTENT_TYPE) {
        return { present: false, reason: 'form' };
      }

      const parameters = parseUrlEncoded(payload.text);

      return parameters
        ? { present: true, parameters }
        : { present: false, reason: 'encoding' };
    }
  }
}

/**
 * @param query raw query string
 * @returns the query parameters or the reason they are unavailable
 */
function extractQuery(query: string | undefined): Extracted {
  const parameters = query === undefined ? undefined : parseUrlEncoded(query);

  return parameters
    ? { present: true, parameters }
    : { present: false, reason: 'query' };
}

/**
 * normalized request handed to the engine
 *
 * query and body failures are deferred: they are only raised when an
 * accessor is called, so handlers that never read a field never see them
 */
export class OAuthRequest implements WebRequest {
  readonly #auth: string | undefined;
  readonly #query: Extracted;
  readonly #body: Extracted;

  private constructor(auth: string | undefined, query: Extracted, body: Extracted) {
    this.#auth = auth;
    this.#query = query;
    this.#body = body;
  }

  /**
   * builds a request from framework primitives, reading the body once
   * @param source header values, query string and body reader
   * @returns the normalized request
   * @throws {WebError} `authorization` when more than one authorization header was sent
   */
  public static async create(source: RequestSource): Promise<OAuthRequest> {
    const auth = selectAuthorization(source.authorization);
    const query = extractQuery(source.query);
    const body = extractBody(await source.readBody());

    return new OAuthRequest(auth, query, body);
  }

  /**
   * builds a request that only carries an authorization value
   * @param auth authorization header value
   * @returns a request whose query and body are absent
   */
  public static fromAuthorization(auth: string | undefined): OAuthRequest {
    return new OAuthRequest(
      auth,
      { present: false, reason: 'query' },
      { present: false, reason: 'body' },
    );
  }

  /** the authorization header value, if one was sent */
  public get authorization(): string | undefined {
    return this.#auth;
  }

  /** whether the query string could be parsed */
  public get hasQuery(): boolean {
    return this.#query.present;
  }

  /** whether a form body could be parsed */
  public get hasBody(): boolean {
    return this.#body.present;
  }

  /**
   * @returns the query parameters
   * @throws {WebError} `query` when the query was absent or unparseable
   */
  public query(): NormalizedParameter {
    return unwrap(this.#query);
  }

  /**
   * @returns the form body parameters
   * @throws {WebError} `body`, `form` or `encoding` depending on why the body is unavailable
   */
  public urlbody(): NormalizedParameter {
    return unwrap(this.#body);
  }

  public authheader(): string | undefined {
    return this.#auth;
  }
}

/**
 * request used to guard resources, built from headers only
 *
 * it never reads the body, so handlers remain free to consume the payload
 */
export class OAuthResource {
  readonly #auth: string | undefined;

  private constructor(auth: string | undefined) {
    this.#auth = auth;
  }

  /**
   * @param authorization raw authorization header values
   * @returns the resource request
   * @throws {WebError} `authorization` when more than one header was sent
   */
  public static create(authorization: readonly string[]): OAuthResource {
    return new OAuthResource(selectAuthorization(authorization));
  }

  /** the authorization header value, if one was sent */
  public get authorization(): string | undefined {
    return this.#auth;
  }

  /** @returns a full request with query and body forced absent */
  public toRequest(): OAuthRequest {
    return OAuthRequest.fromAuthorization(this.#auth);
  }
}

/**
 * @param field extracted field state
 * @returns the parameters
 * @throws {WebError} carrying the reason the field is unavailable
 */
function unwrap(field: Extracted): NormalizedParameter {
  if (!field.present) {
    throw new WebError(field.reason);
  }

  return field.parameters;
}
