import type { NormalizedParameter } from '#parameter';

/**
 * request capabilities an engine reads from
 *
 * every accessor may throw a `WebError`; query and body only fail when they
 * are actually read
 */
export interface WebRequest {
  /** @returns the parsed query string */
  query(): NormalizedParameter;
  /** @returns the parsed `application/x-www-form-urlencoded` body */
  urlbody(): NormalizedParameter;
  /** @returns the single authorization header value, if one was sent */
  authheader(): string | undefined;
}

/** response actions an engine takes; each may throw a header `WebError` */
export interface WebResponse {
  /** answers with 200 */
  ok(): void;
  /** sends the user agent to `url` with 302 */
  redirect(url: URL | string): void;
  /** answers with 400 */
  clientError(): void;
  /** answers with 401 and a `WWW-Authenticate` challenge of `kind` */
  unauthorized(kind: string): void;
  /** sets a `text/plain` body */
  bodyText(text: string): void;
  /** sets an `application/json` body */
  bodyJson(json: string): void;
}

/** access granted to a resource owner, as recorded by the engine */
export interface Grant {
  /** identifier of the resource owner */
  ownerId: string;
  /** identifier of the client the grant was issued to */
  clientId: string;
  /** granted scope tokens */
  scope: string[];
  /** redirect uri the grant was bound to */
  redirectUri: string;
  /** instant the grant expires */
  until: Date;
  /** engine specific extension data */
  extensions?: Record<string, string>;
}

/**
 * the OAuth2 engine collaborator
 *
 * each flow reads the request and records its decision on the response;
 * protocol failures are thrown as `OAuthProtocolError`, request or response
 * failures are rethrown as they were received
 */
export interface Endpoint {
  /** runs the authorization code flow */
  authorize(request: WebRequest, response: WebResponse): Promise<void> | void;
  /** exchanges an authorization code for an access token */
  token(request: WebRequest, response: WebResponse): Promise<void> | void;
  /** exchanges a refresh token for a new access token */
  refresh(request: WebRequest, response: WebResponse): Promise<void> | void;
  /**
   * checks the access token guarding a resource
   * @returns the grant when access is allowed, or undefined after filling the response with the refusal
   */
  resource(
    request: WebRequest,
    response: WebResponse,
  ): Promise<Grant | undefined> | Grant | undefined;
}
