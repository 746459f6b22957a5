import { validateHeaderValue } from 'node:http';

import {
  HTTP_BAD_REQUEST,
  HTTP_FOUND,
  HTTP_OK,
  HTTP_UNAUTHORIZED,
} from '#constants/http';
import { WebError } from '#web-error';

import type { WebResponse } from '#contract';

/** plain snapshot of a response */
export interface OAuthResponseSnapshot {
  status: number;
  headers: Record<string, string>;
  body?: string;
}

/**
 * response accumulated from the actions an engine takes
 *
 * every action validates its header values before touching any state, so a
 * failed action leaves the response as it was
 */
export class OAuthResponse implements WebResponse {
  #status = HTTP_OK;
  #headers = new Map<string, string>();
  #body: string | undefined;

  /** @returns an empty 200 response */
  public static ok(): OAuthResponse {
    return new OAuthResponse();
  }

  /** current status code */
  public get status(): number {
    return this.#status;
  }

  /** headers keyed by lower-case name */
  public get headers(): Record<string, string> {
    return Object.fromEntries(this.#headers);
  }

  /** response body, if any */
  public get body(): string | undefined {
    return this.#body;
  }

  /**
   * sets the content-type header
   * @param contentType media type
   * @returns this response for chaining
   * @throws {WebError} `header` when the value is not a valid header value
   */
  public contentType(contentType: string): this {
    this.#setHeaders({ 'content-type': contentType });

    return this;
  }

  /**
   * sets the body without touching the content-type
   * @param body body text
   * @returns this response for chaining
   */
  public withBody(body: string): this {
    this.#body = body;

    return this;
  }

  public ok(): void {
    this.#status = HTTP_OK;
  }

  public redirect(url: URL | string): void {
    this.#setHeaders({ location: url.toString() });
    this.#status = HTTP_FOUND;
  }

  public clientError(): void {
    this.#status = HTTP_BAD_REQUEST;
  }

  public unauthorized(kind: string): void {
    this.#setHeaders({ 'www-authenticate': kind });
    this.#status = HTTP_UNAUTHORIZED;
  }

  public bodyText(text: string): void {
    this.#setHeaders({ 'content-type': 'text/plain' });
    this.#body = text;
  }

  public bodyJson(json: string): void {
    this.#setHeaders({ 'content-type': 'application/json' });
    this.#body = json;
  }

  /** @returns a plain copy of status, headers and body */
  public toJSON(): OAuthResponseSnapshot {
    return {
      status: this.#status,
      headers: this.headers,
      ...(this.#body !== undefined && { body: this.#body }),
    };
  }

  /**
   * validates then stores header values
   * @param headers header values keyed by lower-case name
   * @throws {WebError} `header` when any value is rejected
   */
  #setHeaders(headers: Record<string, string>): void {
    const entries = Object.entries(headers);

    try {
      for (const [name, value] of entries) {
        validateHeaderValue(name, value);
      }
    } catch (error) {
      throw WebError.from(error);
    }

    for (const [name, value] of entries) {
      this.#headers.set(name, value);
    }
  }
}
