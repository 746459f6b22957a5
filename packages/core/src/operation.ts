import { OAuthResponse } from '#response';
import { WebError } from '#web-error';

import type { Endpoint, Grant, WebRequest, WebResponse } from '#contract';

/**
 * one protocol step that can run against any engine
 * @template TItem value produced on success
 */
export interface OAuthOperation<TItem> {
  /**
   * runs the step; an operation runs once
   * @param endpoint engine to run against
   * @returns the step's result
   * @throws {WebError} for any request, response, engine or protocol failure
   */
  run(endpoint: Endpoint): Promise<TItem>;

  /** @returns the operation inside a dispatch envelope */
  wrap(): OAuthMessage<TItem>;
}

/**
 * envelope carrying an operation across an asynchronous boundary
 * @template TItem value produced by the wrapped operation
 */
export class OAuthMessage<TItem> {
  readonly #operation: OAuthOperation<TItem>;

  constructor(operation: OAuthOperation<TItem>) {
    this.#operation = operation;
  }

  /** @returns the wrapped operation, unchanged */
  public intoInner(): OAuthOperation<TItem> {
    return this.#operation;
  }
}

/** result of guarding a resource */
export type ResourceOutcome =
  | { status: 'authorized'; grant: Grant }
  | { status: 'denied'; response: OAuthResponse };

/**
 * shared single-use bookkeeping for the concrete operations
 * @template TItem value produced on success
 */
abstract class SingleUseOperation<TItem> implements OAuthOperation<TItem> {
  #consumed = false;

  protected constructor(protected readonly request: WebRequest) {}

  public async run(endpoint: Endpoint): Promise<TItem> {
    if (this.#consumed) {
      throw new Error(
        `${this.constructor.name} operation has already run. Create a new operation for each request.`,
      );
    }
    this.#consumed = true;

    try {
      return await this.execute(endpoint);
    } catch (error) {
      throw WebError.from(error);
    }
  }

  public wrap(): OAuthMessage<TItem> {
    return new OAuthMessage(this);
  }

  protected abstract execute(endpoint: Endpoint): Promise<TItem>;
}

/**
 * runs a flow that answers with a response
 * @param flow the engine flow to invoke
 * @returns the response filled by the engine
 */
async function respond(
  flow: (response: WebResponse) => Promise<void> | void,
): Promise<OAuthResponse> {
  const response = new OAuthResponse();
  await flow(response);

  return response;
}

/** authorization code request, typically `GET /authorize` */
export class Authorize extends SingleUseOperation<OAuthResponse> {
  constructor(request: WebRequest) {
    super(request);
  }

  protected async execute(endpoint: Endpoint): Promise<OAuthResponse> {
    return respond((response) => endpoint.authorize(this.request, response));
  }
}

/** access token request, typically `POST /token` */
export class Token extends SingleUseOperation<OAuthResponse> {
  constructor(request: WebRequest) {
    super(request);
  }

  protected async execute(endpoint: Endpoint): Promise<OAuthResponse> {
    return respond((response) => endpoint.token(this.request, response));
  }
}

/** refresh token request, typically `POST /refresh` */
export class Refresh extends SingleUseOperation<OAuthResponse> {
  constructor(request: WebRequest) {
    super(request);
  }

  protected async execute(endpoint: Endpoint): Promise<OAuthResponse> {
    return respond((response) => endpoint.refresh(this.request, response));
  }
}

/** access token check in front of a protected resource */
export class Resource extends SingleUseOperation<ResourceOutcome> {
  constructor(request: WebRequest) {
    super(request);
  }

  protected async execute(endpoint: Endpoint): Promise<ResourceOutcome> {
    const response = new OAuthResponse();
    const grant = await endpoint.resource(this.request, response);

    return grant
      ? { status: 'authorized', grant }
      : { status: 'denied', response };
  }
}
