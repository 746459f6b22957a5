export type { ErrorHandlerOptions } from '#errors';
export type { OperationFactory } from '#handlers';
export type { OAuthEndpointOptions, OAuthRoutes } from '#setup';

export { DEFAULT_ROUTES } from '#constants/defaults';
export { setupErrorHandler } from '#errors';
export { createOAuthHandler, createResourceGuard } from '#handlers';
export { createLoggerConfig, forwardLogLine } from '#logging';
export { sendOAuthResponse } from '#reply';
export {
  collectHeaderValues,
  createAbortSignal,
  describePayload,
  extractOAuthRequest,
  extractOAuthResource,
  extractQueryString,
} from '#request-context';
export { registerOAuthRoutes, setupOAuthAdapter } from '#setup';
