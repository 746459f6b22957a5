export type { Endpoint, Grant, WebRequest, WebResponse } from '#contract';
export type { Executor } from '#executor';
export type {
  JsonifibleObject,
  JsonifibleValue,
  JsonObject,
  JsonValue,
} from '#json';
export type { Log, LogLevel } from '#logging';
export type { OAuthOperation, ResourceOutcome } from '#operation';
export type { ParameterRecord } from '#parameter';
export type { RequestPayload, RequestSource } from '#request';
export type { OAuthResponseSnapshot } from '#response';
export type {
  MailboxErrorReason,
  OAuthProtocolErrorKind,
  ProtocolStatusOverrides,
  StatusOverrides,
  WebErrorKind,
} from '#web-error';
export type { DispatchOptions, EndpointWorkerOptions } from '#worker';

export * from '#constants/http';
export * from '#constants/defaults';
export { jsonifyError } from '#error';
export { dispatchTo, runWith } from '#executor';
export {
  Authorize,
  OAuthMessage,
  Refresh,
  Resource,
  Token,
} from '#operation';
export { NormalizedParameter, parseUrlEncoded } from '#parameter';
export { FORM_CONTENT_TYPE, OAuthRequest, OAuthResource } from '#request';
export { OAuthResponse } from '#response';
export {
  CanceledError,
  describeWebError,
  isTransient,
  MailboxError,
  OAuthProtocolError,
  resolveStatus,
  WebError,
} from '#web-error';
export { EndpointWorker } from '#worker';
