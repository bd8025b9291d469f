import type {Charset, HttpRequest} from '@switchyard/http';
import type {Argument} from '@switchyard/router';

export const bindingErrorCodes = ['value_absent', 'conversion_failed', 'schema_invalid', 'body_decode_failed'] as const;

export type BindingErrorCode = (typeof bindingErrorCodes)[number];

export type BindingError = {
  code: BindingErrorCode;
  message: string;
};

export type BindingSuccess<T> = {ok: true; value: T};
export type BindingFailure = {ok: false; error: BindingError};
export type BindingResult<T = unknown> = BindingSuccess<T> | BindingFailure;

export const ok = <T>(value: T): BindingSuccess<T> => ({ok: true, value});

export const err = (code: BindingErrorCode, message: string): BindingFailure => ({
  ok: false,
  error: {code, message}
});

/** What binders see of the live request. */
export type BindingContext = {
  request: HttpRequest;
  pathVariables: Readonly<Record<string, string>>;
  defaultCharset: Charset;
};

/** Body as presented after the body stream completed. `json` is set when the body was parsed as structured content. */
export type CompletedBody = {
  bytes: Buffer;
  charset: Charset;
  json?: {value: unknown};
};

export type PlainBinder = {
  kind: 'plain';
  name: string;
  bind: (argument: Argument, context: BindingContext) => BindingResult;
};

/** Body binder that produces its value without waiting for the body to complete. */
export type NonBlockingBodyBinder = {
  kind: 'non_blocking_body';
  name: string;
  bind: (argument: Argument, context: BindingContext) => BindingResult;
};

/** Body binder applied once the complete body is available. */
export type BodyBinder = {
  kind: 'body';
  name: string;
  bind: (argument: Argument, body: CompletedBody, context: BindingContext) => BindingResult;
};

export type Binder = PlainBinder | NonBlockingBodyBinder | BodyBinder;

export type BinderRegistry = {
  findBinder: (argument: Argument, context: BindingContext) => Binder | undefined;
};
