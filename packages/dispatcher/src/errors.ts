export type DispatchStatus = 400 | 404 | 405 | 500;

export class DispatchError extends Error {
  public readonly code: string;
  public readonly status: DispatchStatus;
  /** Methods the path accepts; only set for 405. */
  public readonly allowedMethods: readonly string[];

  public constructor({
    code,
    message,
    status,
    allowedMethods = []
  }: {
    code: string;
    message: string;
    status: DispatchStatus;
    allowedMethods?: readonly string[];
  }) {
    super(message);
    this.name = 'DispatchError';
    this.code = code;
    this.status = status;
    this.allowedMethods = allowedMethods;
  }
}

export const badRequest = (code: string, message: string) => new DispatchError({code, message, status: 400});

export const notFound = (code: string, message: string) => new DispatchError({code, message, status: 404});

export const internal = (code: string, message: string) => new DispatchError({code, message, status: 500});

export const routeNotFound = (method: string, path: string) =>
  notFound('route_not_found', `No route matches ${method} ${path}`);

export const methodNotAllowed = (method: string, path: string, allowedMethods: readonly string[]) =>
  new DispatchError({
    code: 'method_not_allowed',
    message: `Method ${method} is not allowed for ${path}`,
    status: 405,
    allowedMethods
  });

export type UnbindableArgumentStatus = 400 | 404;

export const argumentUnbindable = ({
  status,
  method,
  path,
  argumentNames
}: {
  status: UnbindableArgumentStatus;
  method: string;
  path: string;
  argumentNames: readonly string[];
}) =>
  status === 404
    ? routeNotFound(method, path)
    : badRequest('argument_unbindable', `Arguments could not be bound: ${argumentNames.join(', ')}`);

export const requestBodyMissing = () => badRequest('request_body_missing', 'Request body is required');

export const requestBodyInvalid = (message: string) => badRequest('request_body_invalid', message);

export const requestBodyArgumentInvalid = (message: string) => badRequest('request_body_argument_invalid', message);

export const requestBodyStreamFailed = () =>
  internal('request_body_stream_failed', 'Request body could not be read');

export const internalError = () => internal('internal_error', 'Unexpected internal error');

export const isDispatchError = (value: unknown): value is DispatchError => value instanceof DispatchError;

/** A second response was attempted for one request. */
export class ResponseAlreadySentError extends Error {
  public constructor(correlationId: string) {
    super(`A response was already sent for request ${correlationId}`);
    this.name = 'ResponseAlreadySentError';
  }
}

export class DuplicateArgumentError extends Error {
  public constructor(name: string) {
    super(`Argument '${name}' already has a value`);
    this.name = 'DuplicateArgumentError';
  }
}

export class RouteAlreadySelectedError extends Error {
  public constructor(pattern: string) {
    super(`Request context already has route ${pattern}`);
    this.name = 'RouteAlreadySelectedError';
  }
}

export class RequestContextReleasedError extends Error {
  public constructor(requestId: string) {
    super(`Request context ${requestId} was released`);
    this.name = 'RequestContextReleasedError';
  }
}
