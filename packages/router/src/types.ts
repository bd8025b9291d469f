import type {HttpMethod, HttpRequest} from '@switchyard/http';
import type {z} from 'zod';

export const argumentTypes = ['string', 'number', 'boolean', 'text', 'bytes', 'json', 'stream', 'request'] as const;

export type ArgumentType = (typeof argumentTypes)[number];

/** Where a handler argument is taken from. `default` means path variable, then query parameter, by name. */
export type ArgumentBinding =
  | {source: 'path'; key: string}
  | {source: 'query'; key: string}
  | {source: 'header'; key: string}
  | {source: 'body'}
  | {source: 'body_field'; key: string}
  | {source: 'body_stream'}
  | {source: 'request'}
  | {source: 'default'};

export type Argument = {
  readonly name: string;
  readonly type: ArgumentType;
  /** An optional argument is bound as `undefined` when no value is available. */
  readonly optional: boolean;
  readonly binding: ArgumentBinding;
  readonly schema?: z.ZodType;
};

export type ArgumentValues = Readonly<Record<string, unknown>>;

export type RouteHandler = (args: ArgumentValues) => unknown;

export type ReturnTypeDescriptor = {
  /** Media type essence the handler result is rendered as, when fixed by the route. */
  readonly produces?: string;
};

export type RouteDefinition = {
  method: HttpMethod;
  path: string;
  declaringType: string;
  arguments?: readonly Argument[];
  consumes?: readonly string[];
  produces?: string;
  handler: RouteHandler;
};

export type RouteMatch = {
  readonly method: HttpMethod;
  readonly pattern: string;
  readonly declaringType: string;
  readonly pathVariables: Readonly<Record<string, string>>;
  readonly requiredArguments: readonly Argument[];
  readonly returnType: ReturnTypeDescriptor;
  test: (request: HttpRequest) => boolean;
  execute: (args: ArgumentValues) => unknown;
};

export type Router = {
  /** Matches for the method and path, in router order. */
  find: (method: string, path: string) => RouteMatch[];
  /** Matches for the path regardless of method, in registration order. */
  findAny: (path: string) => RouteMatch[];
};
