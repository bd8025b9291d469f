import type {z} from 'zod';

import type {Argument, ArgumentBinding, ArgumentType} from './types';

type ArgumentOptions = {
  optional?: boolean;
  schema?: z.ZodType;
};

const define = (
  name: string,
  type: ArgumentType,
  binding: ArgumentBinding,
  options: ArgumentOptions = {}
): Argument => ({
  name,
  type,
  binding,
  optional: options.optional ?? false,
  ...(options.schema ? {schema: options.schema} : {})
});

/** Argument declarations for route definitions. */
export const argument = {
  named: (name: string, type: ArgumentType = 'string', options?: ArgumentOptions) =>
    define(name, type, {source: 'default'}, options),
  path: (name: string, type: ArgumentType = 'string', options?: ArgumentOptions & {key?: string}) =>
    define(name, type, {source: 'path', key: options?.key ?? name}, options),
  query: (name: string, type: ArgumentType = 'string', options?: ArgumentOptions & {key?: string}) =>
    define(name, type, {source: 'query', key: options?.key ?? name}, options),
  header: (name: string, options?: ArgumentOptions & {key?: string}) =>
    define(name, 'string', {source: 'header', key: options?.key ?? name}, options),
  body: (name: string, type: ArgumentType = 'json', options?: ArgumentOptions) =>
    define(name, type, {source: 'body'}, options),
  bodyField: (name: string, type: ArgumentType = 'json', options?: ArgumentOptions & {key?: string}) =>
    define(name, type, {source: 'body_field', key: options?.key ?? name}, options),
  bodyStream: (name: string) => define(name, 'stream', {source: 'body_stream'}),
  request: (name: string) => define(name, 'request', {source: 'request'})
} as const;
