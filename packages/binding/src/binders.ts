import {toBodyStream} from '@switchyard/http';

import {convertBody, convertJsonValue, convertText, readJsonBody} from './conversion';
import {err, ok, type BodyBinder, type NonBlockingBodyBinder, type PlainBinder} from './types';

export const pathVariableBinder: PlainBinder = {
  kind: 'plain',
  name: 'path_variable',
  bind: (argument, {pathVariables}) => {
    const key = argument.binding.source === 'path' ? argument.binding.key : argument.name;
    const raw = pathVariables[key];
    return raw === undefined ? err('value_absent', `Path variable '${key}' is absent`) : convertText(argument, raw);
  }
};

export const queryValueBinder: PlainBinder = {
  kind: 'plain',
  name: 'query_value',
  bind: (argument, {request}) => {
    const key = argument.binding.source === 'query' ? argument.binding.key : argument.name;
    const raw = request.query.get(key);
    return raw === null ? err('value_absent', `Query parameter '${key}' is absent`) : convertText(argument, raw);
  }
};

export const headerBinder: PlainBinder = {
  kind: 'plain',
  name: 'header',
  bind: (argument, {request}) => {
    const key = argument.binding.source === 'header' ? argument.binding.key : argument.name;
    const raw = request.headers.get(key);
    return raw === undefined ? err('value_absent', `Header '${key}' is absent`) : convertText(argument, raw);
  }
};

export const requestBinder: PlainBinder = {
  kind: 'plain',
  name: 'request',
  bind: (_argument, {request}) => ok(request)
};

/** Path variable of the argument's name, falling back to the query parameter of that name. */
export const pathOrQueryBinder: PlainBinder = {
  kind: 'plain',
  name: 'path_or_query',
  bind: (argument, context) =>
    argument.name in context.pathVariables
      ? pathVariableBinder.bind(argument, context)
      : queryValueBinder.bind(argument, context)
};

/** Hands the live body stream to the handler; the handler runs without waiting for the body. */
export const bodyStreamBinder: NonBlockingBodyBinder = {
  kind: 'non_blocking_body',
  name: 'body_stream',
  bind: (_argument, {request}) => {
    const stream = toBodyStream(request.body);
    return stream ? ok(stream) : err('value_absent', 'Request has no body');
  }
};

export const wholeBodyBinder: BodyBinder = {
  kind: 'body',
  name: 'whole_body',
  bind: (argument, body) => convertBody(argument, body)
};

export const bodyFieldBinder: BodyBinder = {
  kind: 'body',
  name: 'body_field',
  bind: (argument, body) => {
    const key = argument.binding.source === 'body_field' ? argument.binding.key : argument.name;
    const parsed = readJsonBody(body);
    if (!parsed.ok) {
      return parsed;
    }

    const document = parsed.value;
    if (typeof document !== 'object' || document === null || Array.isArray(document)) {
      return err('conversion_failed', `Request body must be a JSON object to bind field '${key}'`);
    }

    const field: unknown = Object.getOwnPropertyDescriptor(document, key)?.value;
    return field === undefined
      ? err('value_absent', `Request body field '${key}' is absent`)
      : convertJsonValue(argument, field);
  }
};
