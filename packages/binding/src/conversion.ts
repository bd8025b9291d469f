import {decodeText} from '@switchyard/http';
import type {Argument} from '@switchyard/router';
import {z} from 'zod';

import {err, ok, type BindingResult, type CompletedBody} from './types';

const NumberFromTextSchema = z.string().trim().min(1).pipe(z.coerce.number());

const BooleanFromTextSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false']))
  .transform(value => value === 'true');

const describeIssues = (error: z.ZodError) => error.issues.map(issue => issue.message).join('; ');

const applySchema = (argument: Argument, value: unknown): BindingResult => {
  if (!argument.schema) {
    return ok(value);
  }

  const parsed = argument.schema.safeParse(value);
  if (!parsed.success) {
    return err('schema_invalid', `Argument '${argument.name}' is invalid: ${describeIssues(parsed.error)}`);
  }

  return ok(parsed.data);
};

const parseJsonText = (text: string): BindingResult => {
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch {
    return err('conversion_failed', 'Value is not valid JSON');
  }
};

/** Converts a raw text value (path, query or header) to the argument's declared type. */
export const convertText = (argument: Argument, raw: string): BindingResult => {
  const converted = ((): BindingResult => {
    switch (argument.type) {
      case 'string':
      case 'text':
        return ok(raw);
      case 'bytes':
        return ok(Buffer.from(raw, 'utf8'));
      case 'number': {
        const parsed = NumberFromTextSchema.safeParse(raw);
        return parsed.success ? ok(parsed.data) : err('conversion_failed', `'${raw}' is not a number`);
      }
      case 'boolean': {
        const parsed = BooleanFromTextSchema.safeParse(raw);
        return parsed.success ? ok(parsed.data) : err('conversion_failed', `'${raw}' is not a boolean`);
      }
      case 'json':
        return parseJsonText(raw);
      case 'stream':
      case 'request':
        return err('conversion_failed', `Argument type '${argument.type}' cannot be converted from text`);
    }
  })();

  return converted.ok ? applySchema(argument, converted.value) : converted;
};

/** Converts an already-decoded JSON value (a body field) to the argument's declared type. */
export const convertJsonValue = (argument: Argument, value: unknown): BindingResult => {
  switch (argument.type) {
    case 'json':
      return applySchema(argument, value);
    case 'string':
    case 'text':
      return typeof value === 'string'
        ? applySchema(argument, value)
        : err('conversion_failed', `Argument '${argument.name}' must be a string`);
    case 'number':
      return typeof value === 'number'
        ? applySchema(argument, value)
        : typeof value === 'string'
          ? convertText(argument, value)
          : err('conversion_failed', `Argument '${argument.name}' must be a number`);
    case 'boolean':
      return typeof value === 'boolean'
        ? applySchema(argument, value)
        : typeof value === 'string'
          ? convertText(argument, value)
          : err('conversion_failed', `Argument '${argument.name}' must be a boolean`);
    case 'bytes':
      return typeof value === 'string'
        ? applySchema(argument, Buffer.from(value, 'utf8'))
        : err('conversion_failed', `Argument '${argument.name}' must be a string`);
    case 'stream':
    case 'request':
      return err('conversion_failed', `Argument type '${argument.type}' cannot be bound from a body field`);
  }
};

/** Parsed JSON of a completed body, reusing the structured-content parse when there was one. */
export const readJsonBody = (body: CompletedBody): BindingResult => {
  if (body.json) {
    return ok(body.json.value);
  }

  if (body.bytes.byteLength === 0) {
    return err('value_absent', 'Request body is empty');
  }

  const parsed = parseJsonText(decodeText(body.bytes, body.charset));
  return parsed.ok ? parsed : err('body_decode_failed', 'Request body is not valid JSON');
};

/** Converts a completed body to the argument's declared type. */
export const convertBody = (argument: Argument, body: CompletedBody): BindingResult => {
  switch (argument.type) {
    case 'bytes':
      return applySchema(argument, body.bytes);
    case 'string':
    case 'text':
      return applySchema(argument, decodeText(body.bytes, body.charset));
    case 'json': {
      const parsed = readJsonBody(body);
      return parsed.ok ? applySchema(argument, parsed.value) : parsed;
    }
    case 'number':
    case 'boolean':
      return body.json
        ? convertJsonValue(argument, body.json.value)
        : convertText(argument, decodeText(body.bytes, body.charset));
    case 'stream':
    case 'request':
      return err('conversion_failed', `Argument type '${argument.type}' cannot be bound from a buffered body`);
  }
};
