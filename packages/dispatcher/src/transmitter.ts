import {encodeText, formatMediaType, MEDIA_TYPES, normalizeHeaderName, type Charset} from '@switchyard/http';
import type {ComponentLogger} from '@switchyard/logging';
import {HttpErrorBodySchema, MethodNotAllowedBodySchema} from '@switchyard/schemas';

import {ResponseAlreadySentError, type DispatchError} from './errors';

export type OutboundResponse = {
  status: number;
  headers: Readonly<Record<string, string>>;
  body: Buffer;
};

/** Where the single response of a request is written. */
export type ResponseSink = {
  send: (response: OutboundResponse) => Promise<void>;
  /** Tears the connection down after a write failure. */
  destroy: (error: Error) => void;
};

/** Handler result with an explicit status and headers; the body renders like a plain handler result. */
export class RouteResponse {
  public readonly status: number;
  public readonly headers: Readonly<Record<string, string>>;
  public readonly body: unknown;

  public constructor({status, headers = {}, body}: {status: number; headers?: Record<string, string>; body?: unknown}) {
    if (!Number.isInteger(status) || status < 200 || status > 599) {
      throw new RangeError(`Response status must be an integer between 200 and 599, got ${status}`);
    }

    this.status = status;
    this.headers = Object.fromEntries(Object.entries(headers).map(([name, value]) => [normalizeHeaderName(name), value]));
    this.body = body;
  }
}

const ERROR_HEADERS: Readonly<Record<string, string>> = {
  'cache-control': 'no-store'
};

type RenderedBody = {contentType?: string; bytes: Buffer};

export class UnrenderableResultError extends Error {
  public constructor(kind: string) {
    super(`Handler result of type ${kind} cannot be rendered`);
    this.name = 'UnrenderableResultError';
  }
}

const renderBody = ({
  value,
  charset,
  produces
}: {
  value: unknown;
  charset: Charset;
  produces?: string;
}): RenderedBody | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value === 'string') {
    return {contentType: formatMediaType(produces ?? MEDIA_TYPES.text, charset), bytes: encodeText(value, charset)};
  }

  if (value instanceof Uint8Array) {
    return {contentType: produces ?? MEDIA_TYPES.octetStream, bytes: Buffer.from(value)};
  }

  const serialized = JSON.stringify(value);
  if (typeof serialized !== 'string') {
    throw new UnrenderableResultError(typeof value);
  }

  return {contentType: formatMediaType(produces ?? MEDIA_TYPES.json, charset), bytes: encodeText(serialized, charset)};
};

/** Writes at most one response for a request. */
export class ResponseTransmitter {
  private readonly sink: ResponseSink;
  private readonly correlationId: string;
  private readonly logger: ComponentLogger;
  private sentStatus: number | undefined;

  public constructor({sink, correlationId, logger}: {sink: ResponseSink; correlationId: string; logger: ComponentLogger}) {
    this.sink = sink;
    this.correlationId = correlationId;
    this.logger = logger;
  }

  public get sent() {
    return this.sentStatus !== undefined;
  }

  /** Status of the response handed to the sink, if any. */
  public get status() {
    return this.sentStatus;
  }

  public async sendResult({
    result,
    charset,
    produces,
    status = 200
  }: {
    result: unknown;
    charset: Charset;
    produces?: string;
    status?: number;
  }) {
    const response = result instanceof RouteResponse ? result : undefined;
    const rendered = renderBody({value: response ? response.body : result, charset, ...(produces ? {produces} : {})});
    const responseStatus = response?.status ?? (rendered ? status : 204);

    await this.write({
      status: responseStatus,
      headers: {
        ...(rendered?.contentType ? {'content-type': rendered.contentType} : {}),
        ...(response?.headers ?? {})
      },
      body: rendered?.bytes ?? Buffer.alloc(0)
    });
  }

  public async sendError(error: DispatchError) {
    const body =
      error.status === 405
        ? MethodNotAllowedBodySchema.parse({
            error: 'method_not_allowed',
            message: error.message,
            correlation_id: this.correlationId,
            allowed_methods: error.allowedMethods
          })
        : HttpErrorBodySchema.parse({
            error: error.code,
            message: error.message,
            correlation_id: this.correlationId
          });

    await this.write({
      status: error.status,
      headers: {
        ...ERROR_HEADERS,
        'content-type': formatMediaType(MEDIA_TYPES.json, 'utf-8'),
        ...(error.status === 405 ? {allow: error.allowedMethods.join(', ')} : {})
      },
      body: Buffer.from(JSON.stringify(body), 'utf8')
    });
  }

  private async write({status, headers, body}: {status: number; headers: Record<string, string>; body: Buffer}) {
    if (this.sentStatus !== undefined) {
      throw new ResponseAlreadySentError(this.correlationId);
    }
    this.sentStatus = status;

    try {
      await this.sink.send({
        status,
        headers: {
          ...headers,
          'content-length': String(body.length),
          'x-content-type-options': 'nosniff',
          'x-correlation-id': this.correlationId
        },
        body
      });
    } catch (error) {
      this.logger.error({
        event: 'response.write_failed',
        message: 'Response could not be written; closing connection',
        reason_code: 'response_write_failed',
        status_code: status,
        metadata: {error}
      });
      this.sink.destroy(error instanceof Error ? error : new Error('Response write failed'));
    }
  }
}
