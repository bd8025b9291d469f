import type {HttpHeaders} from './headers';
import type {MediaType} from './mediaType';
import {normalizeMethodToken} from './methods';

export type BodyChunk = Uint8Array | string;

/** Finite, non-restartable sequence of body chunks. Ends on completion or throws on a transport error. */
export type BodyStream = AsyncIterable<BodyChunk>;

export type BodySource =
  | {kind: 'absent'}
  | {kind: 'buffered'; bytes: Uint8Array}
  | {kind: 'stream'; stream: BodyStream};

export type InboundRequest = {
  method: string;
  target: string;
  headers: HttpHeaders;
  body: BodySource;
};

const PLACEHOLDER_ORIGIN = 'http://dispatch.invalid';

export class InvalidRequestTargetError extends Error {
  public constructor(target: string) {
    super(`Request target is not a valid origin-form or absolute-form URI: ${target}`);
    this.name = 'InvalidRequestTargetError';
  }
}

/** Request view shared by routing, binding and dispatch for one request/response cycle. */
export class HttpRequest {
  public readonly method: string;
  public readonly target: string;
  public readonly path: string;
  public readonly query: URLSearchParams;
  public readonly headers: HttpHeaders;
  public readonly body: BodySource;
  public readonly contentType: MediaType | undefined;

  private constructor({
    method,
    target,
    url,
    headers,
    body
  }: {
    method: string;
    target: string;
    url: URL;
    headers: HttpHeaders;
    body: BodySource;
  }) {
    this.method = method;
    this.target = target;
    this.path = url.pathname;
    this.query = url.searchParams;
    this.headers = headers;
    this.body = body;
    this.contentType = headers.contentType();
  }

  public static from(inbound: InboundRequest): HttpRequest {
    let url: URL;
    try {
      url = new URL(inbound.target, PLACEHOLDER_ORIGIN);
    } catch {
      throw new InvalidRequestTargetError(inbound.target);
    }

    return new HttpRequest({
      method: normalizeMethodToken(inbound.method) ?? inbound.method,
      target: inbound.target,
      url,
      headers: inbound.headers,
      body: inbound.body
    });
  }

  public get hasBody() {
    return this.body.kind !== 'absent';
  }
}

/** Presents any non-absent body source as a chunk stream; a buffered body becomes a single chunk. */
export const toBodyStream = (source: BodySource): BodyStream | undefined => {
  switch (source.kind) {
    case 'absent':
      return undefined;
    case 'buffered': {
      const {bytes} = source;
      return (async function* bufferedBody() {
        if (bytes.byteLength > 0) {
          yield bytes;
        }
      })();
    }
    case 'stream':
      return source.stream;
  }
};
