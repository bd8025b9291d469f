import {HttpHeaders, HttpRequest, type BodyChunk, type BodySource, type BodyStream} from '@switchyard/http';
import {createStructuredLogger, type StructuredLogger} from '@switchyard/logging';

import type {OutboundResponse, ResponseSink} from '../transmitter';

export const recordingSink = () => {
  const responses: OutboundResponse[] = [];
  const destroyed: Error[] = [];
  const sink: ResponseSink = {
    send: response => {
      responses.push(response);
      return Promise.resolve();
    },
    destroy: error => {
      destroyed.push(error);
    }
  };

  return {sink, responses, destroyed};
};

export const makeRequest = ({
  method = 'GET',
  target = '/',
  headers = {},
  body = {kind: 'absent'}
}: {
  method?: string;
  target?: string;
  headers?: Record<string, string>;
  body?: BodySource;
} = {}) => HttpRequest.from({method, target, headers: new HttpHeaders(headers), body});

export const streamOf = (...chunks: BodyChunk[]): BodyStream => ({
  async *[Symbol.asyncIterator]() {
    for (const chunk of chunks) {
      yield chunk;
    }
  }
});

type StreamEvent = {kind: 'chunk'; chunk: BodyChunk} | {kind: 'end'} | {kind: 'error'; error: unknown};

const toResult = (event: StreamEvent): Promise<IteratorResult<BodyChunk>> => {
  switch (event.kind) {
    case 'chunk':
      return Promise.resolve({done: false, value: event.chunk});
    case 'end':
      return Promise.resolve({done: true, value: undefined});
    case 'error':
      return Promise.reject(event.error);
  }
};

/** Body stream fed by the test, one event at a time. */
export class ControlledStream implements BodyStream {
  public pulls = 0;
  public returned = false;
  private readonly buffered: StreamEvent[] = [];
  private waiting: ((event: StreamEvent) => void) | undefined;

  public push(chunk: BodyChunk) {
    this.deliver({kind: 'chunk', chunk});
  }

  public end() {
    this.deliver({kind: 'end'});
  }

  public fail(error: unknown) {
    this.deliver({kind: 'error', error});
  }

  public [Symbol.asyncIterator](): AsyncIterator<BodyChunk> {
    return {
      next: () => {
        this.pulls += 1;
        const event = this.buffered.shift();
        if (event) {
          return toResult(event);
        }

        return new Promise<StreamEvent>(resolve => {
          this.waiting = resolve;
        }).then(toResult);
      },
      return: () => {
        this.returned = true;
        return Promise.resolve({done: true, value: undefined});
      }
    };
  }

  private deliver(event: StreamEvent) {
    const waiting = this.waiting;
    if (!waiting) {
      this.buffered.push(event);
      return;
    }

    this.waiting = undefined;
    waiting(event);
  }
}

export const capturingLogger = (level: 'debug' | 'info' = 'debug') => {
  const lines: string[] = [];
  const record = {
    write: (chunk: string) => {
      lines.push(chunk);
      return true;
    }
  };
  const logger: StructuredLogger = createStructuredLogger({
    service: 'dispatcher-test',
    env: 'test',
    level,
    now: () => new Date('2026-03-01T10:00:00.000Z'),
    writer: {stdout: record, stderr: record}
  });

  const events = () => lines.map((line): unknown => JSON.parse(line));

  return {logger, events};
};

export const jsonOf = (response: OutboundResponse | undefined): unknown =>
  response ? JSON.parse(response.body.toString('utf8')) : undefined;
