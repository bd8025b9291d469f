import {describe, expect, it} from 'vitest';

import {createLoggingTracer, traceBodyStream, type DispatchTracer, type SpanTagValue} from '../tracing';
import {capturingLogger, ControlledStream, streamOf} from './helpers';

type RecordedSpan = {
  name: string;
  tags: Record<string, SpanTagValue>;
  outcome: 'open' | 'finished' | 'failed';
  error?: unknown;
};

const recordingTracer = () => {
  const spans: RecordedSpan[] = [];
  const tracer: DispatchTracer = {
    startSpan: name => {
      const span: RecordedSpan = {name, tags: {}, outcome: 'open'};
      spans.push(span);
      return {
        setTag: (key, value) => {
          span.tags[key] = value;
        },
        finish: () => {
          span.outcome = 'finished';
        },
        fail: error => {
          span.outcome = 'failed';
          span.error = error;
        }
      };
    }
  };

  return {tracer, spans};
};

const drain = async (stream: AsyncIterable<unknown>) => {
  const seen: unknown[] = [];
  for await (const chunk of stream) {
    seen.push(chunk);
  }
  return seen;
};

describe('traceBodyStream', () => {
  it('opens the span on the first pull and tags totals on completion', async () => {
    const {tracer, spans} = recordingTracer();
    const traced = traceBodyStream(streamOf('ab', Buffer.from([1, 2, 3])), tracer);

    expect(spans).toHaveLength(0);

    const seen = await drain(traced);

    expect(seen).toEqual(['ab', Buffer.from([1, 2, 3])]);
    expect(spans).toEqual([{name: 'http.request.body', tags: {chunks: 2, bytes: 5}, outcome: 'finished'}]);
  });

  it('fails the span when the stream errors', async () => {
    const {tracer, spans} = recordingTracer();
    const stream = new ControlledStream();
    const failure = new Error('reset');
    stream.push('x');
    stream.fail(failure);

    await expect(drain(traceBodyStream(stream, tracer))).rejects.toBe(failure);
    expect(spans).toEqual([{name: 'http.request.body', tags: {chunks: 1, bytes: 1}, outcome: 'failed', error: failure}]);
  });

  it('finishes the span as cancelled when the consumer stops early', async () => {
    const {tracer, spans} = recordingTracer();
    const stream = new ControlledStream();
    stream.push('first');
    stream.push('second');

    for await (const chunk of traceBodyStream(stream, tracer, 'upload')) {
      expect(chunk).toBe('first');
      break;
    }

    expect(stream.returned).toBe(true);
    expect(spans).toEqual([{name: 'upload', tags: {chunks: 1, bytes: 5, cancelled: true}, outcome: 'finished'}]);
  });
});

describe('createLoggingTracer', () => {
  it('logs finished and failed spans once', () => {
    const {logger, events} = capturingLogger();
    const tracer = createLoggingTracer({logger, now: () => new Date('2026-03-01T10:00:00.000Z')});

    const finished = tracer.startSpan('http.request.body', {route: '/uploads/{name}'});
    finished.setTag('bytes', 12);
    finished.finish();
    finished.fail(new Error('ignored'));

    const failed = tracer.startSpan('http.request.body');
    failed.fail(new Error('reset'));

    expect(events()).toEqual([
      expect.objectContaining({
        level: 'debug',
        event: 'trace.span.finished',
        component: 'dispatch.tracing',
        duration_ms: 0,
        metadata: {span: 'http.request.body', tags: {route: '/uploads/{name}', bytes: 12}}
      }),
      expect.objectContaining({
        level: 'warn',
        event: 'trace.span.failed',
        metadata: expect.objectContaining({span: 'http.request.body', tags: {}})
      })
    ]);
  });
});
