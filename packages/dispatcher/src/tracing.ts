import type {BodyStream} from '@switchyard/http';
import {forComponent, type StructuredLogger} from '@switchyard/logging';

export type SpanTagValue = string | number | boolean;

export type DispatchSpan = {
  setTag: (key: string, value: SpanTagValue) => void;
  finish: () => void;
  fail: (error: unknown) => void;
};

export type DispatchTracer = {
  startSpan: (name: string, tags?: Readonly<Record<string, SpanTagValue>>) => DispatchSpan;
};

const noopSpan: DispatchSpan = {
  setTag: () => undefined,
  finish: () => undefined,
  fail: () => undefined
};

export const noopTracer: DispatchTracer = {
  startSpan: () => noopSpan
};

/** Emits a log event per finished span. A span reports once; later finish or fail calls are ignored. */
export const createLoggingTracer = ({
  logger,
  now = () => new Date()
}: {
  logger: StructuredLogger;
  now?: () => Date;
}): DispatchTracer => {
  const log = forComponent(logger, 'dispatch.tracing');

  return {
    startSpan: (name, initialTags = {}) => {
      const startedAtMs = now().getTime();
      const tags: Record<string, SpanTagValue> = {...initialTags};
      let finished = false;

      const durationMs = () => Math.max(0, now().getTime() - startedAtMs);

      return {
        setTag: (key, value) => {
          tags[key] = value;
        },
        finish: () => {
          if (finished) {
            return;
          }
          finished = true;
          log.debug({
            event: 'trace.span.finished',
            duration_ms: durationMs(),
            metadata: {span: name, tags}
          });
        },
        fail: error => {
          if (finished) {
            return;
          }
          finished = true;
          log.warn({
            event: 'trace.span.failed',
            duration_ms: durationMs(),
            metadata: {span: name, tags, error}
          });
        }
      };
    }
  };
};

/**
 * Wraps a body stream in a span opened on the first pull. The span is tagged with the chunk count and byte
 * total, and finishes with `cancelled` when the consumer stops early.
 */
export const traceBodyStream = (
  stream: BodyStream,
  tracer: DispatchTracer,
  spanName = 'http.request.body'
): BodyStream => ({
  async *[Symbol.asyncIterator]() {
    const span = tracer.startSpan(spanName);
    let chunks = 0;
    let bytes = 0;
    let settled = false;

    const tagTotals = () => {
      span.setTag('chunks', chunks);
      span.setTag('bytes', bytes);
    };

    try {
      for await (const chunk of stream) {
        chunks += 1;
        bytes += typeof chunk === 'string' ? Buffer.byteLength(chunk) : chunk.byteLength;
        yield chunk;
      }

      settled = true;
      tagTotals();
      span.finish();
    } catch (error) {
      settled = true;
      tagTotals();
      span.fail(error);
      throw error;
    } finally {
      if (!settled) {
        tagTotals();
        span.setTag('cancelled', true);
        span.finish();
      }
    }
  }
});
