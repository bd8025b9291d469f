import type {CompletedBody} from '@switchyard/binding';
import {encodeText, type BodyChunk, type BodyStream, type Charset} from '@switchyard/http';
import type {ComponentLogger} from '@switchyard/logging';

import type {BodyAccumulator} from './bodyAccumulator';
import {isDispatchError, requestBodyInvalid, requestBodyStreamFailed, type DispatchError} from './errors';
import {JsonScanner, JsonSyntaxError} from './jsonScanner';

/** Consumes body chunks for one request and produces the completed body. Decode failures throw a 400 `DispatchError`. */
export type ContentSubscriber = {
  readonly kind: 'chunk' | 'json';
  onChunk: (chunk: Uint8Array) => void;
  complete: () => CompletedBody;
};

/** Opaque bytes, decoded as text later with the request charset. */
export const createChunkSubscriber = ({
  accumulator,
  charset
}: {
  accumulator: BodyAccumulator;
  charset: Charset;
}): ContentSubscriber => ({
  kind: 'chunk',
  onChunk: chunk => accumulator.append(chunk),
  complete: () => ({bytes: accumulator.toBuffer(), charset})
});

const describeDecodeFailure = (error: SyntaxError | TypeError) => {
  if (error instanceof JsonSyntaxError) {
    return `Request body is not valid JSON: ${error.message}`;
  }

  return error instanceof SyntaxError ? 'Request body is not valid JSON' : 'Request body is not valid UTF-8';
};

/** JSON text, checked for syntax as each chunk arrives. */
export const createJsonSubscriber = ({accumulator}: {accumulator: BodyAccumulator}): ContentSubscriber => {
  const decoder = new TextDecoder('utf-8', {fatal: true});
  const scanner = new JsonScanner();
  const pieces: string[] = [];

  const decode = (operation: () => void) => {
    try {
      operation();
    } catch (error) {
      if (error instanceof SyntaxError || error instanceof TypeError) {
        throw requestBodyInvalid(describeDecodeFailure(error));
      }

      throw error;
    }
  };

  return {
    kind: 'json',
    onChunk: chunk => {
      accumulator.append(chunk);
      decode(() => {
        const text = decoder.decode(chunk, {stream: true});
        scanner.feed(text);
        pieces.push(text);
      });
    },
    complete: () => {
      let value: unknown;
      decode(() => {
        const tail = decoder.decode();
        scanner.feed(tail);
        scanner.end();
        pieces.push(tail);
        value = JSON.parse(pieces.join(''));
      });

      return {bytes: accumulator.toBuffer(), charset: 'utf-8', json: {value}};
    }
  };
};

export type BodyOutcome =
  | {kind: 'completed'; body: CompletedBody}
  | {kind: 'failed'; failure: DispatchError; cause: unknown}
  | {kind: 'cancelled'};

type Pull = {kind: 'next'; result: IteratorResult<BodyChunk>} | {kind: 'error'; error: unknown} | {kind: 'aborted'};

const toBytes = (chunk: BodyChunk, charset: Charset) => (typeof chunk === 'string' ? encodeText(chunk, charset) : chunk);

/**
 * Drives a body stream into a subscriber until the stream completes, fails or the signal aborts.
 * Terminal outcomes are reported once; the stream is not pulled after one is reached.
 */
export const consumeBody = async ({
  stream,
  subscriber,
  charset,
  signal,
  logger
}: {
  stream: BodyStream;
  subscriber: ContentSubscriber;
  /** Used to encode string chunks. */
  charset: Charset;
  signal?: AbortSignal;
  logger: ComponentLogger;
}): Promise<BodyOutcome> => {
  if (signal?.aborted) {
    return {kind: 'cancelled'};
  }

  const iterator = stream[Symbol.asyncIterator]();
  let removeAbortListener: () => void = () => undefined;
  const aborted = new Promise<Pull>(resolve => {
    if (!signal) {
      return;
    }

    const onAbort = () => resolve({kind: 'aborted'});
    signal.addEventListener('abort', onAbort, {once: true});
    removeAbortListener = () => signal.removeEventListener('abort', onAbort);
  });

  const abandon = () => {
    const closing = iterator.return?.();
    if (!closing) {
      return;
    }

    void closing.catch((error: unknown) => {
      logger.debug({
        event: 'request.body.close_failed',
        message: 'Abandoned body stream failed while closing',
        metadata: {error}
      });
    });
  };

  try {
    for (;;) {
      const pulled = await Promise.race([
        iterator.next().then(
          (result): Pull => ({kind: 'next', result}),
          (error: unknown): Pull => ({kind: 'error', error})
        ),
        aborted
      ]);

      if (pulled.kind === 'aborted') {
        abandon();
        return {kind: 'cancelled'};
      }

      if (pulled.kind === 'error') {
        return signal?.aborted
          ? {kind: 'cancelled'}
          : {kind: 'failed', failure: requestBodyStreamFailed(), cause: pulled.error};
      }

      if (pulled.result.done) {
        return {kind: 'completed', body: subscriber.complete()};
      }

      subscriber.onChunk(toBytes(pulled.result.value, charset));
    }
  } catch (error) {
    abandon();
    if (isDispatchError(error)) {
      return {kind: 'failed', failure: error, cause: error};
    }

    throw error;
  } finally {
    removeAbortListener();
  }
};
