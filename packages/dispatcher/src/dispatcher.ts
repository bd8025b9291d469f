import {randomUUID} from 'node:crypto';

import type {BinderRegistry, BindingContext} from '@switchyard/binding';
import {isJsonMediaType, toBodyStream, type Charset, type HttpHeaders, type HttpRequest} from '@switchyard/http';
import {
  createNoopLogger,
  forComponent,
  runWithLogContext,
  setLogContextFields,
  type StructuredLogger
} from '@switchyard/logging';
import type {Argument, RouteMatch, Router} from '@switchyard/router';

import {consumeBody, createChunkSubscriber, createJsonSubscriber} from './contentSubscriber';
import {RequestContext} from './context';
import {DeferredExecution} from './continuation';
import {
  argumentUnbindable,
  internalError,
  isDispatchError,
  methodNotAllowed,
  requestBodyMissing,
  routeNotFound,
  type DispatchError,
  type UnbindableArgumentStatus
} from './errors';
import {noopTracer, traceBodyStream, type DispatchTracer} from './tracing';
import {ResponseTransmitter, type ResponseSink} from './transmitter';

export type DispatcherOptions = {
  router: Router;
  binderRegistry: BinderRegistry;
  /** Charset of text and JSON success bodies, and of request text without a declared charset. */
  defaultCharset?: Charset;
  unbindableArgumentStatus?: UnbindableArgumentStatus;
  logger?: StructuredLogger;
  tracer?: DispatchTracer;
  now?: () => Date;
  generateId?: () => string;
};

export type DispatchOptions = {
  /** Aborted when the connection closes. */
  signal?: AbortSignal;
  connectionId?: string;
};

export type Dispatcher = {
  /** Settles once the request's single response was handed to the sink, or the request was cancelled. Never rejects. */
  onRequest: (request: HttpRequest, sink: ResponseSink, options?: DispatchOptions) => Promise<void>;
};

const MAX_CORRELATION_ID_LENGTH = 128;

export const extractCorrelationId = (headers: HttpHeaders, generateId: () => string = randomUUID) => {
  const value = headers.first('x-correlation-id')?.trim();
  if (!value || value.length > MAX_CORRELATION_ID_LENGTH) {
    return generateId();
  }

  return value;
};

type ArgumentResolution =
  | {kind: 'resolved'}
  | {kind: 'unbindable'; arguments: readonly Argument[]}
  | {kind: 'body_missing'};

type RequestScope = {
  context: RequestContext;
  transmitter: ResponseTransmitter;
  signal: AbortSignal | undefined;
};

const distinct = (values: readonly string[]) => [...new Set(values)];

export const createDispatcher = ({
  router,
  binderRegistry,
  defaultCharset = 'utf-8',
  unbindableArgumentStatus = 404,
  logger = createNoopLogger(),
  tracer = noopTracer,
  now = () => new Date(),
  generateId = randomUUID
}: DispatcherOptions): Dispatcher => {
  const log = forComponent(logger, 'dispatch.dispatcher');

  const rejectRequest = async ({transmitter}: RequestScope, error: DispatchError) => {
    log.warn({
      event: 'request.rejected',
      message: `Request rejected: ${error.code}`,
      reason_code: error.code
    });
    await transmitter.sendError(error);
  };

  const executeRoute = async (scope: RequestScope, route: RouteMatch) => {
    const {context, transmitter, signal} = scope;
    if (signal?.aborted) {
      return;
    }

    let result: unknown;
    try {
      result = await route.execute(context.values.toRecord());
    } catch (error) {
      if (isDispatchError(error)) {
        await rejectRequest(scope, error);
        return;
      }

      log.error({
        event: 'handler.failed',
        message: 'Route handler failed',
        reason_code: 'internal_error',
        metadata: {declaring_type: route.declaringType, pattern: route.pattern, error}
      });
      await transmitter.sendError(internalError());
      return;
    }

    await transmitter.sendResult({
      result,
      charset: defaultCharset,
      ...(route.returnType.produces ? {produces: route.returnType.produces} : {})
    });
  };

  const respondNoRoute = async (scope: RequestScope) => {
    const {request} = scope.context;
    const candidates = router.findAny(request.path);
    if (candidates.length === 0) {
      log.debug({event: 'route.not_found', message: `No route for ${request.method} ${request.path}`});
      await rejectRequest(scope, routeNotFound(request.method, request.path));
      return;
    }

    const allowedMethods = distinct(candidates.map(candidate => candidate.method));
    await rejectRequest(scope, methodNotAllowed(request.method, request.path, allowedMethods));
  };

  /**
   * Binds arguments in declared order. An argument left unbound while no body argument has been deferred yet ends
   * the loop; one left unbound after that is checked again once the body completes.
   */
  const resolveArguments = (
    context: RequestContext,
    route: RouteMatch,
    bindingContext: BindingContext
  ): ArgumentResolution => {
    const unbindable = (argument: Argument): ArgumentResolution | undefined =>
      context.requiresBody ? undefined : {kind: 'unbindable', arguments: [argument]};

    for (const argument of route.requiredArguments) {
      const binder = binderRegistry.findBinder(argument, bindingContext);
      if (!binder) {
        const stop = unbindable(argument);
        if (stop) {
          return stop;
        }
        continue;
      }

      switch (binder.kind) {
        case 'non_blocking_body': {
          const result = binder.bind(argument, bindingContext);
          if (result.ok || argument.optional) {
            context.values.set(argument.name, result.ok ? result.value : undefined);
            break;
          }
          if (!context.request.hasBody) {
            return {kind: 'body_missing'};
          }
          const stop = unbindable(argument);
          if (stop) {
            return stop;
          }
          break;
        }
        case 'body':
          context.deferBodyArgument(argument, binder);
          break;
        case 'plain': {
          const result = binder.bind(argument, bindingContext);
          if (result.ok || argument.optional) {
            context.values.set(argument.name, result.ok ? result.value : undefined);
            break;
          }
          log.debug({
            event: 'argument.bind_failed',
            message: `Argument '${argument.name}' not bound: ${result.error.code}`,
            reason_code: result.error.code
          });
          const stop = unbindable(argument);
          if (stop) {
            return stop;
          }
          break;
        }
        default: {
          const unhandled: never = binder;
          throw new TypeError(`Unsupported binder ${JSON.stringify(unhandled)}`);
        }
      }
    }

    return {kind: 'resolved'};
  };

  const receiveBody = async (scope: RequestScope, route: RouteMatch, bindingContext: BindingContext) => {
    const {context, signal} = scope;
    const {request} = context;
    const source = toBodyStream(request.body);
    if (!source) {
      log.debug({event: 'request.body_missing', message: 'Route requires a body but the request has none'});
      await rejectRequest(scope, requestBodyMissing());
      return;
    }

    const stream = tracer === noopTracer ? source : traceBodyStream(source, tracer);
    const accumulator = context.openAccumulator();
    const requestCharset = request.contentType?.charset ?? defaultCharset;
    const subscriber = isJsonMediaType(request.contentType)
      ? createJsonSubscriber({accumulator})
      : createChunkSubscriber({accumulator, charset: requestCharset});

    const deferred = new DeferredExecution({
      context,
      bindingContext,
      steps: {
        execute: () => executeRoute(scope, route),
        reject: error => rejectRequest(scope, error)
      }
    });

    log.debug({event: 'request.body_deferred', message: `Awaiting request body (${subscriber.kind})`});
    const outcome = await consumeBody({
      stream,
      subscriber,
      charset: requestCharset,
      ...(signal ? {signal} : {}),
      logger: log
    });

    switch (outcome.kind) {
      case 'completed':
        if (outcome.body.bytes.length === 0) {
          log.debug({event: 'request.body_empty', message: 'Request body completed without content'});
        }
        await deferred.resume(outcome.body);
        return;
      case 'failed':
        if (outcome.failure.status >= 500) {
          log.error({
            event: 'request.body_failed',
            message: 'Request body stream failed',
            reason_code: outcome.failure.code,
            metadata: {error: outcome.cause}
          });
        }
        await deferred.fail(outcome.failure);
        return;
      case 'cancelled':
        log.debug({event: 'request.cancelled', message: 'Connection closed before the request body completed'});
        deferred.cancel();
        return;
    }
  };

  const dispatch = async (scope: RequestScope) => {
    const {context} = scope;
    const {request} = context;

    log.debug({event: 'route.matching', message: `Matching ${request.method} ${request.path}`});
    const route = router.find(request.method, request.path).find(candidate => candidate.test(request));
    if (!route) {
      await respondNoRoute(scope);
      return;
    }

    context.selectRoute(route);
    setLogContextFields({route: route.pattern});
    log.debug({
      event: 'route.matched',
      message: `Matched ${route.method} ${route.pattern}`,
      metadata: {declaring_type: route.declaringType}
    });

    const bindingContext: BindingContext = {request, pathVariables: route.pathVariables, defaultCharset};
    const resolution = resolveArguments(context, route, bindingContext);
    switch (resolution.kind) {
      case 'body_missing':
        await rejectRequest(scope, requestBodyMissing());
        return;
      case 'unbindable': {
        const argumentNames = resolution.arguments.map(argument => argument.name);
        log.error({
          event: 'argument.unbindable',
          message: `Route ${route.pattern} declared by ${route.declaringType} has unbindable arguments`,
          reason_code: 'argument_unbindable',
          metadata: {arguments: argumentNames}
        });
        await rejectRequest(
          scope,
          argumentUnbindable({
            status: unbindableArgumentStatus,
            method: request.method,
            path: request.path,
            argumentNames
          })
        );
        return;
      }
      case 'resolved':
        break;
    }

    if (context.requiresBody) {
      await receiveBody(scope, route, bindingContext);
      return;
    }

    await executeRoute(scope, route);
  };

  const logCompletion = ({transmitter}: RequestScope, startedAtMs: number) => {
    const status = transmitter.status;
    if (status === undefined) {
      return;
    }

    const entry = {
      event: 'request.completed',
      message: 'Request completed',
      status_code: status,
      duration_ms: Math.max(0, now().getTime() - startedAtMs)
    };

    if (status >= 500) {
      log.error(entry);
    } else if (status >= 400) {
      log.warn(entry);
    } else {
      log.info(entry);
    }
  };

  const onRequest = (request: HttpRequest, sink: ResponseSink, options: DispatchOptions = {}) => {
    const correlationId = extractCorrelationId(request.headers, generateId);
    const requestId = generateId();
    const {signal, connectionId} = options;

    return runWithLogContext(
      {
        correlation_id: correlationId,
        request_id: requestId,
        ...(connectionId ? {connection_id: connectionId} : {}),
        route: request.path,
        method: request.method
      },
      async () => {
        const startedAtMs = now().getTime();
        const context = new RequestContext({
          request,
          correlationId,
          requestId,
          ...(connectionId ? {connectionId} : {})
        });
        const scope: RequestScope = {
          context,
          transmitter: new ResponseTransmitter({sink, correlationId, logger: forComponent(logger, 'dispatch.transmitter')}),
          signal
        };

        try {
          if (signal?.aborted) {
            return;
          }

          await dispatch(scope);
        } catch (error) {
          log.error({
            event: 'dispatch.failed',
            message: 'Unexpected dispatch failure',
            reason_code: 'internal_error',
            metadata: {error}
          });

          if (!scope.transmitter.sent) {
            try {
              await scope.transmitter.sendError(internalError());
            } catch (sendError) {
              log.error({
                event: 'dispatch.error_response_failed',
                message: 'Error response could not be sent',
                metadata: {error: sendError}
              });
            }
          }
        } finally {
          context.release();
          logCompletion(scope, startedAtMs);
        }
      }
    );
  };

  return {onRequest};
};
