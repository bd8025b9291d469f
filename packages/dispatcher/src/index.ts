export {ArgumentValueMap} from './argumentValues';
export {BodyAccumulator, BodyAccumulatorReleasedError} from './bodyAccumulator';
export {ConnectionScheduler, type ScheduledTask} from './connection';
export {
  consumeBody,
  createChunkSubscriber,
  createJsonSubscriber,
  type BodyOutcome,
  type ContentSubscriber
} from './contentSubscriber';
export {RequestContext, type DeferredBodyArgument} from './context';
export {DeferredExecution, type DeferredExecutionState} from './continuation';
export {
  createDispatcher,
  extractCorrelationId,
  type Dispatcher,
  type DispatcherOptions,
  type DispatchOptions
} from './dispatcher';
export {
  argumentUnbindable,
  badRequest,
  DispatchError,
  DuplicateArgumentError,
  internal,
  internalError,
  isDispatchError,
  methodNotAllowed,
  notFound,
  requestBodyArgumentInvalid,
  requestBodyInvalid,
  requestBodyMissing,
  requestBodyStreamFailed,
  RequestContextReleasedError,
  ResponseAlreadySentError,
  RouteAlreadySelectedError,
  routeNotFound,
  type DispatchStatus,
  type UnbindableArgumentStatus
} from './errors';
export {JsonScanner, JsonSyntaxError} from './jsonScanner';
export {
  createLoggingTracer,
  noopTracer,
  traceBodyStream,
  type DispatchSpan,
  type DispatchTracer,
  type SpanTagValue
} from './tracing';
export {
  ResponseTransmitter,
  RouteResponse,
  UnrenderableResultError,
  type OutboundResponse,
  type ResponseSink
} from './transmitter';
