export {
  bodyFieldBinder,
  bodyStreamBinder,
  headerBinder,
  pathOrQueryBinder,
  pathVariableBinder,
  queryValueBinder,
  requestBinder,
  wholeBodyBinder
} from './binders';
export {convertBody, convertJsonValue, convertText, readJsonBody} from './conversion';
export {createBinderRegistry, type BinderRegistration, type ConfigurableBinderRegistry} from './registry';
export {
  bindingErrorCodes,
  err,
  ok,
  type Binder,
  type BinderRegistry,
  type BindingContext,
  type BindingError,
  type BindingErrorCode,
  type BindingFailure,
  type BindingResult,
  type BindingSuccess,
  type BodyBinder,
  type CompletedBody,
  type NonBlockingBodyBinder,
  type PlainBinder
} from './types';
