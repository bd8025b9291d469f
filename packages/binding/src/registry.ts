import type {Argument} from '@switchyard/router';

import {
  bodyFieldBinder,
  bodyStreamBinder,
  headerBinder,
  pathOrQueryBinder,
  pathVariableBinder,
  queryValueBinder,
  requestBinder,
  wholeBodyBinder
} from './binders';
import type {Binder, BinderRegistry, BindingContext} from './types';

export type BinderRegistration = {
  binder: Binder;
  supports: (argument: Argument, context: BindingContext) => boolean;
};

export type ConfigurableBinderRegistry = BinderRegistry & {
  register: (registration: BinderRegistration) => ConfigurableBinderRegistry;
};

const defaultBinderFor = (argument: Argument): Binder => {
  switch (argument.binding.source) {
    case 'path':
      return pathVariableBinder;
    case 'query':
      return queryValueBinder;
    case 'header':
      return headerBinder;
    case 'request':
      return requestBinder;
    case 'body':
      return wholeBodyBinder;
    case 'body_field':
      return bodyFieldBinder;
    case 'body_stream':
      return bodyStreamBinder;
    case 'default':
      return pathOrQueryBinder;
  }
};

/** Registry consulting custom registrations in registration order before the built-in binders. */
export const createBinderRegistry = (registrations: readonly BinderRegistration[] = []): ConfigurableBinderRegistry => {
  const custom = [...registrations];

  const registry: ConfigurableBinderRegistry = {
    findBinder: (argument, context) =>
      custom.find(registration => registration.supports(argument, context))?.binder ?? defaultBinderFor(argument),
    register: registration => {
      custom.push(registration);
      return registry;
    }
  };

  return registry;
};
