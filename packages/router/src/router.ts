import {isHttpMethod, mediaRangeMatches, type HttpMethod, type HttpRequest} from '@switchyard/http';

import {RouteDefinitionError} from './errors';
import {compilePathPattern, matchPathPattern, type CompiledPathPattern} from './pattern';
import type {Argument, RouteDefinition, RouteMatch, Router} from './types';

type RegisteredRoute = {
  definition: RouteDefinition;
  compiled: CompiledPathPattern;
  requiredArguments: readonly Argument[];
  order: number;
};

export type RouteRegistry = Router & {
  register: (definition: RouteDefinition) => RouteRegistry;
  routes: () => Array<{method: HttpMethod; pattern: string; declaringType: string}>;
};

const validateArguments = ({
  definition,
  compiled
}: {
  definition: RouteDefinition;
  compiled: CompiledPathPattern;
}): readonly Argument[] => {
  const argumentsList = definition.arguments ?? [];
  const seenNames = new Set<string>();

  for (const argument of argumentsList) {
    if (seenNames.has(argument.name)) {
      throw new RouteDefinitionError({
        code: 'argument_invalid',
        message: `Route ${definition.method} ${definition.path} declares argument '${argument.name}' twice`
      });
    }
    seenNames.add(argument.name);

    if (argument.binding.source === 'path' && !compiled.variableNames.includes(argument.binding.key)) {
      throw new RouteDefinitionError({
        code: 'argument_invalid',
        message: `Route ${definition.method} ${definition.path} has no path variable '${argument.binding.key}'`
      });
    }
  }

  const sources = new Set(argumentsList.map(argument => argument.binding.source));
  if (sources.has('body_stream') && (sources.has('body') || sources.has('body_field'))) {
    throw new RouteDefinitionError({
      code: 'argument_invalid',
      message: `Route ${definition.method} ${definition.path} cannot take the body stream and buffered body arguments together`
    });
  }

  return Object.freeze([...argumentsList]);
};

const acceptsContentType = ({consumes, request}: {consumes: readonly string[] | undefined; request: HttpRequest}) => {
  if (!consumes || consumes.length === 0 || !request.headers.has('content-type')) {
    return true;
  }

  const {contentType} = request;
  if (!contentType) {
    return false;
  }

  return consumes.some(range => mediaRangeMatches(range, contentType));
};

const toRouteMatch = (route: RegisteredRoute, pathVariables: Record<string, string>): RouteMatch => {
  const {definition} = route;

  return Object.freeze({
    method: definition.method,
    pattern: definition.path,
    declaringType: definition.declaringType,
    pathVariables: Object.freeze(pathVariables),
    requiredArguments: route.requiredArguments,
    returnType: Object.freeze(definition.produces ? {produces: definition.produces} : {}),
    test: (request: HttpRequest) => acceptsContentType({consumes: definition.consumes, request}),
    execute: definition.handler
  });
};

/** In-memory router; `find` orders literal-heavy patterns before variable-heavy ones. */
export const createRouter = (definitions: readonly RouteDefinition[] = []): RouteRegistry => {
  const registered: RegisteredRoute[] = [];

  const matchAll = (path: string, filter: (route: RegisteredRoute) => boolean) =>
    registered.flatMap(route => {
      if (!filter(route)) {
        return [];
      }

      const variables = matchPathPattern(route.compiled, path);
      return variables ? [{route, variables}] : [];
    });

  const registry: RouteRegistry = {
    register: definition => {
      const compiled = compilePathPattern(definition.path);
      const duplicate = registered.find(
        route => route.definition.method === definition.method && route.compiled.canonical === compiled.canonical
      );
      if (duplicate) {
        throw new RouteDefinitionError({
          code: 'route_duplicate',
          message: `Route ${definition.method} ${definition.path} is already registered by ${duplicate.definition.declaringType}`
        });
      }

      registered.push({
        definition,
        compiled,
        requiredArguments: validateArguments({definition, compiled}),
        order: registered.length
      });
      return registry;
    },
    find: (method, path) => {
      if (!isHttpMethod(method)) {
        return [];
      }

      return matchAll(path, route => route.definition.method === method)
        .sort(
          (left, right) =>
            left.route.compiled.variableNames.length - right.route.compiled.variableNames.length ||
            left.route.order - right.route.order
        )
        .map(({route, variables}) => toRouteMatch(route, variables));
    },
    findAny: path => matchAll(path, () => true).map(({route, variables}) => toRouteMatch(route, variables)),
    routes: () =>
      registered.map(({definition}) => ({
        method: definition.method,
        pattern: definition.path,
        declaringType: definition.declaringType
      }))
  };

  for (const definition of definitions) {
    registry.register(definition);
  }

  return registry;
};
