export {argument} from './arguments';
export {RouteDefinitionError} from './errors';
export {compilePathPattern, matchPathPattern, type CompiledPathPattern} from './pattern';
export {createRouter, type RouteRegistry} from './router';
export {
  argumentTypes,
  type Argument,
  type ArgumentBinding,
  type ArgumentType,
  type ArgumentValues,
  type ReturnTypeDescriptor,
  type RouteDefinition,
  type RouteHandler,
  type RouteMatch,
  type Router
} from './types';
