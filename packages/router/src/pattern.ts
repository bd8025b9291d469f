import {RouteDefinitionError} from './errors';

type PatternSegment = {kind: 'literal'; value: string} | {kind: 'variable'; name: string};

export type CompiledPathPattern = {
  pattern: string;
  /** Pattern with variable names erased; equal for patterns that match the same paths. */
  canonical: string;
  segments: PatternSegment[];
  variableNames: string[];
};

const VARIABLE_SEGMENT_REGEX = /^\{([A-Za-z_][A-Za-z0-9_]*)\}$/u;

const splitPath = (path: string) => path.split('/').filter(segment => segment.length > 0);

const decodeSegment = (segment: string) => {
  try {
    return decodeURIComponent(segment);
  } catch {
    return undefined;
  }
};

export const compilePathPattern = (pattern: string): CompiledPathPattern => {
  if (!pattern.startsWith('/')) {
    throw new RouteDefinitionError({code: 'pattern_invalid', message: `Route pattern must start with '/': ${pattern}`});
  }

  const variableNames: string[] = [];
  const segments = splitPath(pattern).map((segment): PatternSegment => {
    const variable = VARIABLE_SEGMENT_REGEX.exec(segment);
    if (variable) {
      const [, name = ''] = variable;
      if (variableNames.includes(name)) {
        throw new RouteDefinitionError({
          code: 'pattern_invalid',
          message: `Route pattern declares variable '${name}' twice: ${pattern}`
        });
      }
      variableNames.push(name);
      return {kind: 'variable', name};
    }

    if (segment.includes('{') || segment.includes('}')) {
      throw new RouteDefinitionError({
        code: 'pattern_invalid',
        message: `Route pattern segment is not a literal or a whole variable: ${segment}`
      });
    }

    return {kind: 'literal', value: segment};
  });

  const canonical = `/${segments.map(segment => (segment.kind === 'literal' ? segment.value : '{}')).join('/')}`;
  return {pattern, canonical, segments, variableNames};
};

/** Decoded path variables when the path matches, otherwise null. */
export const matchPathPattern = (
  compiled: CompiledPathPattern,
  path: string
): Record<string, string> | null => {
  const pathSegments = splitPath(path);
  if (pathSegments.length !== compiled.segments.length) {
    return null;
  }

  const variables: Record<string, string> = {};
  for (const [index, segment] of compiled.segments.entries()) {
    const decoded = decodeSegment(pathSegments[index] ?? '');
    if (decoded === undefined) {
      return null;
    }

    if (segment.kind === 'literal') {
      if (segment.value !== decoded) {
        return null;
      }
      continue;
    }

    variables[segment.name] = decoded;
  }

  return variables;
};
