export class RouteDefinitionError extends Error {
  public readonly code: 'pattern_invalid' | 'route_duplicate' | 'argument_invalid';

  public constructor({code, message}: {code: RouteDefinitionError['code']; message: string}) {
    super(message);
    this.name = 'RouteDefinitionError';
    this.code = code;
  }
}
