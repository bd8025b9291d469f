export const httpMethods = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS', 'TRACE'] as const;

export type HttpMethod = (typeof httpMethods)[number];

const HTTP_TOKEN_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/u;

export const isHttpMethod = (value: string): value is HttpMethod =>
  httpMethods.some(method => method === value);

/** Returns the method token as sent, or undefined when it is not a valid HTTP token. */
export const normalizeMethodToken = (value: string): string | undefined => {
  const trimmed = value.trim();
  return HTTP_TOKEN_REGEX.test(trimmed) ? trimmed.toUpperCase() : undefined;
};
