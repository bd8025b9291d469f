import {resolveCharset, type Charset} from './charset';

export const MEDIA_TYPES = {
  json: 'application/json',
  text: 'text/plain',
  octetStream: 'application/octet-stream'
} as const;

export type MediaType = {
  type: string;
  subtype: string;
  essence: string;
  parameters: Readonly<Record<string, string>>;
  charset?: Charset;
};

const TOKEN_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/u;

const unquote = (value: string) =>
  value.length >= 2 && value.startsWith('"') && value.endsWith('"')
    ? value.slice(1, -1).replace(/\\(.)/gu, '$1')
    : value;

export const parseMediaType = (value: string): MediaType | undefined => {
  const [essencePart = '', ...parameterParts] = value.split(';');
  const [type, subtype, ...rest] = essencePart.trim().toLowerCase().split('/');
  if (!type || !subtype || rest.length > 0 || !TOKEN_REGEX.test(type) || !TOKEN_REGEX.test(subtype)) {
    return undefined;
  }

  const parameters: Record<string, string> = {};
  for (const part of parameterParts) {
    const separatorIndex = part.indexOf('=');
    if (separatorIndex <= 0) {
      continue;
    }

    const name = part.slice(0, separatorIndex).trim().toLowerCase();
    if (!TOKEN_REGEX.test(name) || name in parameters) {
      continue;
    }

    parameters[name] = unquote(part.slice(separatorIndex + 1).trim());
  }

  const charset = parameters.charset === undefined ? undefined : resolveCharset(parameters.charset);

  return {
    type,
    subtype,
    essence: `${type}/${subtype}`,
    parameters,
    ...(charset ? {charset} : {})
  };
};

export const isJsonMediaType = (mediaType: MediaType | undefined) =>
  mediaType !== undefined &&
  (mediaType.essence === MEDIA_TYPES.json || (mediaType.type === 'application' && mediaType.subtype.endsWith('+json')));

/** Matches a media range such as `*\/*`, `text/*` or `application/json` against a media type. */
export const mediaRangeMatches = (range: string, mediaType: MediaType) => {
  const parsedRange = parseMediaType(range);
  if (!parsedRange) {
    return false;
  }

  if (parsedRange.type === '*') {
    return parsedRange.subtype === '*';
  }

  if (parsedRange.type !== mediaType.type) {
    return false;
  }

  return parsedRange.subtype === '*' || parsedRange.subtype === mediaType.subtype;
};

export const formatMediaType = (essence: string, charset?: Charset) =>
  charset ? `${essence}; charset=${charset}` : essence;
