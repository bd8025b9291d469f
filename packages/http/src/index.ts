export {decodeText, encodeText, resolveCharset, supportedCharsets, type Charset} from './charset';
export {HttpHeaders, normalizeHeaderName, type HeadersInit, type HeaderValue} from './headers';
export {
  formatMediaType,
  isJsonMediaType,
  MEDIA_TYPES,
  mediaRangeMatches,
  parseMediaType,
  type MediaType
} from './mediaType';
export {httpMethods, isHttpMethod, normalizeMethodToken, type HttpMethod} from './methods';
export {
  HttpRequest,
  InvalidRequestTargetError,
  toBodyStream,
  type BodyChunk,
  type BodySource,
  type BodyStream,
  type InboundRequest
} from './request';
