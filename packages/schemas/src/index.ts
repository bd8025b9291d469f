export {LogEventLevelSchema, LogEventSchema, type LogEvent} from './logEvent';
export {
  HttpErrorBodySchema,
  MethodNotAllowedBodySchema,
  type HttpErrorBody,
  type MethodNotAllowedBody
} from './errorBody';

export const packageName = 'schemas';
