import type {Writable} from 'node:stream';

import {LogEventSchema, type LogEvent} from '@switchyard/schemas';
import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {sanitizeForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EmittableLogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);
export type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

export const LogEventInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    connection_id: z.string().min(1).max(128).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
};

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

type LevelInput = Omit<LogEventInput, 'level'>;

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: (input: LevelInput) => void;
  info: (input: LevelInput) => void;
  warn: (input: LevelInput) => void;
  error: (input: LevelInput) => void;
  fatal: (input: LevelInput) => void;
  isLevelEnabled: (level: EmittableLogLevel) => boolean;
};

/** Logger with the `component` field already bound. */
export type ComponentLogger = {
  [TLevel in EmittableLogLevel]: (input: Omit<LevelInput, 'component'>) => void;
} & {
  isLevelEnabled: (level: EmittableLogLevel) => boolean;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const chooseStream = ({level, writer}: {level: EmittableLogLevel; writer: StructuredLogWriter}) =>
  level === 'error' || level === 'fatal' ? writer.stderr : writer.stdout;

const createEnvelope = ({
  input,
  service,
  env,
  now,
  extraSensitiveKeys,
  context
}: {
  input: LogEventInput;
  service: string;
  env: string;
  now: () => Date;
  extraSensitiveKeys: string[];
  context: LogContext | undefined;
}): LogEvent => {
  const connectionId = input.connection_id ?? context?.connection_id;
  const route = input.route ?? context?.route;
  const method = input.method ?? context?.method;
  const sanitizedMetadata = sanitizeForLog({
    value: input.metadata ?? {},
    extraSensitiveKeys
  });

  return LogEventSchema.parse({
    ts: now().toISOString(),
    level: input.level,
    service,
    env,
    event: input.event,
    component: input.component,
    correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
    request_id: input.request_id ?? context?.request_id ?? 'n/a',
    ...(connectionId ? {connection_id: connectionId} : {}),
    ...(input.message ? {message: input.message} : {}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    ...(input.status_code !== undefined ? {status_code: input.status_code} : {}),
    ...(route ? {route} : {}),
    ...(method ? {method} : {}),
    metadata: sanitizedMetadata
  });
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const level = LogLevelSchema.parse(options.level);
  const service = z.string().min(1).parse(options.service);
  const env = z.string().min(1).parse(options.env);
  const writer = options.writer ?? defaultWriter;
  const now = options.now ?? (() => new Date());
  const extraSensitiveKeys = options.extraSensitiveKeys ?? [];

  const isLevelEnabled = (eventLevel: EmittableLogLevel) => levelOrder[eventLevel] >= levelOrder[level];

  const log = (rawInput: LogEventInput) => {
    if (!isLevelEnabled(rawInput.level)) {
      return;
    }

    try {
      const input = LogEventInputSchema.parse(rawInput);
      const envelope = createEnvelope({
        input,
        service,
        env,
        now,
        extraSensitiveKeys,
        context: getLogContext()
      });
      chooseStream({level: input.level, writer}).write(`${JSON.stringify(envelope)}\n`);
    } catch {
      // Logging failures must never break request handling.
    }
  };

  return {
    log,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'}),
    isLevelEnabled
  };
};

export const forComponent = (logger: StructuredLogger, component: string): ComponentLogger => ({
  debug: input => logger.debug({...input, component}),
  info: input => logger.info({...input, component}),
  warn: input => logger.warn({...input, component}),
  error: input => logger.error({...input, component}),
  fatal: input => logger.fatal({...input, component}),
  isLevelEnabled: level => logger.isLevelEnabled(level)
});

export const createNoopLogger = (): StructuredLogger => ({
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined,
  isLevelEnabled: () => false
});
