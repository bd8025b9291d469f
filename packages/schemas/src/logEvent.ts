import {z} from 'zod';

export const LogEventLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

export const LogEventSchema = z
  .object({
    ts: z.string().datetime({offset: true}),
    level: LogEventLevelSchema,
    service: z.string().min(1),
    env: z.string().min(1),
    event: z.string().min(1),
    component: z.string().min(1),
    correlation_id: z.string().min(1).max(128),
    request_id: z.string().min(1).max(128),
    connection_id: z.string().min(1).max(128).optional(),
    message: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown())
  })
  .strict();

export type LogEvent = z.infer<typeof LogEventSchema>;
