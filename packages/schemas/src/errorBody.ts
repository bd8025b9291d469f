import {z} from 'zod';

const ErrorCodeSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[a-z][a-z0-9_]*$/u);

export const HttpErrorBodySchema = z
  .object({
    error: ErrorCodeSchema,
    message: z.string().min(1),
    correlation_id: z.string().min(1).max(128)
  })
  .strict();

export type HttpErrorBody = z.infer<typeof HttpErrorBodySchema>;

export const MethodNotAllowedBodySchema = HttpErrorBodySchema.extend({
  error: z.literal('method_not_allowed'),
  allowed_methods: z.array(z.string().min(1)).min(1)
}).strict();

export type MethodNotAllowedBody = z.infer<typeof MethodNotAllowedBodySchema>;
