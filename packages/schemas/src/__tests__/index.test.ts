import {describe, expect, it} from 'vitest';

import {HttpErrorBodySchema, LogEventSchema, MethodNotAllowedBodySchema, packageName} from '../index';

describe('@switchyard/schemas', () => {
  it('exports the package name', () => {
    expect(packageName).toBe('schemas');
  });

  it('accepts a well-formed error body and rejects unknown keys', () => {
    const body = {
      error: 'route_not_found',
      message: 'No route for GET /missing',
      correlation_id: 'corr_1'
    };

    expect(HttpErrorBodySchema.parse(body)).toEqual(body);
    expect(HttpErrorBodySchema.safeParse({...body, stack: 'at x'}).success).toBe(false);
    expect(HttpErrorBodySchema.safeParse({...body, error: 'Not Found'}).success).toBe(false);
  });

  it('requires a non-empty allowed methods list on 405 bodies', () => {
    const base = {
      error: 'method_not_allowed',
      message: 'Method DELETE is not allowed for /notes',
      correlation_id: 'corr_2'
    };

    expect(MethodNotAllowedBodySchema.safeParse({...base, allowed_methods: ['GET', 'POST']}).success).toBe(true);
    expect(MethodNotAllowedBodySchema.safeParse({...base, allowed_methods: []}).success).toBe(false);
    expect(
      MethodNotAllowedBodySchema.safeParse({...base, error: 'route_not_found', allowed_methods: ['GET']}).success
    ).toBe(false);
  });

  it('validates log envelopes', () => {
    const parsed = LogEventSchema.safeParse({
      ts: '2026-01-01T00:00:00.000Z',
      level: 'info',
      service: 'dispatch-server',
      env: 'test',
      event: 'request.completed',
      component: 'http.dispatcher',
      correlation_id: 'corr_3',
      request_id: 'req_3',
      status_code: 200,
      metadata: {}
    });

    expect(parsed.success).toBe(true);
    expect(LogEventSchema.safeParse({level: 'info'}).success).toBe(false);
  });
});
