import {describe, expect, it} from 'vitest'

import {loadConfig} from '../config'

describe('dispatch-server config', () => {
  it('loads defaults from minimal env input', () => {
    const config = loadConfig({
      NODE_ENV: 'test'
    })

    expect(config).toEqual({
      nodeEnv: 'test',
      host: '0.0.0.0',
      port: 8080,
      defaultCharset: 'utf-8',
      unbindableArgumentStatus: 404,
      keepAliveTimeoutMs: 5_000,
      logging: {
        level: 'silent',
        redactExtraKeys: []
      },
      traceBodyStreams: false
    })
  })

  it('defaults the log level to info outside of tests', () => {
    expect(loadConfig({NODE_ENV: 'production'}).logging.level).toBe('info')
    expect(loadConfig({}).nodeEnv).toBe('development')
  })

  it('parses explicit overrides and ignores unrelated env vars', () => {
    const config = loadConfig({
      NODE_ENV: 'development',
      DISPATCH_SERVER_HOST: '127.0.0.1',
      DISPATCH_SERVER_PORT: '9100',
      DISPATCH_SERVER_DEFAULT_CHARSET: ' ISO-8859-1 ',
      DISPATCH_SERVER_UNBINDABLE_ARGUMENT_STATUS: '400',
      DISPATCH_SERVER_KEEP_ALIVE_TIMEOUT_MS: '0',
      DISPATCH_SERVER_LOG_LEVEL: 'DEBUG',
      DISPATCH_SERVER_LOG_REDACT_EXTRA_KEYS: 'session_key, ,api_secret',
      DISPATCH_SERVER_TRACE_BODY_STREAMS: 'true',
      UNRELATED_ENV: 'ignored'
    })

    expect(config).toEqual({
      nodeEnv: 'development',
      host: '127.0.0.1',
      port: 9100,
      defaultCharset: 'iso-8859-1',
      unbindableArgumentStatus: 400,
      keepAliveTimeoutMs: 0,
      logging: {
        level: 'debug',
        redactExtraKeys: ['session_key', 'api_secret']
      },
      traceBodyStreams: true
    })
  })

  it.each([
    ['DISPATCH_SERVER_PORT', 'not-a-port'],
    ['DISPATCH_SERVER_PORT', '70000'],
    ['DISPATCH_SERVER_DEFAULT_CHARSET', 'koi8-r'],
    ['DISPATCH_SERVER_UNBINDABLE_ARGUMENT_STATUS', '500'],
    ['DISPATCH_SERVER_LOG_LEVEL', 'verbose'],
    ['DISPATCH_SERVER_TRACE_BODY_STREAMS', 'sometimes'],
    ['NODE_ENV', 'staging']
  ])('rejects an invalid %s value', (name, value) => {
    expect(() => loadConfig({NODE_ENV: 'test', [name]: value})).toThrow()
  })
})
