import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest'

const originalArgv = [...process.argv]

const flushMicrotasks = async () => {
  await new Promise<void>(resolve => {
    setTimeout(() => resolve(), 0)
  })
}

beforeEach(() => {
  process.argv = [...originalArgv]
})

afterEach(() => {
  process.argv = [...originalArgv]
  vi.restoreAllMocks()
  vi.resetModules()
})

describe('dispatch-server index entrypoint', () => {
  it('does not auto-start when imported as a non-entry module', async () => {
    const createDispatchServerApp = vi.fn()
    const loadConfig = vi.fn()

    vi.doMock('../app', () => ({
      createDispatchServerApp,
      serviceName: 'dispatch-server'
    }))
    vi.doMock('../config', () => ({
      loadConfig
    }))
    vi.doMock('node:url', () => ({
      fileURLToPath: vi.fn(() => '/virtual/index.ts')
    }))

    process.argv[1] = '/virtual/other-entry.js'

    const imported = await import('../index')
    await flushMicrotasks()

    expect(imported.serviceName).toBe('dispatch-server')
    expect(typeof imported.main).toBe('function')
    expect(loadConfig).not.toHaveBeenCalled()
    expect(createDispatchServerApp).not.toHaveBeenCalled()
  }, 15_000)

  it('starts the app when running as the entry module and stops it on SIGINT', async () => {
    const start = vi.fn().mockResolvedValue(undefined)
    const stop = vi.fn().mockResolvedValue(undefined)
    const info = vi.fn()
    const loadConfig = vi.fn().mockReturnValue({host: '127.0.0.1', port: 8080})
    const createDispatchServerApp = vi.fn().mockReturnValue({start, stop, logger: {info}})

    vi.doMock('../app', () => ({
      createDispatchServerApp,
      serviceName: 'dispatch-server'
    }))
    vi.doMock('../config', () => ({
      loadConfig
    }))
    vi.doMock('node:url', () => ({
      fileURLToPath: vi.fn(() => '/virtual/entry.js')
    }))

    process.argv[1] = '/virtual/entry.js'

    const onSpy = vi.spyOn(process, 'on').mockImplementation(() => process)
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as never)

    await import('../index')
    await flushMicrotasks()

    expect(loadConfig).toHaveBeenCalledTimes(1)
    expect(createDispatchServerApp).toHaveBeenCalledTimes(1)
    expect(start).toHaveBeenCalledTimes(1)
    expect(info).toHaveBeenCalledWith({
      event: 'process.started',
      component: 'process.entrypoint',
      message: 'Listening on 127.0.0.1:8080'
    })

    const sigintHandler = onSpy.mock.calls.find(call => call[0] === 'SIGINT')?.[1]
    expect(typeof sigintHandler).toBe('function')
    if (typeof sigintHandler === 'function') {
      sigintHandler()
    }
    await flushMicrotasks()

    expect(stop).toHaveBeenCalledTimes(1)
    expect(exitSpy).toHaveBeenCalledWith(0)
    expect(onSpy).toHaveBeenCalledWith('SIGTERM', expect.any(Function))
  })

  it('exits with 1 when stopping after a signal fails', async () => {
    const error = vi.fn()
    const createDispatchServerApp = vi.fn().mockReturnValue({
      start: vi.fn().mockResolvedValue(undefined),
      stop: vi.fn().mockRejectedValue(new Error('close failed')),
      logger: {info: vi.fn(), error}
    })

    vi.doMock('../app', () => ({
      createDispatchServerApp,
      serviceName: 'dispatch-server'
    }))
    vi.doMock('../config', () => ({
      loadConfig: vi.fn().mockReturnValue({host: '127.0.0.1', port: 8080})
    }))
    vi.doMock('node:url', () => ({
      fileURLToPath: vi.fn(() => '/virtual/entry.js')
    }))

    process.argv[1] = '/virtual/entry.js'

    const onSpy = vi.spyOn(process, 'on').mockImplementation(() => process)
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as never)

    await import('../index')
    await flushMicrotasks()

    const sigtermHandler = onSpy.mock.calls.find(call => call[0] === 'SIGTERM')?.[1]
    if (typeof sigtermHandler === 'function') {
      sigtermHandler()
    }
    await flushMicrotasks()

    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({event: 'process.stop_failed', reason_code: 'stop_failed', message: 'Stop on SIGTERM failed'})
    )
    expect(exitSpy).toHaveBeenCalledWith(1)
  })

  it('logs a fatal event and exits when startup fails in entry mode', async () => {
    const startupError = new Error('listen failed')
    const createDispatchServerApp = vi.fn().mockImplementation(() => {
      throw startupError
    })

    vi.doMock('../app', () => ({
      createDispatchServerApp,
      serviceName: 'dispatch-server'
    }))
    vi.doMock('../config', () => ({
      loadConfig: vi.fn().mockReturnValue({})
    }))
    vi.doMock('node:url', () => ({
      fileURLToPath: vi.fn(() => '/virtual/failing-entry.js')
    }))

    process.argv[1] = '/virtual/failing-entry.js'

    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as never)

    await import('../index')
    await flushMicrotasks()

    expect(createDispatchServerApp).toHaveBeenCalledTimes(1)
    expect(exitSpy).toHaveBeenCalledWith(1)

    const written = stderrSpy.mock.calls.map(call => String(call[0]))
    const fatal = written
      .filter(line => line.startsWith('{'))
      .map((line): unknown => JSON.parse(line))
      .find(
        event =>
          typeof event === 'object' && event !== null && 'event' in event && event.event === 'process.startup.failed'
      )
    expect(fatal).toMatchObject({
      level: 'fatal',
      service: 'dispatch-server',
      component: 'process.entrypoint',
      reason_code: 'startup_failed',
      message: 'Dispatch server startup failed'
    })
  })
})
