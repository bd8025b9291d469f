import {createServer, type Server} from 'node:http'

import type {Dispatcher} from '@switchyard/dispatcher'
import {toBodyStream} from '@switchyard/http'
import {createNoopLogger} from '@switchyard/logging'
import {afterEach, describe, expect, it} from 'vitest'

import {createNodeRequestListener} from '../http/nodeAdapter'

type Received = {
  method: string
  path: string
  hasBody: boolean
  text: string
  connectionId: string | undefined
}

const recordingDispatcher = (received: Received[]): Dispatcher => ({
  onRequest: async (request, sink, options) => {
    let text = ''
    const stream = toBodyStream(request.body)
    if (stream && request.path !== '/skip') {
      for await (const chunk of stream) {
        text += typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8')
      }
    }

    received.push({
      method: request.method,
      path: request.path,
      hasBody: request.hasBody,
      text,
      connectionId: options?.connectionId
    })
    await sink.send({status: 200, headers: {'content-type': 'text/plain'}, body: Buffer.from(`ok ${request.path}`)})
  }
})

let activeServer: Server | null = null

const listen = async (dispatcher: Dispatcher) => {
  let counter = 0
  const server = createServer(
    createNodeRequestListener({
      dispatcher,
      logger: createNoopLogger(),
      generateId: () => {
        counter += 1
        return `conn-${String(counter)}`
      }
    })
  )
  activeServer = server

  await new Promise<void>(resolve => {
    server.listen(0, '127.0.0.1', () => resolve())
  })

  const address = server.address()
  if (!address || typeof address === 'string') {
    throw new Error('expected tcp address')
  }

  return `http://127.0.0.1:${String(address.port)}`
}

afterEach(async () => {
  const server = activeServer
  activeServer = null
  if (!server) {
    return
  }

  server.closeAllConnections()
  await new Promise<void>(resolve => {
    server.close(() => resolve())
  })
})

describe('node request adapter', () => {
  it('presents bodiless requests as absent and bodies as streams', async () => {
    const received: Received[] = []
    const baseUrl = await listen(recordingDispatcher(received))

    const first = await fetch(`${baseUrl}/a?x=1`)
    expect(await first.text()).toBe('ok /a')
    const second = await fetch(`${baseUrl}/b`, {method: 'POST', body: 'hello'})
    expect(await second.text()).toBe('ok /b')

    expect(received).toEqual([
      {method: 'GET', path: '/a', hasBody: false, text: '', connectionId: expect.stringMatching(/^conn-/u)},
      {method: 'POST', path: '/b', hasBody: true, text: 'hello', connectionId: expect.stringMatching(/^conn-/u)}
    ])
  })

  it('keeps the connection usable when a body is left unread', async () => {
    const received: Received[] = []
    const baseUrl = await listen(recordingDispatcher(received))

    const skipped = await fetch(`${baseUrl}/skip`, {method: 'POST', body: 'x'.repeat(64 * 1024)})
    expect(skipped.status).toBe(200)
    expect(await skipped.text()).toBe('ok /skip')

    const next = await fetch(`${baseUrl}/after`)
    expect(await next.text()).toBe('ok /after')
    expect(received.map(entry => entry.path)).toEqual(['/skip', '/after'])
  })

  it('keeps serving after a dispatcher throws', async () => {
    let calls = 0
    const baseUrl = await listen({
      onRequest: async (request, sink) => {
        calls += 1
        if (request.path === '/explode') {
          throw new Error('dispatcher defect')
        }
        await sink.send({status: 204, headers: {}, body: Buffer.alloc(0)})
      }
    })

    const controller = new AbortController()
    const exploded = fetch(`${baseUrl}/explode`, {signal: controller.signal}).catch((error: unknown) => error)
    setTimeout(() => controller.abort(), 100)
    await exploded

    const next = await fetch(`${baseUrl}/fine`)
    expect(next.status).toBe(204)
    expect(calls).toBe(2)
  })
})
