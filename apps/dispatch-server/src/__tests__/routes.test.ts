import {DispatchError, RouteResponse} from '@switchyard/dispatcher'
import {describe, expect, it} from 'vitest'

import {createInMemoryNoteStore, createRouteDefinitions} from '../http/routes'
import {echoRoute} from '../http/routes/echoRoute'
import {greetingRoute} from '../http/routes/greetingRoute'
import {createNoteRoutes} from '../http/routes/noteRoutes'
import {uploadRoute} from '../http/routes/uploadRoute'

const fixedStore = () => {
  let counter = 0
  return createInMemoryNoteStore({
    generateId: () => {
      counter += 1
      return `note-${String(counter)}`
    },
    now: () => new Date('2026-03-01T10:00:00.000Z')
  })
}

describe('sample routes', () => {
  it('registers every sample route', () => {
    const definitions = createRouteDefinitions({noteStore: fixedStore()})

    expect(definitions.map(definition => `${definition.method} ${definition.path}`)).toEqual([
      'GET /healthz',
      'GET /greetings/{name}',
      'POST /echo',
      'POST /notes',
      'GET /notes/{id}',
      'PUT /uploads/{name}'
    ])
  })

  it('greets with default and explicit punctuation', () => {
    expect(greetingRoute.handler({name: 'Ada'})).toBe('Hello, Ada!')
    expect(greetingRoute.handler({name: 'Ada', punctuation: '?'})).toBe('Hello, Ada?')
  })

  it('rejects a non-string greeting name', () => {
    expect(() => greetingRoute.handler({name: 42})).toThrow(DispatchError)
  })

  it('echoes text', () => {
    expect(echoRoute.handler({text: 'ping'})).toBe('ping')
  })

  it('creates and reads notes', () => {
    const [create, read] = createNoteRoutes({store: fixedStore()})
    if (!create || !read) {
      throw new Error('expected note routes')
    }

    const created = create.handler({note: {title: 'Groceries', body: 'milk'}})
    expect(created).toBeInstanceOf(RouteResponse)
    if (!(created instanceof RouteResponse)) {
      return
    }
    expect(created.status).toBe(201)
    expect(created.headers).toEqual({location: '/notes/note-1'})
    expect(created.body).toEqual({
      id: 'note-1',
      title: 'Groceries',
      body: 'milk',
      created_at: '2026-03-01T10:00:00.000Z'
    })

    expect(read.handler({id: 'note-1'})).toEqual(created.body)
  })

  it('reports unknown notes as not found', () => {
    const [, read] = createNoteRoutes({store: fixedStore()})

    try {
      read?.handler({id: 'missing'})
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(DispatchError)
      expect(error).toMatchObject({code: 'note_not_found', status: 404, message: 'Note missing does not exist'})
    }
  })

  it('counts uploaded bytes from the stream', async () => {
    const content = (async function* chunks() {
      yield 'héllo'
      yield new Uint8Array([1, 2, 3])
    })()

    await expect(uploadRoute.handler({name: 'report.bin', content})).resolves.toEqual({name: 'report.bin', bytes: 9})
  })
})
