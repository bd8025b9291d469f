import {randomUUID} from 'node:crypto'

import {notFound, requestBodyArgumentInvalid, RouteResponse} from '@switchyard/dispatcher'
import {argument, type RouteDefinition} from '@switchyard/router'
import {z} from 'zod'

import {requireString} from './types'

export const NoteInputSchema = z
  .object({
    title: z.string().trim().min(1).max(200),
    body: z.string().max(10_000).default('')
  })
  .strict()

export type Note = z.infer<typeof NoteInputSchema> & {
  id: string
  created_at: string
}

export type NoteStore = {
  create: (input: z.infer<typeof NoteInputSchema>) => Note
  get: (id: string) => Note | undefined
}

export const createInMemoryNoteStore = ({
  generateId = randomUUID,
  now = () => new Date()
}: {
  generateId?: () => string
  now?: () => Date
} = {}): NoteStore => {
  const notes = new Map<string, Note>()

  return {
    create: input => {
      const note: Note = {id: generateId(), ...input, created_at: now().toISOString()}
      notes.set(note.id, note)
      return note
    },
    get: id => notes.get(id)
  }
}

export const createNoteRoutes = ({store}: {store: NoteStore}): RouteDefinition[] => [
  {
    method: 'POST',
    path: '/notes',
    declaringType: 'NoteRoutes',
    arguments: [argument.body('note', 'json', {schema: NoteInputSchema})],
    handler: ({note}) => {
      const input = NoteInputSchema.safeParse(note)
      if (!input.success) {
        throw requestBodyArgumentInvalid('Note is invalid')
      }

      const created = store.create(input.data)
      return new RouteResponse({status: 201, headers: {location: `/notes/${created.id}`}, body: created})
    }
  },
  {
    method: 'GET',
    path: '/notes/{id}',
    declaringType: 'NoteRoutes',
    arguments: [argument.path('id')],
    handler: args => {
      const id = requireString(args, 'id')
      const note = store.get(id)
      if (!note) {
        throw notFound('note_not_found', `Note ${id} does not exist`)
      }

      return note
    }
  }
]
