import type {RouteDefinition} from '@switchyard/router'

import {echoRoute} from './echoRoute'
import {greetingRoute} from './greetingRoute'
import {healthRoute} from './healthRoute'
import {createNoteRoutes, type NoteStore} from './noteRoutes'
import {uploadRoute} from './uploadRoute'

export {createInMemoryNoteStore, NoteInputSchema, type Note, type NoteStore} from './noteRoutes'

export const createRouteDefinitions = ({noteStore}: {noteStore: NoteStore}): RouteDefinition[] => [
  healthRoute,
  greetingRoute,
  echoRoute,
  ...createNoteRoutes({store: noteStore}),
  uploadRoute
]
