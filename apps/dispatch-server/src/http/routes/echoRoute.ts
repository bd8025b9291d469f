import {MEDIA_TYPES} from '@switchyard/http'
import {argument, type RouteDefinition} from '@switchyard/router'

import {requireString} from './types'

/** Returns the request text re-encoded in the server's default charset. */
export const echoRoute: RouteDefinition = {
  method: 'POST',
  path: '/echo',
  declaringType: 'EchoRoutes',
  arguments: [argument.body('text', 'text')],
  produces: MEDIA_TYPES.text,
  handler: args => requireString(args, 'text')
}
