import {argument, type RouteDefinition} from '@switchyard/router'

import {optionalString, requireString} from './types'

export const greetingRoute: RouteDefinition = {
  method: 'GET',
  path: '/greetings/{name}',
  declaringType: 'GreetingRoutes',
  arguments: [argument.path('name'), argument.query('punctuation', 'string', {optional: true})],
  handler: args => `Hello, ${requireString(args, 'name')}${optionalString(args, 'punctuation') ?? '!'}`
}
