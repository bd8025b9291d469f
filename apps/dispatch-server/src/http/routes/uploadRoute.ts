import {internalError} from '@switchyard/dispatcher'
import type {BodyStream} from '@switchyard/http'
import {argument, type RouteDefinition} from '@switchyard/router'

import {isBodyStream, requireString} from './types'

const countBytes = async (stream: BodyStream) => {
  let bytes = 0
  for await (const chunk of stream) {
    bytes += typeof chunk === 'string' ? Buffer.byteLength(chunk) : chunk.byteLength
  }

  return bytes
}

export const uploadRoute: RouteDefinition = {
  method: 'PUT',
  path: '/uploads/{name}',
  declaringType: 'UploadRoutes',
  arguments: [argument.path('name'), argument.bodyStream('content')],
  handler: async args => {
    const content = args.content
    if (!isBodyStream(content)) {
      throw internalError()
    }

    return {name: requireString(args, 'name'), bytes: await countBytes(content)}
  }
}
