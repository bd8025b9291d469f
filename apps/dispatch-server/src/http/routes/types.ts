import {badRequest} from '@switchyard/dispatcher'
import type {BodyStream} from '@switchyard/http'
import type {ArgumentValues} from '@switchyard/router'

export const requireString = (args: ArgumentValues, name: string) => {
  const value = args[name]
  if (typeof value !== 'string') {
    throw badRequest('argument_invalid', `Argument '${name}' must be a string`)
  }

  return value
}

export const optionalString = (args: ArgumentValues, name: string) => {
  const value = args[name]
  return typeof value === 'string' ? value : undefined
}

export const isBodyStream = (value: unknown): value is BodyStream =>
  typeof value === 'object' && value !== null && Symbol.asyncIterator in value
