import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'
import type {Socket} from 'node:net'
import {finished} from 'node:stream/promises'

import {
  badRequest,
  ConnectionScheduler,
  extractCorrelationId,
  ResponseTransmitter,
  type Dispatcher,
  type ResponseSink
} from '@switchyard/dispatcher'
import {
  HttpHeaders,
  HttpRequest,
  InvalidRequestTargetError,
  type BodySource,
  type BodyStream,
  type InboundRequest
} from '@switchyard/http'
import {forComponent, type StructuredLogger} from '@switchyard/logging'

const hasRequestBody = (request: IncomingMessage) => {
  if (request.headers['transfer-encoding'] !== undefined) {
    return true
  }

  const contentLength = Number.parseInt(request.headers['content-length'] ?? '', 10)
  return Number.isInteger(contentLength) && contentLength > 0
}

// Stopping early leaves the socket open for the next request on it.
const requestBodyStream = (request: IncomingMessage): BodyStream => ({
  async *[Symbol.asyncIterator]() {
    const chunks: AsyncIterable<unknown> = request.iterator({destroyOnReturn: false})
    try {
      for await (const chunk of chunks) {
        if (typeof chunk !== 'string' && !(chunk instanceof Uint8Array)) {
          throw new TypeError('Request body produced an unsupported chunk type')
        }
        yield chunk
      }
    } finally {
      if (!request.readableEnded) {
        request.resume()
      }
    }
  }
})

export const toInboundRequest = (request: IncomingMessage): InboundRequest => {
  const body: BodySource = hasRequestBody(request)
    ? {kind: 'stream', stream: requestBodyStream(request)}
    : {kind: 'absent'}

  return {
    method: request.method ?? 'GET',
    target: request.url ?? '/',
    headers: new HttpHeaders(request.headersDistinct),
    body
  }
}

export const createResponseSink = (response: ServerResponse): ResponseSink => ({
  send: async ({status, headers, body}) => {
    response.writeHead(status, headers)
    response.end(body)
    await finished(response)
  },
  destroy: error => {
    response.destroy(error)
  }
})

export type NodeRequestListener = (request: IncomingMessage, response: ServerResponse) => void

/**
 * Bridges Node's request events to the dispatcher. Requests of one socket run through that socket's scheduler,
 * so responses keep request order and a closed socket cancels whatever is still pending.
 */
export const createNodeRequestListener = ({
  dispatcher,
  logger,
  generateId = randomUUID
}: {
  dispatcher: Dispatcher
  logger: StructuredLogger
  generateId?: () => string
}): NodeRequestListener => {
  const log = forComponent(logger, 'dispatch.transport')
  const schedulers = new WeakMap<Socket, ConnectionScheduler>()

  const schedulerFor = (socket: Socket) => {
    const existing = schedulers.get(socket)
    if (existing) {
      return existing
    }

    const connectionId = generateId()
    const scheduler = new ConnectionScheduler({
      connectionId,
      onTaskError: error => {
        log.error({
          event: 'connection.task_failed',
          message: 'Scheduled dispatch failed',
          connection_id: connectionId,
          reason_code: 'internal_error',
          metadata: {error}
        })
      }
    })
    schedulers.set(socket, scheduler)
    log.debug({event: 'connection.opened', message: 'Connection opened', connection_id: connectionId})

    socket.once('close', () => {
      if (scheduler.pending > 0) {
        log.debug({
          event: 'connection.closed_with_pending',
          message: `Connection closed with ${scheduler.pending} pending request(s)`,
          connection_id: connectionId
        })
      }
      scheduler.close()
    })

    return scheduler
  }

  const rejectInvalidTarget = async (inbound: InboundRequest, sink: ResponseSink, error: InvalidRequestTargetError) => {
    const transmitter = new ResponseTransmitter({
      sink,
      correlationId: extractCorrelationId(inbound.headers, generateId),
      logger: forComponent(logger, 'dispatch.transmitter')
    })
    log.warn({
      event: 'request.rejected',
      message: error.message,
      reason_code: 'request_target_invalid',
      method: inbound.method
    })
    await transmitter.sendError(badRequest('request_target_invalid', 'Request target is invalid'))
  }

  return (request, response) => {
    const scheduler = schedulerFor(request.socket)
    const sink = createResponseSink(response)
    const inbound = toInboundRequest(request)

    void scheduler.schedule(async signal => {
      let httpRequest: HttpRequest
      try {
        httpRequest = HttpRequest.from(inbound)
      } catch (error) {
        if (error instanceof InvalidRequestTargetError) {
          await rejectInvalidTarget(inbound, sink, error)
          return
        }
        throw error
      }

      await dispatcher.onRequest(httpRequest, sink, {signal, connectionId: scheduler.connectionId})
    })
  }
}
