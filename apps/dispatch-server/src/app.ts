import {createServer} from 'node:http'

import express from 'express'
import helmet from 'helmet'

import {createBinderRegistry} from '@switchyard/binding'
import {createDispatcher, createLoggingTracer, noopTracer} from '@switchyard/dispatcher'
import {createStructuredLogger, type StructuredLogger} from '@switchyard/logging'
import {createRouter} from '@switchyard/router'

import type {ServiceConfig} from './config'
import {createNodeRequestListener} from './http/nodeAdapter'
import {createInMemoryNoteStore, createRouteDefinitions, type NoteStore} from './http/routes'
import {createServerRuntime} from './runtime'

export const serviceName = 'dispatch-server'

export const createDispatchServerApp = ({
  config,
  logger,
  noteStore = createInMemoryNoteStore(),
  now
}: {
  config: ServiceConfig
  logger?: StructuredLogger
  noteStore?: NoteStore
  now?: () => Date
}) => {
  const appLogger =
    logger ??
    createStructuredLogger({
      service: serviceName,
      env: config.nodeEnv,
      level: config.logging.level,
      extraSensitiveKeys: config.logging.redactExtraKeys,
      ...(now ? {now} : {})
    })

  const router = createRouter(createRouteDefinitions({noteStore}))

  const dispatcher = createDispatcher({
    router,
    binderRegistry: createBinderRegistry(),
    defaultCharset: config.defaultCharset,
    unbindableArgumentStatus: config.unbindableArgumentStatus,
    logger: appLogger,
    tracer: config.traceBodyStreams ? createLoggingTracer({logger: appLogger, ...(now ? {now} : {})}) : noopTracer,
    ...(now ? {now} : {})
  })

  const listener = createNodeRequestListener({dispatcher, logger: appLogger})

  const expressApp = express()
  expressApp.disable('x-powered-by')
  expressApp.use(
    helmet({
      contentSecurityPolicy: false
    })
  )
  expressApp.use((request, response) => {
    listener(request, response)
  })

  const server = createServer(expressApp)
  server.keepAliveTimeout = config.keepAliveTimeoutMs

  const runtime = createServerRuntime({server, host: config.host, port: config.port})

  return {
    ...runtime,
    dispatcher,
    router,
    logger: appLogger
  }
}

export type DispatchServerApp = ReturnType<typeof createDispatchServerApp>
