import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@switchyard/logging'
import {z} from 'zod'

import {createDispatchServerApp, serviceName} from './app'
import {loadConfig} from './config'

export {createDispatchServerApp, serviceName, type DispatchServerApp} from './app'
export {loadConfig, type ServiceConfig} from './config'

const component = 'process.entrypoint'

export const main = async (env: NodeJS.ProcessEnv = process.env) => {
  const config = loadConfig(env)
  const app = createDispatchServerApp({config})

  await app.start()
  app.logger.info({event: 'process.started', component, message: `Listening on ${config.host}:${String(config.port)}`})

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      void app.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          app.logger.error({event: 'process.stop_failed', component, message: `Stop on ${signal} failed`, reason_code: 'stop_failed', metadata: {error}})
          process.exit(1)
        }
      )
    })
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  void main().catch((error: unknown) => {
    const env = z.enum(['development', 'test', 'production']).catch('development').parse(process.env.NODE_ENV)
    createStructuredLogger({service: serviceName, env, level: 'error'}).fatal({
      event: 'process.startup.failed',
      component,
      message: 'Dispatch server startup failed',
      reason_code: 'startup_failed',
      metadata: {error}
    })
    process.exit(1)
  })
}
