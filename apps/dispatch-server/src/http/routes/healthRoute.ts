import type {RouteDefinition} from '@switchyard/router'

export const healthRoute: RouteDefinition = {
  method: 'GET',
  path: '/healthz',
  declaringType: 'HealthRoutes',
  handler: () => ({status: 'ok'})
}
