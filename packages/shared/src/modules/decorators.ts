/**
 * Route markers read by `autoroute generate`.
 *
 * ```ts
 * import { autoRegister, get } from '@autoroute/shared'
 *
 * export class EventRoutes {
 *   @autoRegister('/events')
 *   @get('/search')
 *   static async searchEvents(req: Request) { ... }
 * }
 * ```
 *
 * The generator reads the decorator arguments from source, so the arguments
 * must be string literals. At run time the decorators leave the method as is.
 */

// Accepts both the TC39 `(value, context)` and the legacy `(target, key, descriptor)` call shapes.
export type RouteDecorator = (...args: unknown[]) => void

const passThrough: RouteDecorator = () => undefined

export function autoRegister(scope: string): RouteDecorator {
  void scope
  return passThrough
}

function verbMarker(path: string): RouteDecorator {
  void path
  return passThrough
}

export const get = (path: string): RouteDecorator => verbMarker(path)
export const post = (path: string): RouteDecorator => verbMarker(path)
export const put = (path: string): RouteDecorator => verbMarker(path)
export const patch = (path: string): RouteDecorator => verbMarker(path)
// `delete` is reserved as a binding name; use `del` or `route.delete`
export const del = (path: string): RouteDecorator => verbMarker(path)

export const route = {
  get,
  post,
  put,
  patch,
  delete: del,
} as const
