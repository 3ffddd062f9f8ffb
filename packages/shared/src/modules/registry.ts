import type { HttpMethod } from '../lib/http'

// Any callable can be registered; the hosting framework decides how to invoke it.
export type RouteHandler = (...args: never[]) => unknown

export type ServiceDefinition<THandler = RouteHandler> = {
  name: string
  method: HttpMethod
  path: string
  handler: THandler
}

export interface ScopeConfig<THandler = RouteHandler> {
  service(definition: ServiceDefinition<THandler>): ScopeConfig<THandler>
}

/**
 * Mutable configuration handle passed to generated registration routines.
 *
 * Generated code calls `cfg.scope(prefix)` once per scope group and then
 * `.service(...)` once per handler of that group, in declaration order.
 * Applications adapt this interface to the HTTP framework they host on.
 */
export interface ServiceConfig<THandler = RouteHandler> {
  scope(prefix: string): ScopeConfig<THandler>
}

export type RegisteredScope<THandler = RouteHandler> = {
  prefix: string
  services: ServiceDefinition<THandler>[]
}

export type ServiceCollector<THandler = RouteHandler> = {
  config: ServiceConfig<THandler>
  scopes: RegisteredScope<THandler>[]
}

/**
 * In-memory `ServiceConfig` that records every scope and service it receives.
 * Useful to mount the collected routes onto a framework in one go, or to
 * inspect what a generated routine registers.
 */
export function createServiceCollector<THandler = RouteHandler>(): ServiceCollector<THandler> {
  const scopes: RegisteredScope<THandler>[] = []

  const config: ServiceConfig<THandler> = {
    scope(prefix) {
      const registered: RegisteredScope<THandler> = { prefix, services: [] }
      scopes.push(registered)
      const scope: ScopeConfig<THandler> = {
        service(definition) {
          registered.services.push(definition)
          return scope
        },
      }
      return scope
    },
  }

  return { config, scopes }
}
