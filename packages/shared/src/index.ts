export { HTTP_METHODS, isHttpMethod, normalizeHttpMethod, type HttpMethod } from './lib/http'

export {
  ROUTE_LISTING_BANNER,
  ROUTE_TABLE_COLUMNS,
  padByCodePointWidth,
  printRouteTable,
  renderTable,
  type RouteRow,
  type TableColumn,
  type TextSink,
} from './lib/table'

export {
  createServiceCollector,
  type RegisteredScope,
  type RouteHandler,
  type ScopeConfig,
  type ServiceCollector,
  type ServiceConfig,
  type ServiceDefinition,
} from './modules/registry'

export { autoRegister, del, get, patch, post, put, route, type RouteDecorator } from './modules/decorators'
