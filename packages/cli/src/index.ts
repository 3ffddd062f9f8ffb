export { run, usage } from './autoroute'
export {
  AutorouteError,
  InvalidConfiguration,
  InvalidSynthesizerArguments,
  LockAcquisitionFailure,
  MissingRouteMetadata,
  MissingScopeArgument,
  UnsupportedHandlerDeclaration,
  isAutorouteError,
  type AutorouteErrorCode,
  type HandlerReference,
} from './lib/errors'
export { CONFIG_FILE_NAME, loadConfig, loadEnvironment, parseConfig, type AutorouteConfig } from './lib/config'
export { createResolver, defaultServiceOutput, type Resolver, type ResolverOptions, type ServiceOutput } from './lib/resolver'
export { RouteRegistry, type RegistrySnapshot } from './lib/registry/registry'
export { createRegistrationEntry, type HandlerSource, type RegistrationEntry } from './lib/registry/entry'
export { parseHandlerDeclarations, type HandlerDeclaration } from './lib/processor/declarations'
export { extractRegistration, processDeclaration, processDeclarations } from './lib/processor/processor'
export { listSourceFiles, scanHandlerDeclarations, type ScanConfig, type ScanResult } from './lib/generators/scanner'
export {
  parseServiceInvocation,
  planServiceRegistration,
  renderServiceRegistration,
  synthesizeServiceRegistration,
  type ServiceGroup,
  type ServiceInvocation,
  type ServiceRegistration,
  type ServiceRegistrationPlan,
} from './lib/generators/service-registration'
export { collectRouteRows, renderRouteListing, synthesizeRouteListing, type RouteListing } from './lib/generators/route-listing'
export { buildRegistry, generateRoutes, type GenerateRoutesOptions } from './lib/generators'
export { startGenerateWatcher } from './lib/generate-watcher'
export type { GeneratorResult } from './lib/utils'
