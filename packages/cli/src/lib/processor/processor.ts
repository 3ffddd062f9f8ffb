import { normalizeHttpMethod, type HttpMethod } from '@autoroute/shared'
import { MissingRouteMetadata, MissingScopeArgument, UnsupportedHandlerDeclaration, type HandlerReference } from '../errors'
import { createRegistrationEntry, handlerReference, type RegistrationEntry } from '../registry/entry'
import type { RouteRegistry } from '../registry/registry'
import { SCOPE_MARKER, type DecoratorMarker, type HandlerDeclaration } from './declarations'

// `delete` is reserved as a binding name, so its marker is exported as `del`
const DELETE_ALIAS = 'del'

export function verbOfMarker(marker: DecoratorMarker): HttpMethod | null {
  if (marker.name.toLowerCase() === DELETE_ALIAS) return 'DELETE'
  return normalizeHttpMethod(marker.name)
}

// Returns the single string literal argument, or why there is none.
function readSingleStringArgument(marker: DecoratorMarker): { value: string } | { problem: string } {
  if (!marker.called) return { problem: `@${marker.name} is used without arguments` }
  if (marker.args.length !== 1) {
    return { problem: `@${marker.name} takes one argument, got ${marker.args.length}` }
  }
  const [argument] = marker.args
  if (argument.kind !== 'string') {
    return { problem: `@${marker.name}(${argument.text}) is not a string literal` }
  }
  return { value: argument.value }
}

function readScope(declaration: HandlerDeclaration, ref: HandlerReference): string {
  const markers = declaration.decorators.filter((marker) => marker.name === SCOPE_MARKER)
  if (markers.length > 1) {
    throw new UnsupportedHandlerDeclaration(ref, `@${SCOPE_MARKER} is applied ${markers.length} times`)
  }
  const [marker] = markers
  const scope = readSingleStringArgument(marker)
  if ('problem' in scope) throw new MissingScopeArgument(ref, scope.problem)
  if (scope.value === '') throw new MissingScopeArgument(ref, `@${SCOPE_MARKER}('') has an empty scope`)
  return scope.value
}

function readRoute(declaration: HandlerDeclaration, ref: HandlerReference): { verb: HttpMethod; path: string } {
  const markers = declaration.decorators.flatMap((marker) => {
    const verb = verbOfMarker(marker)
    return verb ? [{ marker, verb }] : []
  })
  if (markers.length === 0) {
    throw new MissingRouteMetadata(ref, 'no verb marker (get, post, put, delete, patch) found')
  }
  if (markers.length > 1) {
    const names = markers.map(({ marker }) => `@${marker.name}`).join(', ')
    throw new MissingRouteMetadata(ref, `found ${markers.length} verb markers (${names})`)
  }
  const [{ marker, verb }] = markers
  const path = readSingleStringArgument(marker)
  if ('problem' in path) throw new MissingRouteMetadata(ref, path.problem)
  return { verb, path: path.value }
}

function assertRegistrable(declaration: HandlerDeclaration, ref: HandlerReference): string {
  if (!declaration.handlerNameIsIdentifier) {
    throw new UnsupportedHandlerDeclaration(ref, `member name ${declaration.handlerName} is not a plain identifier`)
  }
  if (declaration.memberKind === 'accessor') {
    throw new UnsupportedHandlerDeclaration(ref, 'accessors cannot be registered as handlers')
  }
  if (!declaration.isStatic) {
    throw new UnsupportedHandlerDeclaration(ref, `only static members can be registered; declare it as static ${declaration.handlerName}`)
  }
  if (declaration.exportName === null) {
    throw new UnsupportedHandlerDeclaration(
      ref,
      `class ${declaration.owner} is not exported from the top level of ${declaration.file}`
    )
  }
  return declaration.exportName
}

/**
 * Validates one handler declaration and builds its registration entry.
 * The scope is checked first, then the verb and path, then whether the
 * generated code can reference the handler.
 */
export function extractRegistration(declaration: HandlerDeclaration): RegistrationEntry {
  const ref = handlerReference(declaration, declaration.handlerName)
  const scope = readScope(declaration, ref)
  const { verb, path } = readRoute(declaration, ref)
  const exportName = assertRegistrable(declaration, ref)

  return createRegistrationEntry({
    scope,
    handlerName: declaration.handlerName,
    path,
    verb,
    source: {
      file: declaration.file,
      line: declaration.line,
      column: declaration.column,
      owner: declaration.owner,
      exportName,
    },
  })
}

/**
 * Files exactly one entry under the declaration's scope. A declaration that
 * fails validation throws and inserts nothing.
 */
export function processDeclaration(registry: RouteRegistry, declaration: HandlerDeclaration): RegistrationEntry {
  const entry = extractRegistration(declaration)
  registry.insert(entry.scope, entry)
  return entry
}

export function processDeclarations(
  registry: RouteRegistry,
  declarations: readonly HandlerDeclaration[]
): RegistrationEntry[] {
  return declarations.map((declaration) => processDeclaration(registry, declaration))
}
