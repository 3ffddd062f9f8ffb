import { createServiceCollector, type HttpMethod } from '@autoroute/shared'
import { InvalidSynthesizerArguments } from '../../errors'
import { createRegistrationEntry, type HandlerSource, type RegistrationEntry } from '../../registry/entry'
import { RouteRegistry } from '../../registry/registry'
import {
  parseServiceInvocation,
  planServiceRegistration,
  synthesizeServiceRegistration,
} from '../service-registration'
import { callRoutine, loadGenerated } from './load-generated'

const eventsSource: HandlerSource = {
  file: 'src/events.ts',
  line: 4,
  column: 3,
  owner: 'EventRoutes',
  exportName: 'EventRoutes',
}

function entry(
  scope: string,
  handlerName: string,
  path: string,
  verb: HttpMethod = 'GET',
  source: HandlerSource = eventsSource
): RegistrationEntry {
  return createRegistrationEntry({ scope, handlerName, path, verb, source })
}

const resolveImport = (source: HandlerSource) => `../${source.file.replace(/\.ts$/, '')}`

describe('parseServiceInvocation', () => {
  it('applies defaults', () => {
    expect(parseServiceInvocation({ moduleKey: '/events' })).toEqual({
      moduleKey: '/events',
      useScope: false,
      exportName: 'registerService',
    })
  })

  it('rejects a missing module key', () => {
    expect(() => parseServiceInvocation({ useScope: true })).toThrow(InvalidSynthesizerArguments)
    expect(() => parseServiceInvocation({ useScope: true })).toThrow(/^Invalid service registration request service registration: moduleKey: /)
  })

  it('rejects a non-boolean useScope and names the invocation', () => {
    expect(() => parseServiceInvocation({ moduleKey: '/events', useScope: 'yes' }, 'services[0]')).toThrow(
      /^Invalid service registration request services\[0\] \(moduleKey "\/events"\): useScope: /
    )
  })

  it('rejects an export name that is not an identifier', () => {
    expect(() => parseServiceInvocation({ moduleKey: '/events', exportName: 'register-all' })).toThrow(
      'exportName: must be a valid identifier'
    )
  })

  it('rejects unknown keys and non-object arguments', () => {
    expect(() => parseServiceInvocation({ moduleKey: '/events', prefix: '/api' })).toThrow(InvalidSynthesizerArguments)
    expect(() => parseServiceInvocation('/events')).toThrow(InvalidSynthesizerArguments)
  })
})

describe('synthesizeServiceRegistration', () => {
  it('emits one scope block with a service call per handler', () => {
    const registry = new RouteRegistry()
    registry.insert('/events', entry('/events', 'searchEvents', '/search'))
    registry.insert('/events', entry('/events', 'createEvent', '', 'POST'))

    const { code } = synthesizeServiceRegistration(registry, { moduleKey: '/events', useScope: true }, { resolveImport })

    expect(code).toBe(
      [
        '// AUTO-GENERATED by autoroute generate',
        "// module key: '/events', scope prefixes: on",
        "import type { ServiceConfig } from '@autoroute/shared'",
        "import { EventRoutes as R0_EventRoutes } from '../src/events'",
        '',
        'export function registerService(cfg: ServiceConfig): void {',
        "  cfg.scope('/events')",
        "    .service({ name: 'searchEvents', method: 'GET', path: '/search', handler: R0_EventRoutes.searchEvents })",
        "    .service({ name: 'createEvent', method: 'POST', path: '', handler: R0_EventRoutes.createEvent })",
        '}',
        '',
      ].join('\n')
    )
  })

  it('registers the planned calls when executed', () => {
    const registry = new RouteRegistry()
    registry.insert('/events', entry('/events', 'searchEvents', '/search'))
    registry.insert('/events', entry('/events', 'createEvent', '', 'POST'))
    const searchEvents = () => 'search'
    const createEvent = () => 'create'

    for (const useScope of [true, false]) {
      const { code } = synthesizeServiceRegistration(registry, { moduleKey: '/events', useScope }, { resolveImport })
      const collector = createServiceCollector()
      const loaded = loadGenerated(code, { '../src/events': { EventRoutes: { searchEvents, createEvent } } })

      callRoutine(loaded, 'registerService', collector.config)

      expect(collector.scopes).toEqual([
        {
          prefix: useScope ? '/events' : '',
          services: [
            { name: 'searchEvents', method: 'GET', path: '/search', handler: searchEvents },
            { name: 'createEvent', method: 'POST', path: '', handler: createEvent },
          ],
        },
      ])
    }
  })

  it('regroups the entries of a module key by their own scope in order of appearance', () => {
    const registry = new RouteRegistry()
    registry.insert('/module', entry('/b', 'first', '/1'))
    registry.insert('/module', entry('/a', 'second', '/2'))
    registry.insert('/module', entry('/b', 'third', '/3'))

    const plan = planServiceRegistration(registry, parseServiceInvocation({ moduleKey: '/module', useScope: true }))

    expect(plan.groups.map((group) => [group.prefix, group.entries.map((e) => e.handlerName)])).toEqual([
      ['/b', ['first', 'third']],
      ['/a', ['second']],
    ])
  })

  it('keeps duplicate registrations', () => {
    const registry = new RouteRegistry()
    const duplicate = entry('/events', 'searchEvents', '/search')
    registry.insert('/events', duplicate)
    registry.insert('/events', duplicate)

    const { plan, code } = synthesizeServiceRegistration(registry, { moduleKey: '/events' }, { resolveImport })

    expect(plan.groups[0].entries).toHaveLength(2)
    expect(code.split('\n').filter((line) => line.startsWith('    .service('))).toHaveLength(2)
  })

  it('imports each class once and default exports by default name', () => {
    const registry = new RouteRegistry()
    const pagesSource: HandlerSource = { file: 'src/pages.ts', line: 2, column: 3, owner: 'Pages', exportName: 'default' }
    registry.insert('/site', entry('/site', 'home', '/', 'GET', pagesSource))
    registry.insert('/site', entry('/site', 'about', '/about', 'GET', pagesSource))
    registry.insert('/site', entry('/site', 'searchEvents', '/search'))
    const home = () => 'home'
    const about = () => 'about'
    const searchEvents = () => 'search'

    const { code } = synthesizeServiceRegistration(
      registry,
      { moduleKey: '/site', exportName: 'registerSite' },
      { resolveImport }
    )

    expect(code).toContain("import R0_Pages from '../src/pages'\nimport { EventRoutes as R1_EventRoutes } from '../src/events'\n")
    const collector = createServiceCollector()
    const loaded = loadGenerated(code, {
      '../src/pages': { __esModule: true, default: { home, about } },
      '../src/events': { EventRoutes: { searchEvents } },
    })
    callRoutine(loaded, 'registerSite', collector.config)
    expect(collector.scopes).toHaveLength(1)
    expect(collector.scopes[0].services.map((service) => service.handler)).toEqual([home, about, searchEvents])
  })

  it('emits an empty routine for a module key without handlers', () => {
    const registry = new RouteRegistry()
    registry.insert('/events', entry('/events', 'searchEvents', '/search'))

    const { plan, code } = synthesizeServiceRegistration(registry, { moduleKey: '/nothing' }, { resolveImport })

    expect(plan.groups).toEqual([])
    expect(code).toContain("export function registerService(cfg: ServiceConfig): void {\n  // no handlers are filed under '/nothing'\n  void cfg\n}\n")
    const collector = createServiceCollector()
    callRoutine(loadGenerated(code, {}), 'registerService', collector.config)
    expect(collector.scopes).toEqual([])
  })

  it('is stable for equal input', () => {
    const build = () => {
      const registry = new RouteRegistry()
      registry.insert('/events', entry('/events', 'searchEvents', '/search'))
      return synthesizeServiceRegistration(registry, { moduleKey: '/events' }, { resolveImport }).code
    }
    expect(build()).toBe(build())
  })

  it('escapes string values', () => {
    const registry = new RouteRegistry()
    registry.insert("/it's", entry("/it's", 'quoted', "/a'b\\c"))

    const { code } = synthesizeServiceRegistration(registry, { moduleKey: "/it's", useScope: true }, { resolveImport })

    expect(code).toContain("  cfg.scope('/it\\'s')\n")
    expect(code).toContain("path: '/a\\'b\\\\c'")
  })

  it('validates arguments before reading the registry', () => {
    const registry = new RouteRegistry()
    expect(() => synthesizeServiceRegistration(registry, { moduleKey: 42 }, { resolveImport })).toThrow(
      InvalidSynthesizerArguments
    )
  })
})
