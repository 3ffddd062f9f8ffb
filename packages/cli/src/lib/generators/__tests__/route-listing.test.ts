import { printRouteTable, type HttpMethod, type RouteRow, type TextSink } from '@autoroute/shared'
import { createRegistrationEntry, type RegistrationEntry } from '../../registry/entry'
import { InvalidConfiguration } from '../../errors'
import { RouteRegistry } from '../../registry/registry'
import { collectRouteRows, synthesizeRouteListing } from '../route-listing'
import { callRoutine, loadGenerated } from './load-generated'

function entry(scope: string, handlerName: string, path: string, verb: HttpMethod = 'GET'): RegistrationEntry {
  return createRegistrationEntry({
    scope,
    handlerName,
    path,
    verb,
    source: { file: 'src/routes.ts', line: 1, column: 1, owner: 'Routes', exportName: 'Routes' },
  })
}

describe('collectRouteRows', () => {
  it('emits one row per entry, scopes in filing order', () => {
    const registry = new RouteRegistry()
    registry.insert('/b', entry('/b', 'one', '/1'))
    registry.insert('/a', entry('/a', 'two', '/2'))
    registry.insert('/b', entry('/b', 'three', '/3'))

    expect(collectRouteRows(registry)).toEqual([
      { scope: '/b', path: '/1', handler: 'one', verb: 'GET' },
      { scope: '/b', path: '/3', handler: 'three', verb: 'GET' },
      { scope: '/a', path: '/2', handler: 'two', verb: 'GET' },
    ])
  })

  it('keeps duplicates', () => {
    const registry = new RouteRegistry()
    const duplicate = entry('/events', 'searchEvents', '/search')
    registry.insert('/events', duplicate)
    registry.insert('/events', duplicate)
    expect(collectRouteRows(registry)).toHaveLength(2)
  })

  it('lists exactly the filed entries for any spread of scopes', () => {
    const spreads: Array<Array<[string, string]>> = [
      [],
      [['/events', 'a']],
      [['/events', 'a'], ['/events', 'b'], ['/events', 'c']],
      [['/a', 'one'], ['/b', 'two'], ['/c', 'three']],
      [['/b', 'one'], ['/a', 'two'], ['/b', 'three'], ['/c', 'four'], ['/a', 'five'], ['/b', 'one']],
    ]
    const key = (row: RouteRow) => `${row.scope} ${row.verb} ${row.path} ${row.handler}`

    for (const spread of spreads) {
      const registry = new RouteRegistry()
      const expected: RouteRow[] = []
      for (const [scope, handler] of spread) {
        registry.insert(scope, entry(scope, handler, `/${handler}`, 'POST'))
        expected.push({ scope, path: `/${handler}`, handler, verb: 'POST' })
      }

      const rows = collectRouteRows(registry)
      expect(rows.map(key).sort()).toEqual(expected.map(key).sort())
      expect(synthesizeRouteListing(registry).rows).toEqual(rows)
    }
  })
})

describe('synthesizeRouteListing', () => {
  it('emits literal rows and a routine printing them', () => {
    const registry = new RouteRegistry()
    registry.insert('/events', entry('/events', 'searchEvents', '/search'))

    const { rows, code } = synthesizeRouteListing(registry)

    expect(rows).toHaveLength(1)
    expect(code).toBe(
      [
        '// AUTO-GENERATED by autoroute generate',
        "import { printRouteTable, type RouteRow } from '@autoroute/shared'",
        '',
        'const routes: RouteRow[] = [',
        "  { scope: '/events', path: '/search', handler: 'searchEvents', verb: 'GET' },",
        ']',
        '',
        'export function listRoutes(): void {',
        '  printRouteTable(routes)',
        '}',
        '',
      ].join('\n')
    )
  })

  it('emits an empty table for an empty registry', () => {
    const { rows, code } = synthesizeRouteListing(new RouteRegistry(), { exportName: 'printAll' })
    expect(rows).toEqual([])
    expect(code).toContain('const routes: RouteRow[] = []\n')
    expect(code).toContain('export function printAll(): void {')
  })

  it('rejects an export name that is not an identifier', () => {
    expect(() => synthesizeRouteListing(new RouteRegistry(), { exportName: 'list routes' })).toThrow(InvalidConfiguration)
  })

  it('prints the banner and the table when the generated routine runs', () => {
    const registry = new RouteRegistry()
    registry.insert('/events', entry('/events', 'searchEvents', '/search'))
    registry.insert('/admin', entry('/admin', 'deleteUser', '/users/:id', 'DELETE'))
    const printed: string[] = []
    const sink: TextSink = { write: (chunk: string) => printed.push(chunk) }

    const loaded = loadGenerated(synthesizeRouteListing(registry).code, {
      '@autoroute/shared': { printRouteTable: (rows: readonly RouteRow[]) => printRouteTable(rows, sink) },
    })
    callRoutine(loaded, 'listRoutes')

    expect(printed).toEqual([
      [
        'List of automatically generated routes',
        '+---------+------------+--------------+--------+',
        '| Scope   | Path       | Handler      | Verb   |',
        '+---------+------------+--------------+--------+',
        '| /events | /search    | searchEvents | GET    |',
        '| /admin  | /users/:id | deleteUser   | DELETE |',
        '+---------+------------+--------------+--------+',
        '',
      ].join('\n'),
    ])
  })

  it('prints only the header block for an empty registry', () => {
    const printed: string[] = []
    const sink: TextSink = { write: (chunk: string) => printed.push(chunk) }

    const loaded = loadGenerated(synthesizeRouteListing(new RouteRegistry()).code, {
      '@autoroute/shared': { printRouteTable: (rows: readonly RouteRow[]) => printRouteTable(rows, sink) },
    })
    callRoutine(loaded, 'listRoutes')

    expect(printed.join('')).toBe(
      'List of automatically generated routes\n+-------+------+---------+------+\n| Scope | Path | Handler | Verb |\n+-------+------+---------+------+\n'
    )
  })
})
