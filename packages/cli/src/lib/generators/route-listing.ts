import type { RouteRow } from '@autoroute/shared'
import { InvalidConfiguration } from '../errors'
import type { RouteRegistry } from '../registry/registry'
import { GENERATED_HEADER, formatZodIssues, toStringLiteral } from '../utils'
import { exportNameSchema } from './service-registration'

/** One row per registered entry, scopes in filing order */
export function collectRouteRows(registry: RouteRegistry): RouteRow[] {
  const rows: RouteRow[] = []
  for (const [scope, entries] of registry.snapshotAll()) {
    for (const entry of entries) {
      rows.push({ scope, path: entry.path, handler: entry.handlerName, verb: entry.verb })
    }
  }
  return rows
}

export function renderRouteListing(rows: readonly RouteRow[], exportName: string): string {
  const literalRows = rows.map(
    (row) =>
      `  { scope: ${toStringLiteral(row.scope)}, path: ${toStringLiteral(row.path)}, ` +
      `handler: ${toStringLiteral(row.handler)}, verb: ${toStringLiteral(row.verb)} },`
  )
  const routes = literalRows.length ? ['const routes: RouteRow[] = [', ...literalRows, ']'] : ['const routes: RouteRow[] = []']

  return [
    GENERATED_HEADER,
    `import { printRouteTable, type RouteRow } from '@autoroute/shared'`,
    '',
    ...routes,
    '',
    `export function ${exportName}(): void {`,
    '  printRouteTable(routes)',
    '}',
    '',
  ].join('\n')
}

export type RouteListing = {
  rows: RouteRow[]
  code: string
}

export function synthesizeRouteListing(registry: RouteRegistry, options: { exportName?: string } = {}): RouteListing {
  const exportName = exportNameSchema.safeParse(options.exportName ?? 'listRoutes')
  if (!exportName.success) {
    throw new InvalidConfiguration('listing.exportName', formatZodIssues(exportName.error))
  }
  const rows = collectRouteRows(registry)
  return { rows, code: renderRouteListing(rows, exportName.data) }
}
