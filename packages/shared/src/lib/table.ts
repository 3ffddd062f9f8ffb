import type { HttpMethod } from './http'

export type TableColumn<Row> = {
  header: string
  value: (row: Row) => string
}

export type TextSink = {
  write(chunk: string): unknown
}

export type RouteRow = {
  scope: string
  path: string
  handler: string
  verb: HttpMethod
}

export const ROUTE_LISTING_BANNER = 'List of automatically generated routes'

export const ROUTE_TABLE_COLUMNS: readonly TableColumn<RouteRow>[] = [
  { header: 'Scope', value: (row) => row.scope },
  { header: 'Path', value: (row) => row.path },
  { header: 'Handler', value: (row) => row.handler },
  { header: 'Verb', value: (row) => row.verb },
]

function codePointWidth(value: string): number {
  return Array.from(value).length
}

// String#padEnd counts UTF-16 units, which over-counts astral characters
export function padByCodePointWidth(value: string, width: number): string {
  const missing = width - codePointWidth(value)
  return missing > 0 ? value + ' '.repeat(missing) : value
}

/**
 * Renders rows as an ASCII table and returns its lines:
 *
 * ```
 * +---------+---------+
 * | Scope   | Path    |
 * +---------+---------+
 * | /events | /search |
 * +---------+---------+
 * ```
 *
 * Without rows only the header block is rendered.
 */
export function renderTable<Row>(columns: readonly TableColumn<Row>[], rows: readonly Row[]): string[] {
  const cells = rows.map((row) => columns.map((column) => column.value(row)))
  const widths = columns.map((column, index) =>
    Math.max(codePointWidth(column.header), ...cells.map((rowCells) => codePointWidth(rowCells[index] ?? '')))
  )

  const border = '+' + widths.map((width) => '-'.repeat(width + 2)).join('+') + '+'
  const line = (values: readonly string[]) =>
    '|' + widths.map((width, index) => ` ${padByCodePointWidth(values[index] ?? '', width)} `).join('|') + '|'

  const lines = [border, line(columns.map((column) => column.header)), border]
  if (cells.length) {
    for (const rowCells of cells) lines.push(line(rowCells))
    lines.push(border)
  }
  return lines
}

/**
 * Writes the route listing banner followed by the route table.
 * Generated `listRoutes()` routines call this with their literal rows.
 */
export function printRouteTable(rows: readonly RouteRow[], output: TextSink = process.stdout): void {
  const lines = [ROUTE_LISTING_BANNER, ...renderTable(ROUTE_TABLE_COLUMNS, rows)]
  output.write(lines.join('\n') + '\n')
}
