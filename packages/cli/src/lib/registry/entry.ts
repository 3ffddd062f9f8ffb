import type { HttpMethod } from '@autoroute/shared'
import type { HandlerReference } from '../errors'

export type HandlerSource = {
  /** Project-relative path, `/`-separated */
  file: string
  /** 1-based */
  line: number
  /** 1-based */
  column: number
  /** Class declaring the handler */
  owner: string
  /** Name the class is exported under, `default` for a default export */
  exportName: string
}

export type RegistrationEntry = Readonly<{
  scope: string
  handlerName: string
  path: string
  verb: HttpMethod
  source: Readonly<HandlerSource>
}>

export function createRegistrationEntry(input: RegistrationEntry): RegistrationEntry {
  return Object.freeze({
    scope: input.scope,
    handlerName: input.handlerName,
    path: input.path,
    verb: input.verb,
    source: Object.freeze({ ...input.source }),
  })
}

export function formatLocation(source: Pick<HandlerSource, 'file' | 'line' | 'column'>): string {
  return `${source.file}:${source.line}:${source.column}`
}

export function handlerReference(source: Pick<HandlerSource, 'file' | 'line' | 'column' | 'owner'>, handlerName: string): HandlerReference {
  return { handler: `${source.owner}.${handlerName}`, location: formatLocation(source) }
}
