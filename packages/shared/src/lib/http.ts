export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE']

export function isHttpMethod(value: string): value is HttpMethod {
  return (HTTP_METHODS as readonly string[]).includes(value)
}

/**
 * Uppercases a verb name (`get`, `Post`, `DELETE`) and returns it when it is
 * one of the supported methods, `null` otherwise.
 */
export function normalizeHttpMethod(raw: string | null | undefined): HttpMethod | null {
  if (typeof raw !== 'string') return null
  const normalized = raw.trim().toUpperCase()
  return isHttpMethod(normalized) ? normalized : null
}
