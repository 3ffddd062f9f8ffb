import fs from 'node:fs'
import { z } from 'zod'
import { InvalidConfiguration } from './errors'
import { exportNameSchema, parseServiceInvocation, type ServiceInvocation } from './generators/service-registration'
import { formatZodIssues } from './utils'

export const CONFIG_FILE_NAME = 'autoroute.config.json'

export const DEFAULT_LISTING = {
  enabled: true,
  output: 'routes.list.generated.ts',
  exportName: 'listRoutes',
} as const

const listingSchema = z.strictObject({
  enabled: z.boolean().default(DEFAULT_LISTING.enabled),
  output: z.string().min(1).default(DEFAULT_LISTING.output),
  exportName: exportNameSchema.default(DEFAULT_LISTING.exportName),
})

// Service items are validated one by one so their errors name the invocation
const configSchema = z.strictObject({
  sourceDirs: z.array(z.string().min(1)).min(1).default(['src']),
  outputDir: z.string().min(1).default('generated'),
  /** Import prefix mapped to the project root, e.g. `@` for `@/src/events` */
  importBase: z.string().min(1).optional(),
  services: z.array(z.unknown()).default([]),
  listing: listingSchema.default({ ...DEFAULT_LISTING }),
})

export type ListingConfig = z.output<typeof listingSchema>

export type AutorouteConfig = Omit<z.output<typeof configSchema>, 'services'> & {
  services: ServiceInvocation[]
}

export function parseConfig(raw: unknown, source: string): AutorouteConfig {
  const parsed = configSchema.safeParse(raw)
  if (!parsed.success) {
    throw new InvalidConfiguration(source, formatZodIssues(parsed.error))
  }
  return {
    ...parsed.data,
    services: parsed.data.services.map((item, index) =>
      parseServiceInvocation(item, `services[${index}] in ${source}`)
    ),
  }
}

/**
 * Loads the config file. A missing file yields the defaults unless it was
 * asked for explicitly.
 */
export function loadConfig(configPath: string, options: { explicit?: boolean } = {}): AutorouteConfig {
  if (!fs.existsSync(configPath)) {
    if (options.explicit) throw new InvalidConfiguration(configPath, 'file not found')
    return parseConfig({}, configPath)
  }

  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new InvalidConfiguration(configPath, `not valid JSON (${reason})`)
  }
  return parseConfig(raw, configPath)
}

const environmentSchema = z.object({
  AUTOROUTE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
})

export type AutorouteEnvironment = z.output<typeof environmentSchema>

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): AutorouteEnvironment {
  const parsed = environmentSchema.safeParse(env)
  if (!parsed.success) {
    throw new InvalidConfiguration('environment', formatZodIssues(parsed.error))
  }
  return parsed.data
}
