import path from 'node:path'
import { CONFIG_FILE_NAME, loadConfig, type AutorouteConfig } from './config'
import { InvalidConfiguration } from './errors'
import { parseServiceInvocation, type ServiceInvocation } from './generators/service-registration'
import type { HandlerSource } from './registry/entry'

export type ServiceOutput = {
  invocation: ServiceInvocation
  /** Names the request in error messages */
  label: string
  outFile: string
}

export type ResolverOptions = {
  /** Config file, relative to the root; defaults to `autoroute.config.json` */
  configPath?: string
  /** Extra service invocations, e.g. from `--module`, validated like config items */
  extraServices?: readonly unknown[]
}

export interface Resolver {
  getRootDir(): string
  getConfigPath(): string
  getConfig(): AutorouteConfig
  /** Drops the cached config so that the next call reads the file again */
  reload(): void
  getSourceDirs(): string[]
  getOutputDir(): string
  getServiceOutputs(): ServiceOutput[]
  /** `null` when the listing is disabled */
  getListingOutFile(): string | null
  /** Module specifier `outFile` imports the handler's class from */
  getHandlerImportPath(outFile: string, source: HandlerSource): string
}

const SOURCE_EXTENSION = /\.tsx?$/

export function defaultServiceOutput(moduleKey: string): string {
  const slug = moduleKey
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
  return `${slug || 'root'}.services.generated.ts`
}

function toPosix(value: string): string {
  return value.split(path.sep).join('/')
}

export function createResolver(cwd: string = process.cwd(), options: ResolverOptions = {}): Resolver {
  const rootDir = path.resolve(cwd)
  const configPath = path.resolve(rootDir, options.configPath ?? CONFIG_FILE_NAME)
  let cached: AutorouteConfig | null = null

  const getConfig = (): AutorouteConfig => {
    if (!cached) cached = loadConfig(configPath, { explicit: options.configPath !== undefined })
    return cached
  }

  const getOutputDir = () => path.resolve(rootDir, getConfig().outputDir)

  const getListingOutFile = (): string | null => {
    const { listing } = getConfig()
    return listing.enabled ? path.resolve(getOutputDir(), listing.output) : null
  }

  const getServiceOutputs = (): ServiceOutput[] => {
    const config = getConfig()
    const outputDir = getOutputDir()
    const requested = [
      ...config.services.map((invocation, index) => ({ invocation, label: `services[${index}]` })),
      ...(options.extraServices ?? []).map((raw, index) => {
        const label = `--module #${index + 1}`
        return { invocation: parseServiceInvocation(raw, label), label }
      }),
    ]

    const owners = new Map<string, string>()
    const listingOutFile = getListingOutFile()
    if (listingOutFile) owners.set(listingOutFile, 'listing')

    return requested.map(({ invocation, label }) => {
      const outFile = path.resolve(outputDir, invocation.output ?? defaultServiceOutput(invocation.moduleKey))
      const owner = owners.get(outFile)
      if (owner) {
        throw new InvalidConfiguration(
          configPath,
          `${label} and ${owner} both write ${toPosix(path.relative(rootDir, outFile))}`
        )
      }
      owners.set(outFile, label)
      return { invocation, label, outFile }
    })
  }

  return {
    getRootDir: () => rootDir,
    getConfigPath: () => configPath,
    getConfig,
    reload: () => {
      cached = null
    },
    getSourceDirs: () => getConfig().sourceDirs.map((dir) => path.resolve(rootDir, dir)),
    getOutputDir,
    getServiceOutputs,
    getListingOutFile,
    getHandlerImportPath: (outFile, source) => {
      const withoutExtension = source.file.replace(SOURCE_EXTENSION, '')
      const { importBase } = getConfig()
      if (importBase) return `${importBase.replace(/\/+$/, '')}/${withoutExtension}`

      const relative = toPosix(path.relative(path.dirname(outFile), path.resolve(rootDir, withoutExtension)))
      return relative.startsWith('.') ? relative : `./${relative}`
    },
  }
}
