import { printRouteTable, type TextSink } from '@autoroute/shared'
import path from 'node:path'
import { loadEnvironment } from './lib/config'
import { isAutorouteError } from './lib/errors'
import { startGenerateWatcher } from './lib/generate-watcher'
import { buildRegistry, generateRoutes } from './lib/generators'
import { collectRouteRows } from './lib/generators/route-listing'
import {
  buildUsage,
  cliLogger,
  parseCliArgs,
  readStringArg,
  readStringArrayArg,
  type ParseArgsOptions,
  type ParsedArgs,
} from './lib/helpers'
import { createResolver, type Resolver } from './lib/resolver'

const GENERATE_OPTIONS: ParseArgsOptions = {
  string: ['root', 'config', 'use-scope'],
  array: ['module'],
  boolean: ['watch', 'quiet'],
  alias: { r: 'root', c: 'config', m: 'module', w: 'watch', q: 'quiet' },
}

const ROUTES_OPTIONS: ParseArgsOptions = {
  string: ['root', 'config'],
  alias: { r: 'root', c: 'config' },
}

export function usage(): string {
  return [
    'Usage: autoroute <command> [options]',
    '',
    'Commands:',
    `  ${buildUsage('generate', GENERATE_OPTIONS)}`,
    '      Scan handlers and write the registration and listing modules',
    `  ${buildUsage('routes', ROUTES_OPTIONS)}`,
    '      Print the table of discovered routes',
    '  help',
    '      Show this message',
  ].join('\n')
}

// `--use-scope` alone means true; values other than true/false are left for validation to reject
function readUseScope(args: ParsedArgs): unknown {
  const raw = args['use-scope']
  if (raw === undefined) return undefined
  if (raw === true || raw === 'true') return true
  if (raw === 'false') return false
  return raw
}

function resolverFor(args: ParsedArgs, extraServices: unknown[] = []): Resolver {
  const root = path.resolve(readStringArg(args, 'root') ?? process.cwd())
  return createResolver(root, { configPath: readStringArg(args, 'config'), extraServices })
}

function rejectPositional(command: string, positional: string[]): boolean {
  if (positional.length === 0) return false
  cliLogger.error(`Unexpected argument(s) for ${command}: ${positional.join(' ')}`)
  return true
}

async function generateCommand(rest: string[]): Promise<number> {
  const { args, positional } = parseCliArgs(rest, GENERATE_OPTIONS)
  if (rejectPositional('generate', positional)) return 1
  const useScope = readUseScope(args)
  const modules = readStringArrayArg(args, 'module')
  if (useScope !== undefined && modules.length === 0) {
    cliLogger.warn('--use-scope only applies to --module requests and is ignored')
  }
  const extraServices = modules.map((moduleKey) => (useScope === undefined ? { moduleKey } : { moduleKey, useScope }))
  const resolver = resolverFor(args, extraServices)
  const quiet = args.quiet === true

  const result = await generateRoutes({ resolver, quiet })
  if (!quiet) {
    cliLogger.info(`${result.filesWritten.length} file(s) written, ${result.filesUnchanged.length} unchanged`)
  }

  if (args.watch === true) {
    const stop = await startGenerateWatcher({ resolver, quiet })
    process.once('SIGINT', () => {
      stop().then(
        () => process.exit(0),
        (error: unknown) => {
          cliLogger.error('Failed to stop the watcher:', error)
          process.exit(1)
        }
      )
    })
  }
  return 0
}

async function routesCommand(rest: string[], output: TextSink): Promise<number> {
  const { args, positional } = parseCliArgs(rest, ROUTES_OPTIONS)
  if (rejectPositional('routes', positional)) return 1
  const { registry } = await buildRegistry(resolverFor(args))
  printRouteTable(collectRouteRows(registry), output)
  return 0
}

/**
 * Runs one CLI invocation and resolves to its exit code. Build errors are
 * logged and give 1; anything else is rethrown.
 */
export async function run(argv: string[] = process.argv, output: TextSink = process.stdout): Promise<number> {
  const [, , command, ...rest] = argv

  try {
    const { AUTOROUTE_LOG_LEVEL } = loadEnvironment()
    if (AUTOROUTE_LOG_LEVEL) cliLogger.configure({ level: AUTOROUTE_LOG_LEVEL })

    switch (command) {
      case 'generate':
        return await generateCommand(rest)
      case 'routes':
        return await routesCommand(rest, output)
      case undefined:
      case 'help':
      case '--help':
      case '-h':
        output.write(usage() + '\n')
        return 0
      default:
        cliLogger.error(`Unknown command "${command}"`)
        output.write(usage() + '\n')
        return 1
    }
  } catch (error) {
    if (isAutorouteError(error)) {
      cliLogger.error(`${error.name}: ${error.message}`)
      return 1
    }
    throw error
  }
}
