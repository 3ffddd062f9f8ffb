import { watch, type FSWatcher } from 'chokidar'
import path from 'node:path'
import { generateRoutes } from './generators'
import { cliLogger } from './helpers/logger'
import type { Resolver } from './resolver'

interface GenerateWatcherOptions {
  resolver: Resolver
  quiet?: boolean
  /** Defaults to 300 ms */
  debounceMs?: number
}

type WatchSet = {
  patterns: string[]
  ignored: string[]
}

const sameWatchSet = (a: WatchSet, b: WatchSet) =>
  a.patterns.join('\n') === b.patterns.join('\n') && a.ignored.join('\n') === b.ignored.join('\n')

const describeError = (error: unknown) => (error instanceof Error ? `${error.name}: ${error.message}` : error)

/**
 * Watches the source directories and the config file and regenerates on
 * change. A config change that moves the source or output directories
 * reopens the watcher on the new set. Resolves once the initial scan is done.
 */
export async function startGenerateWatcher(options: GenerateWatcherOptions): Promise<() => Promise<void>> {
  const { resolver, quiet = false, debounceMs = 300 } = options
  const logger = cliLogger.withPrefix('generate-watcher')
  const rootDir = resolver.getRootDir()
  const configPath = resolver.getConfigPath()

  let debounceTimer: ReturnType<typeof setTimeout> | null = null
  let pendingChanges = new Set<string>()
  let running: Promise<void> = Promise.resolve()

  const log = (msg: string) => {
    if (!quiet) logger.info(msg)
  }

  const scheduleGeneration = (filePath: string) => {
    pendingChanges.add(filePath)
    if (debounceTimer) clearTimeout(debounceTimer)

    debounceTimer = setTimeout(() => {
      const changes = pendingChanges
      pendingChanges = new Set()
      debounceTimer = null
      // passes never overlap
      running = running.then(() => regenerate(changes))
    }, debounceMs)
  }

  const watchSetOf = () => {
    const outputDir = resolver.getOutputDir()
    return {
      patterns: [...resolver.getSourceDirs().map((dir) => path.join(dir, '**/*.{ts,tsx}')), configPath],
      ignored: ['**/node_modules/**', '**/.git/**', '**/__tests__/**', '**/*.generated.ts', `${outputDir}/**`],
    }
  }

  const openWatcher = async (watchSet: WatchSet): Promise<FSWatcher> => {
    const next = watch(watchSet.patterns, {
      persistent: true,
      ignoreInitial: true,
      ignored: watchSet.ignored,
      awaitWriteFinish: {
        stabilityThreshold: 100,
        pollInterval: 50,
      },
    })

    for (const event of ['add', 'change', 'unlink'] as const) {
      next.on(event, (filePath: string) => {
        log(`File ${event === 'unlink' ? 'removed' : event === 'add' ? 'added' : 'changed'}: ${path.relative(rootDir, filePath)}`)
        scheduleGeneration(path.resolve(filePath))
      })
    }

    next.on('error', (error) => {
      logger.error('Watcher error:', error)
    })

    await new Promise<void>((resolve) => next.once('ready', () => resolve()))
    log(`Watching ${watchSet.patterns.length} pattern(s)`)
    return next
  }

  let watchSet = watchSetOf()
  let watcher = await openWatcher(watchSet)
  let stopped = false

  // A config change may move the source or output directories
  const refreshWatchSet = async () => {
    let next: WatchSet
    try {
      next = watchSetOf()
    } catch (error) {
      logger.error('Keeping the previous watch set:', describeError(error))
      return
    }
    if (stopped || sameWatchSet(next, watchSet)) return
    await watcher.close()
    watchSet = next
    watcher = await openWatcher(next)
  }

  async function regenerate(changedFiles: Set<string>): Promise<void> {
    log(`Detected changes in ${changedFiles.size} file(s), regenerating...`)
    try {
      if (changedFiles.has(configPath)) {
        resolver.reload()
        await refreshWatchSet()
      }
      const result = await generateRoutes({ resolver, quiet: true })
      log(`Generation complete: ${result.filesWritten.length} written, ${result.filesUnchanged.length} unchanged`)
    } catch (error) {
      logger.error('Generation failed:', describeError(error))
    }
  }

  return async () => {
    stopped = true
    if (debounceTimer) clearTimeout(debounceTimer)
    await running
    await watcher.close()
    log('Generation watcher stopped')
  }
}
