import fs from 'node:fs'
import path from 'node:path'
import { parseHandlerDeclarations, type HandlerDeclaration } from '../processor/declarations'

export type ScanConfig = {
  rootDir: string
  /** Directories to walk, relative to `rootDir` */
  sourceDirs: readonly string[]
  /** Directories skipped at any depth, relative to `rootDir` (the output directory) */
  excludeDirs?: readonly string[]
  /** Files read at the same time; defaults to 64 */
  readConcurrency?: number
}

export type ScanResult = {
  /** Every scanned file, project-relative and sorted */
  files: string[]
  declarations: HandlerDeclaration[]
}

const SKIPPED_DIR_NAMES = new Set(['node_modules', '__tests__', '__mocks__'])

const isTestFile = (name: string) => /\.(test|spec)\.tsx?$/.test(name)
const isDeclarationFile = (name: string) => name.endsWith('.d.ts')
const isGeneratedFile = (name: string) => /\.generated\.tsx?$/.test(name)

export function isHandlerSourceFile(name: string): boolean {
  if (!name.endsWith('.ts') && !name.endsWith('.tsx')) return false
  return !isTestFile(name) && !isDeclarationFile(name) && !isGeneratedFile(name)
}

function walkDir(dir: string, rel: string[], skip: (absolute: string, name: string) => boolean): string[] {
  const found: string[] = []
  if (!fs.existsSync(dir)) return found
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const absolute = path.join(dir, entry.name)
    if (entry.isDirectory()) {
      if (skip(absolute, entry.name)) continue
      found.push(...walkDir(absolute, [...rel, entry.name], skip))
    } else if (entry.isFile() && isHandlerSourceFile(entry.name)) {
      found.push([...rel, entry.name].join('/'))
    }
  }
  return found
}

// Code-unit order, independent of locale
export function compareRelativePaths(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}

/** Project-relative paths of every handler source file, deduplicated and sorted */
export function listSourceFiles(config: ScanConfig): string[] {
  const excluded = new Set((config.excludeDirs ?? []).map((dir) => path.resolve(config.rootDir, dir)))
  const skip = (absolute: string, name: string) =>
    SKIPPED_DIR_NAMES.has(name) || name.startsWith('.') || excluded.has(absolute)

  const files = new Set<string>()
  for (const sourceDir of config.sourceDirs) {
    const absolute = path.resolve(config.rootDir, sourceDir)
    if (excluded.has(absolute)) continue
    const rel = path.relative(config.rootDir, absolute)
    const prefix = rel === '' ? [] : rel.split(path.sep)
    for (const file of walkDir(absolute, prefix, skip)) files.add(file)
  }
  return Array.from(files).sort(compareRelativePaths)
}

const DEFAULT_READ_CONCURRENCY = 64

// Runs `fn` over `items` in batches of `size`, results in input order
export async function mapInBatches<T, R>(items: readonly T[], size: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = []
  for (let start = 0; start < items.length; start += size) {
    results.push(...(await Promise.all(items.slice(start, start + size).map(fn))))
  }
  return results
}

/**
 * Reads and parses the source files in concurrent batches, then orders the
 * declarations by file path and position so that processing does not depend
 * on which read finished first.
 */
export async function scanHandlerDeclarations(config: ScanConfig): Promise<ScanResult> {
  const files = listSourceFiles(config)
  const batchSize = Math.max(1, Math.floor(config.readConcurrency ?? DEFAULT_READ_CONCURRENCY))
  const perFile = await mapInBatches(files, batchSize, async (file) => {
    const text = await fs.promises.readFile(path.join(config.rootDir, file), 'utf8')
    return parseHandlerDeclarations(file, text)
  })
  const declarations = perFile
    .flat()
    .sort((a, b) => compareRelativePaths(a.file, b.file) || a.position - b.position)
  return { files, declarations }
}
