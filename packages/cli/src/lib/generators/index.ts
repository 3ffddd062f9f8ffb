import fs from 'node:fs'
import path from 'node:path'
import { cliLogger } from '../helpers/logger'
import { processDeclarations } from '../processor/processor'
import { RouteRegistry } from '../registry/registry'
import type { Resolver } from '../resolver'
import {
  calculateChecksum,
  calculateStructureChecksum,
  createGeneratorResult,
  logGenerationResult,
  readChecksumRecord,
  writeChecksumRecord,
  type ChecksumRecord,
  type GeneratorResult,
} from '../utils'
import { synthesizeRouteListing } from './route-listing'
import { scanHandlerDeclarations } from './scanner'
import { synthesizeServiceRegistration } from './service-registration'

export type BuildRegistryResult = {
  registry: RouteRegistry
  /** Every scanned source file, project-relative */
  files: string[]
}

/** Scan and processing phases: a registry holding every handler of the project */
export async function buildRegistry(resolver: Resolver): Promise<BuildRegistryResult> {
  const rootDir = resolver.getRootDir()
  const { files, declarations } = await scanHandlerDeclarations({
    rootDir,
    sourceDirs: resolver.getSourceDirs(),
    excludeDirs: [resolver.getOutputDir()],
  })
  cliLogger.debug(`Scanned ${files.length} file(s), found ${declarations.length} handler declaration(s)`)

  const registry = new RouteRegistry()
  processDeclarations(registry, declarations)
  return { registry, files }
}

type PlannedOutput = {
  outFile: string
  code: string
}

export function checksumFileFor(outFile: string): string {
  return outFile.replace(/\.tsx?$/, '') + '.checksum'
}

export type GenerateRoutesOptions = {
  resolver: Resolver
  quiet?: boolean
}

/**
 * Runs one build pass. Every output is synthesized before the first file is
 * written, so a pass that throws leaves the output directory untouched.
 * Outputs whose content and scanned file list are unchanged are not rewritten.
 */
export async function generateRoutes(options: GenerateRoutesOptions): Promise<GeneratorResult> {
  const { resolver, quiet = false } = options
  const result = createGeneratorResult()

  const { registry, files } = await buildRegistry(resolver)

  const planned: PlannedOutput[] = resolver.getServiceOutputs().map(({ invocation, label, outFile }) => ({
    outFile,
    code: synthesizeServiceRegistration(registry, invocation, {
      label,
      resolveImport: (source) => resolver.getHandlerImportPath(outFile, source),
    }).code,
  }))

  const listingOutFile = resolver.getListingOutFile()
  if (listingOutFile) {
    const { exportName } = resolver.getConfig().listing
    planned.push({ outFile: listingOutFile, code: synthesizeRouteListing(registry, { exportName }).code })
  }

  const structure = calculateStructureChecksum(files)
  for (const { outFile, code } of planned) {
    const checksumFile = checksumFileFor(outFile)
    const checksum: ChecksumRecord = { content: calculateChecksum(code), structure }
    const existing = readChecksumRecord(checksumFile)
    const shouldWrite =
      !existing ||
      existing.content !== checksum.content ||
      existing.structure !== checksum.structure ||
      !fs.existsSync(outFile)

    if (shouldWrite) {
      fs.mkdirSync(path.dirname(outFile), { recursive: true })
      fs.writeFileSync(outFile, code)
      writeChecksumRecord(checksumFile, checksum)
      result.filesWritten.push(outFile)
    } else {
      result.filesUnchanged.push(outFile)
    }
    if (!quiet) logGenerationResult(path.relative(process.cwd(), outFile), shouldWrite)
  }

  return result
}
