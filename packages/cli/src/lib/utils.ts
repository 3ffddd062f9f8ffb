import fs from 'node:fs'
import path from 'node:path'
import { createHash } from 'node:crypto'
import { z } from 'zod'
import { cliLogger } from './helpers/logger'

export const GENERATED_HEADER = '// AUTO-GENERATED by autoroute generate'

export type GeneratorResult = {
  filesWritten: string[]
  filesUnchanged: string[]
}

export function createGeneratorResult(): GeneratorResult {
  return { filesWritten: [], filesUnchanged: [] }
}

export function calculateChecksum(content: string): string {
  return createHash('md5').update(content).digest('hex')
}

/** Checksum of the scanned file list, so that renames alone trigger a rewrite */
export function calculateStructureChecksum(files: readonly string[]): string {
  return calculateChecksum([...files].sort().join('\n'))
}

const checksumRecordSchema = z.object({
  content: z.string(),
  structure: z.string(),
})

export type ChecksumRecord = z.infer<typeof checksumRecordSchema>

export function readChecksumRecord(file: string): ChecksumRecord | null {
  if (!fs.existsSync(file)) return null
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'))
  } catch {
    // unreadable record: treat the output as changed
    return null
  }
  const parsed = checksumRecordSchema.safeParse(raw)
  return parsed.success ? parsed.data : null
}

export function writeChecksumRecord(file: string, record: ChecksumRecord): void {
  fs.mkdirSync(path.dirname(file), { recursive: true })
  fs.writeFileSync(file, JSON.stringify(record, null, 2) + '\n')
}

export function toVar(s: string): string {
  return s.replace(/[^a-zA-Z0-9_]/g, '_')
}

/** Single-quoted TypeScript string literal */
export function toStringLiteral(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029')
  return `'${escaped}'`
}

export function logGenerationResult(relativePath: string, written: boolean): void {
  if (written) {
    cliLogger.success(`Generated ${relativePath}`)
  } else {
    cliLogger.debug(`Unchanged ${relativePath}`)
  }
}

/** `path.to.key: message; ...` for every issue of a zod error */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.map(String).join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}
