/**
 * CLI argument parsing
 *
 * @example
 * ```ts
 * const { args, positional } = parseCliArgs(rest, {
 *   string: ['root', 'config', 'use-scope'],
 *   boolean: ['watch', 'quiet'],
 *   array: ['module'],
 * })
 * ```
 */

export type ParsedArgs = Record<string, string | boolean | string[]>

export interface ParseArgsOptions {
  /** Keys that take a value */
  string?: string[]
  /** Keys that never take a value */
  boolean?: string[]
  /** Keys that may be repeated, collected in order */
  array?: string[]
  /** Short aliases, e.g. `{ r: 'root' }` */
  alias?: Record<string, string>
}

export interface ParseArgsResult {
  args: ParsedArgs
  /** Non-flag values in order */
  positional: string[]
}

/**
 * Parse an argv-like array.
 *
 * Supports `--name=value`, `--name value`, `--flag`, `-n value`, combined
 * short booleans (`-qw`) and repeated array keys. A long flag followed by
 * another flag (or nothing) is `true`.
 */
export function parseCliArgs(argv: string[], options: ParseArgsOptions = {}): ParseArgsResult {
  const args: ParsedArgs = {}
  const positional: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (!arg) continue

    if (arg.startsWith('--')) {
      const longArg = arg.slice(2)
      const equalIndex = longArg.indexOf('=')

      if (equalIndex !== -1) {
        setArgValue(args, longArg.slice(0, equalIndex), longArg.slice(equalIndex + 1), options)
        continue
      }

      const key = longArg
      const nextArg = argv[i + 1]
      if (options.boolean?.includes(key)) {
        args[key] = true
      } else if (nextArg && !nextArg.startsWith('-')) {
        setArgValue(args, key, nextArg, options)
        i++
      } else {
        args[key] = true
      }
      continue
    }

    if (arg.startsWith('-') && arg.length > 1) {
      const shortFlags = arg.slice(1)

      for (let j = 0; j < shortFlags.length; j++) {
        const shortFlag = shortFlags.charAt(j)
        const key = options.alias?.[shortFlag] ?? shortFlag

        if (j < shortFlags.length - 1) {
          args[key] = true
          continue
        }
        // only the last flag of a group can take a value
        const nextArg = argv[i + 1]
        if (nextArg && !nextArg.startsWith('-') && !options.boolean?.includes(key)) {
          setArgValue(args, key, nextArg, options)
          i++
        } else {
          args[key] = true
        }
      }
      continue
    }

    positional.push(arg)
  }

  return { args, positional }
}

function setArgValue(args: ParsedArgs, key: string, value: string, options: ParseArgsOptions): void {
  if (!options.array?.includes(key)) {
    args[key] = value
    return
  }
  const existing = args[key]
  if (Array.isArray(existing)) {
    existing.push(value)
  } else {
    args[key] = [value]
  }
}

/** String value of a flag, `undefined` when absent or given without a value */
export function readStringArg(args: ParsedArgs, key: string): string | undefined {
  const value = args[key]
  return typeof value === 'string' ? value : undefined
}

/** All values of a repeatable flag */
export function readStringArrayArg(args: ParsedArgs, key: string): string[] {
  const value = args[key]
  if (Array.isArray(value)) return value
  return typeof value === 'string' ? [value] : []
}

export function buildUsage(command: string, options: ParseArgsOptions): string {
  const parts = [command]

  for (const key of options.string ?? []) {
    parts.push(`[--${key} <value>]`)
  }
  for (const key of options.array ?? []) {
    parts.push(`[--${key} <value>]...`)
  }
  for (const key of options.boolean ?? []) {
    parts.push(`[--${key}]`)
  }

  return parts.join(' ')
}
