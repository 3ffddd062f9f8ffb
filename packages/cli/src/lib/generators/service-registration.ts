import { z } from 'zod'
import { InvalidSynthesizerArguments } from '../errors'
import type { HandlerSource, RegistrationEntry } from '../registry/entry'
import type { RouteRegistry } from '../registry/registry'
import { GENERATED_HEADER, formatZodIssues, toStringLiteral, toVar } from '../utils'

export const exportNameSchema = z
  .string()
  .regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, 'must be a valid identifier')

export const serviceInvocationSchema = z.strictObject({
  moduleKey: z.string().min(1, 'must not be empty'),
  useScope: z.boolean().default(false),
  exportName: exportNameSchema.default('registerService'),
  /** File name under the output directory */
  output: z.string().min(1).optional(),
})

export type ServiceInvocationInput = z.input<typeof serviceInvocationSchema>
export type ServiceInvocation = z.output<typeof serviceInvocationSchema>

function describeInvocation(raw: unknown, label: string): string {
  if (typeof raw === 'object' && raw !== null && 'moduleKey' in raw && typeof raw.moduleKey === 'string') {
    return `${label} (moduleKey ${JSON.stringify(raw.moduleKey)})`
  }
  return label
}

/** Validates service registration arguments coming from config files or CLI flags */
export function parseServiceInvocation(raw: unknown, label = 'service registration'): ServiceInvocation {
  const parsed = serviceInvocationSchema.safeParse(raw)
  if (!parsed.success) {
    throw new InvalidSynthesizerArguments(describeInvocation(raw, label), formatZodIssues(parsed.error))
  }
  return parsed.data
}

export type ServiceGroup = {
  scope: string
  /** Argument of `cfg.scope(...)`: the scope, or `''` without `useScope` */
  prefix: string
  entries: RegistrationEntry[]
}

export type ServiceRegistrationPlan = {
  moduleKey: string
  useScope: boolean
  exportName: string
  groups: ServiceGroup[]
}

/**
 * Groups the entries filed under the module key by their own scope, in order
 * of first appearance. Duplicate entries are kept.
 */
export function planServiceRegistration(registry: RouteRegistry, invocation: ServiceInvocation): ServiceRegistrationPlan {
  const grouped = new Map<string, RegistrationEntry[]>()
  for (const entry of registry.snapshotFor(invocation.moduleKey)) {
    const list = grouped.get(entry.scope)
    if (list) {
      list.push(entry)
    } else {
      grouped.set(entry.scope, [entry])
    }
  }

  return {
    moduleKey: invocation.moduleKey,
    useScope: invocation.useScope,
    exportName: invocation.exportName,
    groups: Array.from(grouped, ([scope, entries]) => ({
      scope,
      prefix: invocation.useScope ? scope : '',
      entries,
    })),
  }
}

/** Module specifier the generated file imports a handler's class from */
export type HandlerImportResolver = (source: HandlerSource) => string

export function renderServiceRegistration(plan: ServiceRegistrationPlan, resolveImport: HandlerImportResolver): string {
  const imports: string[] = []
  const locals = new Map<string, string>()

  const localFor = (source: HandlerSource): string => {
    const specifier = resolveImport(source)
    const key = `${specifier}#${source.exportName}`
    const known = locals.get(key)
    if (known) return known

    const local = `R${locals.size}_${toVar(source.owner)}`
    locals.set(key, local)
    imports.push(
      source.exportName === 'default'
        ? `import ${local} from ${toStringLiteral(specifier)}`
        : `import { ${source.exportName} as ${local} } from ${toStringLiteral(specifier)}`
    )
    return local
  }

  const blocks = plan.groups.map((group) => {
    const services = group.entries.map(
      (entry) =>
        `    .service({ name: ${toStringLiteral(entry.handlerName)}, method: ${toStringLiteral(entry.verb)}, ` +
        `path: ${toStringLiteral(entry.path)}, handler: ${localFor(entry.source)}.${entry.handlerName} })`
    )
    return [`  cfg.scope(${toStringLiteral(group.prefix)})`, ...services].join('\n')
  })

  const body = blocks.length
    ? blocks.join('\n')
    : `  // no handlers are filed under ${toStringLiteral(plan.moduleKey)}\n  void cfg`

  return [
    GENERATED_HEADER,
    `// module key: ${toStringLiteral(plan.moduleKey)}, scope prefixes: ${plan.useScope ? 'on' : 'off'}`,
    `import type { ServiceConfig } from '@autoroute/shared'`,
    ...imports,
    '',
    `export function ${plan.exportName}(cfg: ServiceConfig): void {`,
    body,
    '}',
    '',
  ].join('\n')
}

export type ServiceRegistration = {
  plan: ServiceRegistrationPlan
  code: string
}

export type SynthesizeServiceOptions = {
  resolveImport: HandlerImportResolver
  /** Names the request in error messages, e.g. `services[0]` */
  label?: string
}

/**
 * Emits the registration routine for one module key. `args` is validated
 * first; invalid arguments throw `InvalidSynthesizerArguments`.
 */
export function synthesizeServiceRegistration(
  registry: RouteRegistry,
  args: unknown,
  options: SynthesizeServiceOptions
): ServiceRegistration {
  const invocation = parseServiceInvocation(args, options.label)
  const plan = planServiceRegistration(registry, invocation)
  return { plan, code: renderServiceRegistration(plan, options.resolveImport) }
}
