import ts from 'typescript'

// Transpiles generated code to CommonJS and returns its exports
export function loadGenerated(code: string, modules: Record<string, unknown>): Record<string, unknown> {
  const { outputText } = ts.transpileModule(code, {
    compilerOptions: { module: ts.ModuleKind.CommonJS, target: ts.ScriptTarget.ES2020, esModuleInterop: true },
  })
  const moduleExports: Record<string, unknown> = {}
  const fakeRequire = (specifier: string) => {
    if (!(specifier in modules)) throw new Error(`unexpected import ${specifier}`)
    return modules[specifier]
  }
  new Function('require', 'exports', outputText)(fakeRequire, moduleExports)
  return moduleExports
}

export function callRoutine(loaded: Record<string, unknown>, name: string, ...args: unknown[]): void {
  const routine = loaded[name]
  if (typeof routine !== 'function') throw new Error(`${name} is not exported`)
  routine(...args)
}
