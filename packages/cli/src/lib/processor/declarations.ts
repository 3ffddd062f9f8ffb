import ts from 'typescript'

export const SCOPE_MARKER = 'autoRegister'

export type DecoratorArgument =
  | { kind: 'string'; value: string }
  | { kind: 'expression'; text: string }

export type DecoratorMarker = {
  /** Last identifier of the decorator callee: `get` for both `@get(...)` and `@route.get(...)` */
  name: string
  /** `false` for a bare `@get` */
  called: boolean
  args: DecoratorArgument[]
}

export type HandlerMemberKind = 'method' | 'property' | 'accessor'

/**
 * A class member carrying an `@autoRegister` decorator, as found in source.
 * Nothing is validated here; see `extractRegistration`.
 */
export type HandlerDeclaration = {
  file: string
  /** Offset of the member (first decorator included) in the file */
  position: number
  line: number
  column: number
  handlerName: string
  handlerNameIsIdentifier: boolean
  memberKind: HandlerMemberKind
  isStatic: boolean
  owner: string
  /** Name the owning class is importable under, `null` when it is not exported from the module */
  exportName: string | null
  decorators: DecoratorMarker[]
}

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined
  return modifiers?.some((modifier) => modifier.kind === kind) ?? false
}

// local name -> exported name, for `export { A as B }` and `export default A`
function collectExportedNames(sourceFile: ts.SourceFile): Map<string, string> {
  const exported = new Map<string, string>()
  for (const statement of sourceFile.statements) {
    if (
      ts.isExportDeclaration(statement) &&
      !statement.moduleSpecifier &&
      !statement.isTypeOnly &&
      statement.exportClause &&
      ts.isNamedExports(statement.exportClause)
    ) {
      for (const element of statement.exportClause.elements) {
        if (element.isTypeOnly) continue
        const local = (element.propertyName ?? element.name).text
        if (!exported.has(local)) exported.set(local, element.name.text)
      }
    } else if (ts.isExportAssignment(statement) && !statement.isExportEquals && ts.isIdentifier(statement.expression)) {
      if (!exported.has(statement.expression.text)) exported.set(statement.expression.text, 'default')
    }
  }
  return exported
}

function classExportName(node: ts.ClassDeclaration, exportedNames: Map<string, string>): string | null {
  if (!ts.isSourceFile(node.parent)) return null
  if (hasModifier(node, ts.SyntaxKind.ExportKeyword)) {
    if (hasModifier(node, ts.SyntaxKind.DefaultKeyword)) return 'default'
    return node.name?.text ?? null
  }
  return node.name ? exportedNames.get(node.name.text) ?? null : null
}

// `const X = class {}` binds the class to X; other class expressions have no binding
function bindingOf(node: ts.ClassExpression): ts.VariableDeclaration | null {
  const parent = node.parent
  if (ts.isVariableDeclaration(parent) && parent.initializer === node && ts.isIdentifier(parent.name)) return parent
  return null
}

function classExpressionExportName(node: ts.ClassExpression, exportedNames: Map<string, string>): string | null {
  let outer: ts.Node = node.parent
  while (ts.isParenthesizedExpression(outer)) outer = outer.parent
  if (ts.isExportAssignment(outer) && !outer.isExportEquals) return 'default'

  const binding = bindingOf(node)
  if (!binding || !ts.isIdentifier(binding.name)) return null
  const statement = binding.parent.parent
  if (!ts.isVariableStatement(statement) || !ts.isSourceFile(statement.parent)) return null
  if (hasModifier(statement, ts.SyntaxKind.ExportKeyword)) return binding.name.text
  return exportedNames.get(binding.name.text) ?? null
}

function classOwner(node: ts.ClassLikeDeclaration): string {
  if (node.name) return node.name.text
  if (ts.isClassExpression(node)) {
    const binding = bindingOf(node)
    if (binding && ts.isIdentifier(binding.name)) return binding.name.text
  }
  return '(anonymous class)'
}

function readArgument(argument: ts.Expression, sourceFile: ts.SourceFile): DecoratorArgument {
  if (ts.isStringLiteral(argument) || ts.isNoSubstitutionTemplateLiteral(argument)) {
    return { kind: 'string', value: argument.text }
  }
  return { kind: 'expression', text: argument.getText(sourceFile) }
}

function readDecorator(decorator: ts.Decorator, sourceFile: ts.SourceFile): DecoratorMarker {
  const expression = decorator.expression
  const call = ts.isCallExpression(expression) ? expression : null
  const callee = call ? call.expression : expression

  let name: string
  if (ts.isIdentifier(callee)) {
    name = callee.text
  } else if (ts.isPropertyAccessExpression(callee)) {
    name = callee.name.text
  } else {
    name = callee.getText(sourceFile)
  }

  return {
    name,
    called: call !== null,
    args: call ? call.arguments.map((argument) => readArgument(argument, sourceFile)) : [],
  }
}

function memberKindOf(member: ts.ClassElement): HandlerMemberKind | null {
  if (ts.isMethodDeclaration(member)) return 'method'
  if (ts.isPropertyDeclaration(member)) return 'property'
  if (ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) return 'accessor'
  return null
}

/**
 * Collects every class member of the file decorated with `@autoRegister`,
 * in source order. Class declarations and class expressions at any depth are
 * visited so that handlers the generated code could not import are still
 * reported instead of skipped.
 */
export function collectHandlerDeclarations(sourceFile: ts.SourceFile, file: string): HandlerDeclaration[] {
  const exportedNames = collectExportedNames(sourceFile)
  const found: HandlerDeclaration[] = []

  const collectFromClass = (node: ts.ClassLikeDeclaration) => {
    const owner = classOwner(node)
    const exportName = ts.isClassDeclaration(node)
      ? classExportName(node, exportedNames)
      : classExpressionExportName(node, exportedNames)

    for (const member of node.members) {
      const memberKind = memberKindOf(member)
      if (!memberKind || !ts.canHaveDecorators(member)) continue
      const markers = (ts.getDecorators(member) ?? []).map((decorator) => readDecorator(decorator, sourceFile))
      if (!markers.some((marker) => marker.name === SCOPE_MARKER)) continue

      const position = member.getStart(sourceFile)
      const { line, character } = sourceFile.getLineAndCharacterOfPosition(position)
      const memberName = member.name
      const handlerNameIsIdentifier = memberName !== undefined && ts.isIdentifier(memberName)

      found.push({
        file,
        position,
        line: line + 1,
        column: character + 1,
        handlerName: memberName ? memberName.getText(sourceFile) : '(anonymous)',
        handlerNameIsIdentifier,
        memberKind,
        isStatic: hasModifier(member, ts.SyntaxKind.StaticKeyword),
        owner,
        exportName,
        decorators: markers,
      })
    }
  }

  const visit = (node: ts.Node) => {
    if (ts.isClassDeclaration(node) || ts.isClassExpression(node)) collectFromClass(node)
    ts.forEachChild(node, visit)
  }
  visit(sourceFile)

  return found.sort((a, b) => a.position - b.position)
}

export function parseHandlerDeclarations(file: string, sourceText: string): HandlerDeclaration[] {
  const scriptKind = file.endsWith('.tsx') ? ts.ScriptKind.TSX : ts.ScriptKind.TS
  const sourceFile = ts.createSourceFile(file, sourceText, ts.ScriptTarget.Latest, true, scriptKind)
  return collectHandlerDeclarations(sourceFile, file)
}
