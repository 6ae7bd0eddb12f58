import * as path from 'node:path'
import ts from 'typescript'
import { UnsupportedDeclarationError } from '../errors.js'
import { locationOf } from '../transform/location.js'

const SOURCE_EXTENSION = /\.(d\.)?[cm]?[jt]sx?$/
const INDEX_MODULE = 'index'

/**
 * Computes the module segments of a source file: its path relative to
 * `rootDir`, without extension, split on `/`. A trailing `index` segment is
 * dropped so `handlers/index.ts` and `handlers.ts` share a path.
 *
 * @param fileName - Absolute source file name, as reported by the compiler
 * @param rootDir - Absolute directory module paths are relative to
 * @returns Module path segments, outermost first
 */
export function moduleSegments(fileName: string, rootDir: string): string[] {
  const relative = path.posix.relative(toPosix(rootDir), toPosix(fileName))
  const inside = relative !== '' && !relative.startsWith('..') && !path.posix.isAbsolute(relative)
  const modulePath = (inside ? relative : path.posix.basename(toPosix(fileName))).replace(SOURCE_EXTENSION, '')

  const segments = modulePath.split('/').filter((segment) => segment !== '' && segment !== '.')
  if (segments.length > 1 && segments[segments.length - 1] === INDEX_MODULE) {
    segments.pop()
  }
  return segments
}

function toPosix(fileName: string): string {
  return fileName.replace(/\\/g, '/')
}

/**
 * Text of a declaration name, when it is statically known.
 */
export function nameText(name: ts.PropertyName | ts.BindingName | undefined): string | undefined {
  if (!name) {
    return undefined
  }
  if (
    ts.isIdentifier(name) ||
    ts.isPrivateIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name) ||
    ts.isNoSubstitutionTemplateLiteral(name)
  ) {
    return name.text
  }
  return undefined
}

/**
 * Name a scope is known by: its own name, or the variable or property it
 * initializes.
 */
function scopeName(node: ts.Node): string | undefined {
  if (
    ts.isFunctionDeclaration(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isClassDeclaration(node) ||
    ts.isModuleDeclaration(node)
  ) {
    return nameText(node.name)
  }
  if (ts.isClassExpression(node) || ts.isFunctionExpression(node) || ts.isArrowFunction(node)) {
    const own = ts.isArrowFunction(node) ? undefined : nameText(node.name)
    if (own !== undefined) {
      return own
    }
    const { parent } = node
    if (ts.isVariableDeclaration(parent) || ts.isPropertyDeclaration(parent) || ts.isPropertyAssignment(parent)) {
      return nameText(parent.name)
    }
    return undefined
  }
  return undefined
}

/**
 * Computes the declaration path of a function: module segments, then the
 * names of enclosing namespaces, classes and functions, then its own name.
 * Anonymous enclosing scopes, such as callbacks, contribute nothing.
 *
 * @param declaration - The function-like node being instrumented
 * @param rootDir - Absolute directory module paths are relative to
 * @returns Declaration path segments, outermost first, or undefined when the
 *   declaration itself has no static name
 */
export function findDeclarationPath(declaration: ts.FunctionLikeDeclaration, rootDir: string): string[] | undefined {
  const own = scopeName(declaration)
  if (own === undefined) {
    return undefined
  }

  const scopes: string[] = [own]
  for (let node: ts.Node = declaration.parent; !ts.isSourceFile(node); node = node.parent) {
    const name = scopeName(node)
    if (name !== undefined) {
      scopes.unshift(name)
    }
  }

  return [...moduleSegments(declaration.getSourceFile().fileName, rootDir), ...scopes]
}

/**
 * Like findDeclarationPath, for declarations whose metric names depend on it.
 *
 * @throws UnsupportedDeclarationError when the declaration has no static name
 */
export function declarationPathOf(declaration: ts.FunctionLikeDeclaration, rootDir: string): string[] {
  const declarationPath = findDeclarationPath(declaration, rootDir)
  if (!declarationPath) {
    throw new UnsupportedDeclarationError(
      'cannot derive a metric name for a declaration without a static name; pass name = "<base>"',
      locationOf(declaration)
    )
  }
  return declarationPath
}
