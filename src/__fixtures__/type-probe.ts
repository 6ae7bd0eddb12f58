/**
 * Test helpers that resolve types of declarations in a source text.
 */

import ts from 'typescript'
import { createSourceProgram } from '../transform/program.js'
import { DEFAULT_WEAVE_COMPILER_OPTIONS } from '../transform/weave.js'

export interface TypeProbe {
  checker: ts.TypeChecker
  sourceFile: ts.SourceFile

  /**
   * Declared type of a type alias or interface.
   */
  aliasType(name: string): { type: ts.Type; location: ts.Node }
}

/**
 * Builds a program around `sourceText` for type queries.
 */
export function probeTypes(sourceText: string, fileName = '/probe/probe.ts'): TypeProbe {
  const { program, sourceFile } = createSourceProgram(sourceText, fileName, DEFAULT_WEAVE_COMPILER_OPTIONS)
  const checker = program.getTypeChecker()

  return {
    checker,
    sourceFile,
    aliasType(name) {
      const declaration = sourceFile.statements.find(
        (statement): statement is ts.TypeAliasDeclaration | ts.InterfaceDeclaration =>
          (ts.isTypeAliasDeclaration(statement) || ts.isInterfaceDeclaration(statement)) && statement.name.text === name
      )
      if (!declaration) {
        throw new Error(`no type named ${name}`)
      }
      return { type: checker.getTypeAtLocation(declaration.name), location: declaration }
    },
  }
}

/**
 * Finds the first node in a tree that satisfies a guard.
 */
export function findNode<T extends ts.Node>(root: ts.Node, guard: (node: ts.Node) => node is T): T {
  let found: T | undefined
  const visit = (node: ts.Node): void => {
    if (found) {
      return
    }
    if (guard(node)) {
      found = node
      return
    }
    ts.forEachChild(node, visit)
  }
  visit(root)
  if (!found) {
    throw new Error('no matching node')
  }
  return found
}
