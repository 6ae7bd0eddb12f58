import type ts from 'typescript'
import type { SourceLocation } from '../errors.js'

/**
 * Resolves the 1-based position of a parse tree node.
 *
 * @param node - A node of the original source file
 * @returns File name, line and column of the node's first token
 */
export function locationOf(node: ts.Node): SourceLocation {
  const sourceFile = node.getSourceFile()
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile))
  return { fileName: sourceFile.fileName, line: line + 1, column: character + 1 }
}
