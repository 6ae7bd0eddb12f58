/**
 * Error types for metric-weaver.
 *
 * Everything here is raised at build time, while annotated declarations are
 * being rewritten. The generated wrappers never throw errors of their own.
 */

/**
 * Position of an annotation or declaration in a source file.
 * Line and column are 1-based.
 */
export interface SourceLocation {
  fileName: string
  line: number
  column: number
}

/**
 * Prefixes a message with `file:line:column` when the location is known.
 *
 * @param message - Diagnostic text
 * @param location - Where the problem was found
 * @returns The message, pointing at the location
 */
export function formatDiagnostic(message: string, location?: SourceLocation): string {
  if (!location) {
    return message
  }
  return `${location.fileName}:${location.line}:${location.column} - ${message}`
}

/**
 * Base class for errors in the arguments of an `@instrument` annotation.
 */
export class InstrumentArgumentError extends Error {
  /**
   * Where the offending annotation sits, when known.
   */
  public readonly location: SourceLocation | undefined

  /**
   * Creates a new InstrumentArgumentError.
   *
   * @param message - Error message describing the problem
   * @param location - Position of the annotation
   */
  constructor(message: string, location?: SourceLocation) {
    super(formatDiagnostic(message, location))
    this.name = 'InstrumentArgumentError'
    this.location = location
  }
}

/**
 * Error thrown when the same keyed argument is given more than once.
 */
export class DuplicateArgumentError extends InstrumentArgumentError {
  public readonly argument: string

  /**
   * Creates a new DuplicateArgumentError.
   *
   * @param argument - The repeated argument key
   * @param location - Position of the annotation
   */
  constructor(argument: string, location?: SourceLocation) {
    super(`expected only a single \`${argument}\` argument`, location)
    this.name = 'DuplicateArgumentError'
    this.argument = argument
  }
}

/**
 * Error thrown when an annotation carries a keyed argument it does not support.
 */
export class UnrecognizedArgumentError extends InstrumentArgumentError {
  public readonly argument: string
  public readonly expected: readonly string[]

  /**
   * Creates a new UnrecognizedArgumentError.
   *
   * @param argument - The unsupported argument key
   * @param expected - The argument keys the annotation accepts
   * @param location - Position of the annotation
   */
  constructor(argument: string, expected: readonly string[], location?: SourceLocation) {
    const list = expected.map((key) => `\`${key}\``).join(', ')
    super(`unrecognized argument \`${argument}\`, expected one of: ${list}`, location)
    this.name = 'UnrecognizedArgumentError'
    this.argument = argument
    this.expected = expected
  }
}

/**
 * Error thrown when the annotation text is not a list of `key = "value"` pairs.
 */
export class MalformedArgumentError extends InstrumentArgumentError {
  constructor(message: string, location?: SourceLocation) {
    super(message, location)
    this.name = 'MalformedArgumentError'
  }
}

/**
 * Error thrown when an annotation is attached to a declaration that cannot be
 * rewritten, such as a generator, an overload signature, or an anonymous
 * function without an explicit metric name.
 */
export class UnsupportedDeclarationError extends Error {
  public readonly location: SourceLocation | undefined

  /**
   * Creates a new UnsupportedDeclarationError.
   *
   * @param message - Error message describing the declaration
   * @param location - Position of the declaration
   */
  constructor(message: string, location?: SourceLocation) {
    super(formatDiagnostic(message, location))
    this.name = 'UnsupportedDeclarationError'
    this.location = location
  }
}

/**
 * Error thrown when transformer options fail validation.
 */
export class WeaverConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'WeaverConfigError'
  }
}

/**
 * Normalizes an unknown thrown value into an Error.
 *
 * @param error - The caught value
 * @returns The value itself when it is an Error, otherwise an Error wrapping its string form
 */
export function normalizeError(error: unknown): Error {
  if (error instanceof Error) {
    return error
  }
  return new Error(String(error))
}
