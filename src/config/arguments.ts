/**
 * Parses the arguments of an `@instrument` annotation.
 *
 * The annotation text is a list of `key = "value"` pairs, optionally
 * separated by commas:
 *
 * ```typescript
 * /** @instrument name = "req_latency" *\/
 * ```
 */

import {
  DuplicateArgumentError,
  MalformedArgumentError,
  UnrecognizedArgumentError,
  type SourceLocation,
} from '../errors.js'

/**
 * Validated arguments of one annotation.
 */
export interface InstrumentationConfig {
  /**
   * Base metric name used verbatim instead of the declaration path.
   */
  readonly name?: string
}

/**
 * Keyed arguments the annotation accepts.
 */
export const INSTRUMENT_ARGUMENTS = ['name'] as const

interface RawArgument {
  key: string
  value: string
}

const IDENTIFIER_START = /[A-Za-z_$]/
const IDENTIFIER_PART = /[\w$-]/

/**
 * Splits annotation text into raw key/value pairs without interpreting keys.
 */
class ArgumentScanner {
  private _pos = 0

  constructor(
    private readonly _text: string,
    private readonly _location: SourceLocation | undefined
  ) {}

  *entries(): Generator<RawArgument> {
    this._skipWhitespace()
    while (this._pos < this._text.length) {
      const key = this._identifier()
      this._skipWhitespace()
      this._expect('=')
      this._skipWhitespace()
      const value = this._string(key)
      yield { key, value }

      this._skipWhitespace()
      if (this._peek() === ',') {
        this._pos++
        this._skipWhitespace()
        if (this._pos >= this._text.length) {
          throw this._error('trailing `,` after the last argument')
        }
      }
    }
  }

  private _peek(): string | undefined {
    return this._text[this._pos]
  }

  private _skipWhitespace(): void {
    while (this._pos < this._text.length && /\s/.test(this._text.charAt(this._pos))) {
      this._pos++
    }
  }

  private _identifier(): string {
    const start = this._pos
    if (!IDENTIFIER_START.test(this._text.charAt(this._pos))) {
      throw this._error(`expected an argument name at offset ${start}`)
    }
    this._pos++
    while (this._pos < this._text.length && IDENTIFIER_PART.test(this._text.charAt(this._pos))) {
      this._pos++
    }
    return this._text.slice(start, this._pos)
  }

  private _expect(char: string): void {
    if (this._peek() !== char) {
      throw this._error(`expected \`${char}\` at offset ${this._pos}`)
    }
    this._pos++
  }

  private _string(key: string): string {
    const quote = this._peek()
    if (quote !== '"' && quote !== "'") {
      throw this._error(`expected a string literal for \`${key}\``)
    }
    this._pos++

    let value = ''
    while (this._pos < this._text.length) {
      const char = this._text.charAt(this._pos++)
      if (char === quote) {
        return value
      }
      if (char === '\\') {
        if (this._pos >= this._text.length) {
          break
        }
        value += this._text.charAt(this._pos++)
        continue
      }
      value += char
    }
    throw this._error(`unterminated string literal for \`${key}\``)
  }

  private _error(message: string): MalformedArgumentError {
    return new MalformedArgumentError(message, this._location)
  }
}

/**
 * Parses annotation argument text into an InstrumentationConfig.
 *
 * Arguments are checked in order, so the first problem found is the one
 * reported.
 *
 * @param text - The argument text following the annotation tag; may be empty
 * @param location - Position of the annotation, used in error messages
 * @returns The validated configuration
 * @throws DuplicateArgumentError when `name` appears more than once
 * @throws UnrecognizedArgumentError when any other key is present
 * @throws MalformedArgumentError when the text is not a list of `key = "value"` pairs
 */
export function parseInstrumentArguments(text: string | undefined, location?: SourceLocation): InstrumentationConfig {
  let name: string | undefined

  for (const { key, value } of new ArgumentScanner(text ?? '', location).entries()) {
    if (key !== 'name') {
      throw new UnrecognizedArgumentError(key, INSTRUMENT_ARGUMENTS, location)
    }
    if (name !== undefined) {
      throw new DuplicateArgumentError(key, location)
    }
    name = value
  }

  return name === undefined ? {} : { name }
}
