/**
 * Error codes for pattern and match failures.
 * @public
 */
export type PatternErrorCode =
  | 'EMPTY_PATTERN' // ""
  | 'MISSING_OPERAND' // * or + with nothing before it
  | 'UNCLOSED_BRACKET' // [abc without ]
  | 'INPUT_REQUIRED' // match() called without an input value

/**
 * A pattern validation error with location information.
 * @public
 */
export interface PatternError {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Human-readable error description */
  readonly message: string

  /** Code-point position in source where error starts */
  readonly position?: number

  /** Length of the problematic section */
  readonly length?: number
}

/**
 * Error thrown when a pattern cannot be compiled.
 *
 * Carries the first problem {@link validatePattern} would report for the
 * same source.
 *
 * @public
 */
export class InvalidPatternError extends Error {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** The pattern that failed to compile */
  readonly source: string

  /** Code-point position of the problem */
  readonly position?: number

  /** Length of the problematic section */
  readonly length?: number

  constructor(source: string, error: PatternError) {
    super(error.message)
    this.name = 'InvalidPatternError'
    this.code = error.code
    this.source = source
    this.position = error.position
    this.length = error.length
  }
}

/**
 * Error thrown when a match is requested without any input value.
 *
 * An empty string is a valid input and never raises this.
 *
 * @public
 */
export class InputRequiredError extends Error {
  /** Error classification code */
  readonly code: PatternErrorCode = 'INPUT_REQUIRED'

  constructor(message = 'Input string is required') {
    super(message)
    this.name = 'InputRequiredError'
  }
}
