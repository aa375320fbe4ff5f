/**
 * Structured Error System
 *
 * Machine-readable input errors with codes, spans, and suggestions.
 * Search outcomes (conflicts, unsatisfiable formulas) are never reported here.
 */

/**
 * Error codes for solver inputs and engines
 */
export type DpllErrorCode =
  | 'PARSE_ERROR'           // Malformed instance text
  | 'INVALID_LITERAL'       // Literal token is empty or has non-digit characters
  | 'INVALID_VARIABLE'      // Variable id is negative or not an integer
  | 'UNSUPPORTED_TYPE'      // Literal given as something other than Literal/string/number
  | 'INVALID_ARGUMENTS'     // Tool, CLI or configuration arguments rejected
  | 'ENGINE_ERROR';         // Engine lookup or self-check failure

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span and suggestions
 */
export interface DpllError {
  code: DpllErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The offending token or line
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping DpllError for throw/catch patterns
 */
export class DpllException extends Error {
  public readonly error: DpllError;

  constructor(error: DpllError) {
    super(error.message);
    this.name = 'DpllException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DpllException);
    }
  }

  get code(): DpllErrorCode {
    return this.error.code;
  }

  toJSON(): DpllError {
    return this.error;
  }
}

/**
 * Common token mistakes and their suggestions
 */
const TOKEN_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /^\+/,
      suggestion: "Positive literals take no sign - write '3' instead of '+3'"
    },
    {
      pattern: /^--/,
      suggestion: "Use a single '-' to negate a literal"
    },
    {
      pattern: /^-$/,
      suggestion: "Negation marker must be followed by a variable id, e.g. '-0'"
    },
    {
      pattern: /^-?\d+\.\d*$/,
      suggestion: 'Variable ids are whole numbers'
    },
    {
      pattern: /^-?[A-Za-z_]/,
      suggestion: 'Variables are numbered - names are not supported'
    },
  ];

/**
 * Get a suggestion for a malformed literal token
 */
export function getSuggestion(token: string): string | undefined {
  for (const { pattern, suggestion } of TOKEN_SUGGESTIONS) {
    if (pattern.test(token)) {
      return suggestion;
    }
  }
  return undefined;
}

/**
 * Create an invalid literal error for a token
 */
export function createInvalidLiteralError(token: string, reason?: string): DpllException {
  return new DpllException({
    code: 'INVALID_LITERAL',
    message: reason ?? `Invalid literal token: '${token}'`,
    suggestion: getSuggestion(token.trim()),
    context: token,
  });
}

/**
 * Create an invalid variable error
 */
export function createInvalidVariableError(variable: unknown): DpllException {
  return new DpllException({
    code: 'INVALID_VARIABLE',
    message: `Variable id must be a non-negative integer, got ${String(variable)}`,
    suggestion: 'Number variables from 0 upwards',
    details: { variable: String(variable) },
  });
}

/**
 * Create an unsupported type error
 */
export function createUnsupportedTypeError(value: unknown): DpllException {
  const type = value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value;
  return new DpllException({
    code: 'UNSUPPORTED_TYPE',
    message: `Unsupported literal type: ${type}`,
    suggestion: 'Pass a Literal, a token string such as "-0", or an integer',
    details: { type },
  });
}

/**
 * Create a parse error at a position inside instance text
 */
export function createParseError(
  message: string,
  input: string,
  position?: number,
  details?: Record<string, unknown>
): DpllException {
  const span = position !== undefined ? {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  } : undefined;

  const where = span ? ` (line ${span.line}, column ${span.col})` : '';

  return new DpllException({
    code: 'PARSE_ERROR',
    message: `${message}${where}`,
    span,
    details,
  });
}

/**
 * Create an invalid arguments error
 */
export function createInvalidArgumentsError(
  message: string,
  details?: Record<string, unknown>
): DpllException {
  return new DpllException({
    code: 'INVALID_ARGUMENTS',
    message,
    details,
  });
}

/**
 * Create an engine error
 */
export function createEngineError(
  message: string,
  details?: Record<string, unknown>
): DpllException {
  return new DpllException({
    code: 'ENGINE_ERROR',
    message: `Engine error: ${message}`,
    details,
  });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize a DpllError for JSON output
 */
export function serializeDpllError(error: DpllError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion ? { suggestion: error.suggestion } : {}),
    ...(error.context ? { context: error.context } : {}),
    ...(error.details && { details: error.details }),
  };
}
