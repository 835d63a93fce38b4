/**
 * Structured Error System
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for normalization
 */
export type LogicErrorCode =
  | 'LEX_ERROR'             // Input cannot be split into tokens
  | 'PARSE_ERROR'           // Syntax errors in formula
  | 'INVALID_OPTIONS';      // Rejected normalization options

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
 * Structured error with code, message, span, and suggestions
 */
export interface LogicError {
  code: LogicErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The problematic formula
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping LogicError for throw/catch patterns
 */
export class LogicException extends Error {
  public readonly error: LogicError;

  constructor(error: LogicError) {
    super(error.message);
    this.name = 'LogicException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LogicException);
    }
  }

  get code(): LogicErrorCode {
    return this.error.code;
  }

  /** Offending position in the input, when known */
  get position(): number | undefined {
    return this.error.span?.start;
  }

  toJSON(): LogicError {
    return this.error;
  }
}

export function isLogicException(e: unknown): e is LogicException {
  return e instanceof LogicException;
}

/**
 * Common syntax error patterns and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /\([^)]*$/,
      suggestion: "Unbalanced parentheses - missing closing ')'"
    },
    {
      pattern: /^[^(]*\)/,
      suggestion: "Unbalanced parentheses - missing opening '('"
    },
    {
      pattern: /=>\s*$/,
      suggestion: "Incomplete implication - missing consequent after '=>'"
    },
    {
      pattern: /&&\s*$/,
      suggestion: "Incomplete conjunction - missing right operand after '&&'"
    },
    {
      pattern: /\|\|\s*$/,
      suggestion: "Incomplete disjunction - missing right operand after '||'"
    },
    {
      pattern: /~\s*$/,
      suggestion: "Incomplete negation - missing operand after '~'"
    },
    {
      pattern: /^\s*(&&|\|\||=>)/,
      suggestion: 'Missing left operand - the expression starts with a binary operator'
    },
    {
      pattern: /\(\s*\)/,
      suggestion: "Empty parentheses - put an expression between '(' and ')'"
    },
    {
      pattern: /(^|[^&])&([^&]|$)/,
      suggestion: "Use '&&' for conjunction - a single '&' is read as part of a term"
    },
    {
      pattern: /(^|[^|])\|([^|]|$)/,
      suggestion: "Use '||' for disjunction - a single '|' is read as part of a term"
    },
    {
      pattern: /->/,
      suggestion: "Use '=>' for implication"
    },
    {
      pattern: /!/,
      suggestion: "Use '~' for negation"
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

function createSpan(input: string, position: number): ErrorSpan {
  return {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  };
}

/**
 * Create a parse error with optional span and suggestion
 */
export function createParseError(
  message: string,
  input: string,
  position?: number
): LogicException {
  return new LogicException({
    code: 'PARSE_ERROR',
    message,
    span: position !== undefined ? createSpan(input, position) : undefined,
    suggestion: getSuggestion(input),
    context: input,
  });
}

/**
 * Create a lexical error
 */
export function createLexError(
  message: string,
  input: string,
  position: number
): LogicException {
  return new LogicException({
    code: 'LEX_ERROR',
    message,
    span: createSpan(input, position),
    context: input,
  });
}

/**
 * Create an options validation error
 */
export function createOptionsError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'INVALID_OPTIONS',
    message: `Invalid options: ${message}`,
    suggestion: "Use form 'cnf' or 'dnf' and style 'minimal' or 'grouped'",
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
 * Serialize a LogicError for JSON output
 */
export function serializeLogicError(error: LogicError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
