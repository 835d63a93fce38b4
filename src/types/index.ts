/**
 * Shared type definitions
 */

// Re-export error types
export {
    LogicException,
    isLogicException,
    getSuggestion,
    createParseError,
    createLexError,
    createOptionsError,
    serializeLogicError,
} from './errors.js';

export type {
    LogicErrorCode,
    ErrorSpan,
    LogicError,
} from './errors.js';

// Re-export clause types
export type {
    NormalForm,
    Literal,
    Clause,
    NormalizeStatistics,
    TraceStage,
    TraceStep,
    NormalizeSuccess,
    NormalizeFailure,
    NormalizeResult,
} from './clause.js';

// Re-export expression types
export type {
    BinaryOperator,
    Junction,
    ExpressionType,
    TermNode,
    ConstantNode,
    NotNode,
    BinaryNode,
    Expression,
    NegatedTerm,
    NNFBinary,
    NNFExpression,
} from './ast.js';

// Re-export parser types
export type {
    TokenType,
    Token,
} from './parser.js';

// Re-export options
export {
    DEFAULTS,
    normalizeOptionsSchema,
} from './options.js';

export type {
    RenderStyle,
    RenderOptions,
    SimplifyOptions,
    NormalizeOptions,
    ResolvedNormalizeOptions,
} from './options.js';
