/**
 * propnorm - Library Entry Point
 *
 * Exports the normal form pipeline for use in other projects.
 * This file does not import the CLI.
 */

// Pipeline
export { convert, normalize, resolveOptions, toNormalForm } from './logic/normalizer.js';

// Stages
export { parse, tokenize, Tokenizer, Parser } from './parser/index.js';
export { toNNF, distribute, toCNF, toDNF, simplify, simplifyClauses } from './logic/transform/index.js';
export { render } from './ast/printer.js';

// Trees and clauses
export * from './ast/factory.js';
export { traverse } from './ast/visitor.js';
export { extractTerms, countNodes, expressionsEqual } from './ast/analysis.js';
export {
    collectClauses,
    clausesToExpression,
    clauseToString,
    areComplementary,
    hasComplementaryPair,
} from './logic/clause.js';

// Types and Interfaces
export * from './types/index.js';
