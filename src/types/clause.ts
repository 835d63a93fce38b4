/**
 * Clause Types
 *
 * Types for formulas in Conjunctive or Disjunctive Normal Form.
 */

import type { Expression } from './ast.js';
import type { LogicError } from './errors.js';

export type NormalForm = 'cnf' | 'dnf';

/**
 * A literal is a term or its negation.
 */
export interface Literal {
    /** Term name, exact text */
    name: string;
    /** Whether this literal is negated */
    negated: boolean;
}

/**
 * A clause is a group of literals joined by the inner connective:
 * disjunction for CNF, conjunction for DNF.
 */
export interface Clause {
    literals: Literal[];
}

export interface NormalizeStatistics {
    /** Number of nodes in the parsed formula */
    originalSize: number;
    /** Number of clauses produced */
    clauseCount: number;
    /** Largest clause (literals) */
    maxClauseSize: number;
    /** Time taken in milliseconds */
    timeMs: number;
}

export type TraceStage = 'parse' | 'nnf' | 'distribute' | 'simplify';

export interface TraceStep {
    stage: TraceStage;
    formula: string;
}

export interface NormalizeSuccess {
    success: true;
    form: NormalForm;
    /** Rendered normal form */
    output: string;
    expression: Expression;
    /** Empty when the formula collapsed to a constant */
    clauses: Clause[];
    /** Set when the formula collapsed to TRUE or FALSE */
    constant?: boolean;
    /** Distinct term names of the input, in order of first appearance */
    terms: string[];
    statistics: NormalizeStatistics;
    steps?: TraceStep[];
}

export interface NormalizeFailure {
    success: false;
    error: LogicError;
    statistics: NormalizeStatistics;
}

export type NormalizeResult = NormalizeSuccess | NormalizeFailure;
