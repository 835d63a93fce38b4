import type { Clause, Expression, Literal, NNFExpression, NormalForm } from '../../types/index.js';
import type { SimplifyOptions } from '../../types/options.js';
import { createConstant } from '../../ast/factory.js';
import {
    ClauseItem,
    areComplementary,
    clauseKey,
    clausesToExpression,
    collectClauses,
    compareClauses,
    compareLiterals,
    hasComplementaryPair,
    isSubset,
    literalKey,
} from '../clause.js';
import { toNNF } from './nnf.js';
import { distribute } from './distribute.js';

/**
 * Simplify a formula in `form` and return its clauses,
 * or a boolean when the whole formula reduces to a constant.
 *
 * Input that is not yet two-level is normalized and distributed first.
 */
export function simplifyClauses(
    expr: Expression,
    form: NormalForm,
    options: SimplifyOptions = {}
): Clause[] | boolean {
    return reduceClauses(distribute(toNNF(expr), form), form, options);
}

/**
 * Same as `simplifyClauses`, for a tree that is already distributed for `form`.
 */
export function reduceClauses(
    distributed: NNFExpression,
    form: NormalForm,
    options: SimplifyOptions = {}
): Clause[] | boolean {
    const subsume = options.subsume ?? true;

    // CNF clauses are disjunctions: TRUE absorbs them, FALSE drops out.
    // DNF clauses are conjunctions: the reverse.
    const innerAbsorbing = form === 'cnf';
    // What the formula collapses to when one clause is unsatisfiable (CNF) or valid (DNF)
    const outerAbsorbing = form === 'dnf';

    const clauses: Clause[] = [];
    for (const items of collectClauses(distributed, form)) {
        if (items.includes(innerAbsorbing)) continue;

        const literals = dedupeLiterals(items);
        if (literals.length === 0) {
            return outerAbsorbing;
        }

        const clause = { literals };
        if (hasComplementaryPair(clause)) continue;
        clauses.push(clause);
    }

    const units = clauses.filter(c => c.literals.length === 1).map(c => c.literals[0]);
    if (hasComplementaryUnits(units)) {
        return outerAbsorbing;
    }

    let kept = dedupeClauses(clauses);
    if (subsume) {
        kept = kept.filter(c => !kept.some(other =>
            other.literals.length < c.literals.length && isSubset(other, c)
        ));
    }

    if (kept.length === 0) {
        return !outerAbsorbing;
    }

    return kept
        .map(c => ({ literals: [...c.literals].sort(compareLiterals) }))
        .sort(compareClauses);
}

/**
 * Simplify a formula in `form`:
 * - duplicate literals and clauses are removed
 * - clauses holding a term and its negation are dropped
 * - complementary unit clauses collapse the formula
 * - clauses subsumed by a smaller clause are dropped (unless disabled)
 * - a formula with nothing left becomes TRUE (CNF) or FALSE (DNF)
 */
export function simplify(
    expr: Expression,
    form: NormalForm,
    options: SimplifyOptions = {}
): Expression {
    const result = simplifyClauses(expr, form, options);
    if (typeof result === 'boolean') {
        return createConstant(result);
    }
    return clausesToExpression(result, form);
}

function dedupeLiterals(items: ClauseItem[]): Literal[] {
    const seen = new Map<string, Literal>();
    for (const item of items) {
        if (typeof item === 'boolean') continue;
        const key = literalKey(item);
        if (!seen.has(key)) {
            seen.set(key, item);
        }
    }
    return [...seen.values()];
}

function dedupeClauses(clauses: Clause[]): Clause[] {
    const seen = new Map<string, Clause>();
    for (const clause of clauses) {
        const key = clauseKey(clause);
        if (!seen.has(key)) {
            seen.set(key, clause);
        }
    }
    return [...seen.values()];
}

function hasComplementaryUnits(units: Literal[]): boolean {
    return units.some((lit, i) => units.slice(i + 1).some(other => areComplementary(lit, other)));
}
