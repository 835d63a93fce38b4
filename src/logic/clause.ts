/**
 * Clause Utilities
 *
 * Helper functions for working with CNF/DNF clauses.
 */

import type { Clause, Expression, Literal, NNFExpression, NormalForm } from '../types/index.js';
import { createConstant, createJunction, createNegatedTerm, createTerm } from '../ast/factory.js';
import { outerConnective, innerConnective, isJunction } from './transform/distribute.js';

export type { Clause, Literal };

/** A literal, or a constant that ended up inside a clause */
export type ClauseItem = Literal | boolean;

/**
 * Split a two-level tree into its clauses.
 * The tree must already be distributed for `form`.
 */
export function collectClauses(node: NNFExpression, form: NormalForm): ClauseItem[][] {
    const outer = outerConnective(form);
    const clauses: ClauseItem[][] = [];

    function collectOuter(n: NNFExpression): void {
        if (isJunction(n, outer)) {
            collectOuter(n.left);
            collectOuter(n.right);
        } else {
            clauses.push(collectInner(n));
        }
    }

    function collectInner(n: NNFExpression): ClauseItem[] {
        switch (n.type) {
            case 'and':
            case 'or':
                return [...collectInner(n.left), ...collectInner(n.right)];
            case 'constant':
                return [n.value];
            case 'term':
                return [{ name: n.name, negated: false }];
            case 'not':
                return [{ name: n.operand.name, negated: true }];
        }
    }

    collectOuter(node);
    return clauses;
}

/**
 * Identity key of a literal: name plus polarity.
 */
export function literalKey(lit: Literal): string {
    return `${lit.negated ? '-' : '+'}${lit.name}`;
}

/**
 * Check if two literals are complementary (same term, opposite sign).
 */
export function areComplementary(l1: Literal, l2: Literal): boolean {
    return l1.name === l2.name && l1.negated !== l2.negated;
}

/**
 * Check if a clause holds a term with both polarities.
 * For CNF that clause is always true, for DNF always false.
 */
export function hasComplementaryPair(clause: Clause): boolean {
    const seen = new Map<string, boolean>();
    for (const lit of clause.literals) {
        const polarity = seen.get(lit.name);
        if (polarity !== undefined && polarity !== lit.negated) {
            return true;
        }
        seen.set(lit.name, lit.negated);
    }
    return false;
}

/**
 * Whether every literal of `a` also appears in `b`.
 */
export function isSubset(a: Clause, b: Clause): boolean {
    const keys = new Set(b.literals.map(literalKey));
    return a.literals.every(lit => keys.has(literalKey(lit)));
}

/**
 * Order by term name, positive before negative.
 */
export function compareLiterals(a: Literal, b: Literal): number {
    if (a.name !== b.name) {
        return a.name < b.name ? -1 : 1;
    }
    return Number(a.negated) - Number(b.negated);
}

/**
 * Order by size, then literal by literal. Literals must already be sorted.
 */
export function compareClauses(a: Clause, b: Clause): number {
    if (a.literals.length !== b.literals.length) {
        return a.literals.length - b.literals.length;
    }
    for (let i = 0; i < a.literals.length; i++) {
        const order = compareLiterals(a.literals[i], b.literals[i]);
        if (order !== 0) return order;
    }
    return 0;
}

/**
 * Order-insensitive identity key of a clause.
 */
export function clauseKey(clause: Clause): string {
    return clause.literals.map(literalKey).sort().join(' ');
}

export function literalToExpression(lit: Literal): NNFExpression {
    const term = createTerm(lit.name);
    return lit.negated ? createNegatedTerm(term) : term;
}

/**
 * Join literals with the inner connective; a unit clause is just its literal.
 */
export function clauseToExpression(clause: Clause, form: NormalForm): NNFExpression {
    const inner = innerConnective(form);
    if (clause.literals.length === 0) {
        // Empty clause: the inner connective's identity
        return createConstant(inner === 'and');
    }
    const [first, ...rest] = clause.literals.map(literalToExpression);
    return rest.reduce<NNFExpression>((acc, lit) => createJunction(inner, acc, lit), first);
}

/**
 * Join clauses with the outer connective, left nested; a single clause stands alone.
 */
export function clausesToExpression(clauses: Clause[], form: NormalForm): Expression {
    const outer = outerConnective(form);
    if (clauses.length === 0) {
        // No clauses: the outer connective's identity
        return createConstant(outer === 'and');
    }
    const [first, ...rest] = clauses.map(c => clauseToExpression(c, form));
    return rest.reduce<NNFExpression>((acc, clause) => createJunction(outer, acc, clause), first);
}

/**
 * Format a clause as text in the input grammar.
 */
export function clauseToString(clause: Clause, form: NormalForm): string {
    const separator = form === 'cnf' ? ' || ' : ' && ';
    return clause.literals.map(l => (l.negated ? `~${l.name}` : l.name)).join(separator);
}
