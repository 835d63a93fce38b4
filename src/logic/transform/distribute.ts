import type { Junction, NNFBinary, NNFExpression, NormalForm } from '../../types/index.js';
import { createJunction, dual } from '../../ast/factory.js';

/** Connective joining the clauses of each normal form */
export function outerConnective(form: NormalForm): Junction {
    return form === 'cnf' ? 'and' : 'or';
}

/** Connective joining the literals inside a clause */
export function innerConnective(form: NormalForm): Junction {
    return dual(outerConnective(form));
}

export function isJunction(node: NNFExpression, type: Junction): node is NNFBinary {
    return node.type === type;
}

/**
 * Distribute the inner connective over the outer one until the tree is two-level.
 *
 * CNF: (A ∧ B) ∨ C → (A ∨ C) ∧ (B ∨ C)
 * DNF: (A ∨ B) ∧ C → (A ∧ C) ∨ (B ∧ C)
 *
 * Each rewrite moves an outer node above an inner one, so the depth of outer
 * nodes beneath inner nodes strictly decreases and the recursion terminates.
 * Clause count can grow exponentially; no bound is applied.
 */
export function distribute(node: NNFExpression, form: NormalForm): NNFExpression {
    const outer = outerConnective(form);
    const inner = dual(outer);

    if (node.type !== 'and' && node.type !== 'or') {
        return node;
    }

    const left = distribute(node.left, form);
    const right = distribute(node.right, form);

    if (node.type === outer) {
        return createJunction(outer, left, right);
    }

    if (isJunction(left, outer)) {
        // (A ⊗ B) ⊕ C → (A ⊕ C) ⊗ (B ⊕ C)
        return createJunction(
            outer,
            distribute(createJunction(inner, left.left, right), form),
            distribute(createJunction(inner, left.right, right), form)
        );
    }

    if (isJunction(right, outer)) {
        // A ⊕ (B ⊗ C) → (A ⊕ B) ⊗ (A ⊕ C)
        return createJunction(
            outer,
            distribute(createJunction(inner, left, right.left), form),
            distribute(createJunction(inner, left, right.right), form)
        );
    }

    return createJunction(inner, left, right);
}

/**
 * Distribute OR over AND to reach CNF.
 */
export function toCNF(node: NNFExpression): NNFExpression {
    return distribute(node, 'cnf');
}

/**
 * Distribute AND over OR to reach DNF.
 */
export function toDNF(node: NNFExpression): NNFExpression {
    return distribute(node, 'dnf');
}
