import type { Expression, NNFExpression } from '../../types/index.js';
import { createConstant, createJunction, createNegatedTerm } from '../../ast/factory.js';

/**
 * Convert an expression to Negation Normal Form (NNF).
 *
 * In NNF:
 * - Negations only appear on terms
 * - Only AND and OR remain
 * - Implications are eliminated
 */
export function toNNF(node: Expression): NNFExpression {
    switch (node.type) {
        case 'implies':
            // A → B → ¬A ∨ B
            return createJunction('or', pushNegation(node.left), toNNF(node.right));

        case 'not':
            return pushNegation(node.operand);

        case 'and':
        case 'or':
            return createJunction(node.type, toNNF(node.left), toNNF(node.right));

        case 'term':
        case 'constant':
            return node;
    }
}

/**
 * Push a negation inward (De Morgan's laws).
 * Used when we encounter `not(node)` and want to push the `not` down.
 */
function pushNegation(node: Expression): NNFExpression {
    switch (node.type) {
        case 'not':
            // Double negation elimination: ¬¬A → A
            return toNNF(node.operand);

        case 'and':
            // De Morgan: ¬(A ∧ B) → ¬A ∨ ¬B
            return createJunction('or', pushNegation(node.left), pushNegation(node.right));

        case 'or':
            // De Morgan: ¬(A ∨ B) → ¬A ∧ ¬B
            return createJunction('and', pushNegation(node.left), pushNegation(node.right));

        case 'implies':
            // ¬(A → B) → A ∧ ¬B
            return createJunction('and', toNNF(node.left), pushNegation(node.right));

        case 'constant':
            return createConstant(!node.value);

        case 'term':
            // Atomic negation: this is the base case for NNF
            return createNegatedTerm(node);
    }
}
