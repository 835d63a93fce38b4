/**
 * Expression Tree Types for Propositional Formulas
 */

export type BinaryOperator = 'and' | 'or' | 'implies';

/** The connectives that survive negation normal form */
export type Junction = 'and' | 'or';

export type ExpressionType = 'term' | 'constant' | 'not' | BinaryOperator;

export interface TermNode {
    readonly type: 'term';
    readonly name: string;
}

/** TRUE / FALSE. Only ever produced by simplification. */
export interface ConstantNode {
    readonly type: 'constant';
    readonly value: boolean;
}

export interface NotNode {
    readonly type: 'not';
    readonly operand: Expression;
}

export interface BinaryNode {
    readonly type: BinaryOperator;
    readonly left: Expression;
    readonly right: Expression;
}

export type Expression = TermNode | ConstantNode | NotNode | BinaryNode;

/**
 * Negation normal form: `not` wraps only terms, `implies` is gone.
 */
export interface NegatedTerm {
    readonly type: 'not';
    readonly operand: TermNode;
}

export interface NNFBinary {
    readonly type: Junction;
    readonly left: NNFExpression;
    readonly right: NNFExpression;
}

export type NNFExpression = TermNode | ConstantNode | NegatedTerm | NNFBinary;
