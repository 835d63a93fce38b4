import type {
    ConstantNode,
    Expression,
    Junction,
    NNFBinary,
    NNFExpression,
    NegatedTerm,
    NotNode,
    BinaryNode,
    TermNode,
} from '../types/index.js';

export function createTerm(name: string): TermNode {
    return { type: 'term', name };
}

export function createConstant(value: boolean): ConstantNode {
    return { type: 'constant', value };
}

export function createNot(operand: Expression): NotNode {
    return { type: 'not', operand };
}

export function createNegatedTerm(operand: TermNode): NegatedTerm {
    return { type: 'not', operand };
}

export function createAnd(left: Expression, right: Expression): BinaryNode {
    return { type: 'and', left, right };
}

export function createOr(left: Expression, right: Expression): BinaryNode {
    return { type: 'or', left, right };
}

export function createImplies(left: Expression, right: Expression): BinaryNode {
    return { type: 'implies', left, right };
}

export function createJunction(type: Junction, left: NNFExpression, right: NNFExpression): NNFBinary {
    return { type, left, right };
}

/** The other NNF connective */
export function dual(type: Junction): Junction {
    return type === 'and' ? 'or' : 'and';
}
