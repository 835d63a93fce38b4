import type { Expression } from '../types/index.js';
import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

const BINARY_TOKENS: ReadonlySet<TokenType> = new Set(['AND', 'OR', 'IMPLIES']);

/**
 * Parser for propositional formulas
 *
 * Grammar (EBNF-ish), loosest to tightest:
 *   implication = disjunction ('=>' implication)?
 *   disjunction = conjunction ('||' conjunction)*
 *   conjunction = negation ('&&' negation)*
 *   negation    = '~' negation | primary
 *   primary     = TERM | '(' implication ')'
 *
 * '=>' is right associative: `a => b => c` is `a => (b => c)`.
 */
export class Parser {
    private tokens: Token[];
    private originalInput: string;
    private pos: number = 0;

    constructor(tokens: Token[], originalInput: string) {
        this.tokens = tokens;
        this.originalInput = originalInput;
    }

    parse(): Expression {
        if (this.current().type === 'EOF') {
            throw createParseError('Empty expression', this.originalInput, this.current().position);
        }

        const result = this.parseImplication();
        const leftover = this.current();

        switch (leftover.type) {
            case 'EOF':
                return result;
            case 'RPAREN':
                throw createParseError(`Unmatched ')'`, this.originalInput, leftover.position);
            case 'TERM':
            case 'LPAREN':
            case 'NOT':
                throw createParseError(
                    `Missing operator before '${leftover.value}'`,
                    this.originalInput,
                    leftover.position
                );
            default:
                throw createParseError(
                    `Unexpected token '${leftover.value}'`,
                    this.originalInput,
                    leftover.position
                );
        }
    }

    private current(): Token {
        return this.tokens[this.pos] ?? { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        this.pos++;
        return token;
    }

    private parseImplication(): Expression {
        const left = this.parseDisjunction();

        if (this.current().type === 'IMPLIES') {
            this.advance();
            const right = this.parseImplication(); // Right associative
            return { type: 'implies', left, right };
        }

        return left;
    }

    private parseDisjunction(): Expression {
        let left = this.parseConjunction();

        while (this.current().type === 'OR') {
            this.advance();
            const right = this.parseConjunction();
            left = { type: 'or', left, right };
        }

        return left;
    }

    private parseConjunction(): Expression {
        let left = this.parseNegation();

        while (this.current().type === 'AND') {
            this.advance();
            const right = this.parseNegation();
            left = { type: 'and', left, right };
        }

        return left;
    }

    private parseNegation(): Expression {
        if (this.current().type === 'NOT') {
            this.advance();
            const operand = this.parseNegation();
            return { type: 'not', operand };
        }

        return this.parsePrimary();
    }

    private parsePrimary(): Expression {
        const token = this.current();

        switch (token.type) {
            case 'TERM':
                this.advance();
                return { type: 'term', name: token.value };

            case 'LPAREN': {
                this.advance();
                if (this.current().type === 'RPAREN') {
                    throw createParseError('Empty parentheses', this.originalInput, this.current().position);
                }
                const inner = this.parseImplication();
                const closing = this.current();
                if (closing.type !== 'RPAREN') {
                    throw createParseError(
                        `Missing closing ')' for '(' at position ${token.position}`,
                        this.originalInput,
                        closing.position
                    );
                }
                this.advance();
                return inner;
            }

            case 'EOF':
                throw createParseError(this.describeMissingOperand(), this.originalInput, token.position);

            default:
                if (BINARY_TOKENS.has(token.type)) {
                    throw createParseError(
                        `Missing operand before '${token.value}'`,
                        this.originalInput,
                        token.position
                    );
                }
                throw createParseError(`Unexpected '${token.value}'`, this.originalInput, token.position);
        }
    }

    private describeMissingOperand(): string {
        const previous = this.tokens[this.pos - 1];
        if (previous && previous.type !== 'TERM' && previous.type !== 'RPAREN') {
            return `Missing operand after '${previous.value}'`;
        }
        return 'Unexpected end of input';
    }
}
