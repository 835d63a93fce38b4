/**
 * Parser Types
 */

export type TokenType =
    | 'TERM'          // any run of non-symbol, non-whitespace characters
    | 'IMPLIES'       // =>
    | 'AND'           // &&
    | 'OR'            // ||
    | 'NOT'           // ~
    | 'LPAREN'        // (
    | 'RPAREN'        // )
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}
