import { TokenType } from "./TokenType";

export interface Token {
    readonly type: TokenType;
    readonly lexeme: string;
    // Only number and string tokens carry a literal.
    readonly literal?: number | string;
    readonly line: number;
    readonly col: number;
}

/**
 * A token whose type is narrowed to a known operator set. The parser only
 * builds unary and binary nodes out of these.
 */
export interface OperatorToken<T extends TokenType> extends Token {
    readonly type: T;
}
