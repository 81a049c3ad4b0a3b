import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";

export interface ErrorLocation {
    line: number;
    col: number;
    len?: number;
}

export class TreeloxError extends Error {
    public loc: ErrorLocation;

    constructor(message: string, loc: ErrorLocation) {
        super(message);
        this.name = "TreeloxError";
        this.loc = loc;
    }
}

// Covers the part of the lexeme on the token's own line.
function tokenLoc(token: Token): ErrorLocation {
    const lastLine = token.lexeme.slice(token.lexeme.lastIndexOf("\n") + 1);
    return {
        line: token.line,
        col: token.col,
        len: Math.max(1, lastLine.length),
    };
}

/**
 * Grammar violation. Thrown inside the parser to unwind the current
 * expression; the parser reports it before returning.
 */
export class ParseError extends TreeloxError {
    public token: Token;

    constructor(token: Token, message: string) {
        super(message, tokenLoc(token));
        this.name = "ParseError";
        this.token = token;
    }

    /** Where the error sits, as shown between "Error" and the message. */
    public get location(): string {
        return this.token.type === TokenType.EOF
            ? "at end"
            : `at '${this.token.lexeme}'`;
    }
}

export class RuntimeError extends TreeloxError {
    public token: Token;

    constructor(token: Token, message: string) {
        super(message, tokenLoc(token));
        this.name = "RuntimeError";
        this.token = token;
    }
}
