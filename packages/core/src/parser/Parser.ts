import { OperatorToken, Token } from "../lexer/Token";
import {
    BinaryOperatorType,
    TokenType,
    UnaryOperatorType,
} from "../lexer/TokenType";
import { Expression } from "../types/expression";
import { NIL, bool, num, str } from "../types/value";
import { ErrorReporter } from "../reporter/Reporter";
import { ParseError } from "../utils/Error";

const EQUALITY_OPERATORS = [TokenType.BangEqual, TokenType.EqualEqual] as const;
const COMPARISON_OPERATORS = [
    TokenType.Greater,
    TokenType.GreaterEqual,
    TokenType.Less,
    TokenType.LessEqual,
] as const;
const TERM_OPERATORS = [TokenType.Minus, TokenType.Plus] as const;
const FACTOR_OPERATORS = [TokenType.Slash, TokenType.Star] as const;
const UNARY_OPERATORS = [TokenType.Bang, TokenType.Minus] as const;

// Keywords that begin a new declaration or statement.
const STATEMENT_STARTS: readonly TokenType[] = [
    TokenType.Class,
    TokenType.Fun,
    TokenType.Var,
    TokenType.For,
    TokenType.If,
    TokenType.While,
    TokenType.Print,
    TokenType.Return,
];

export class Parser {
    private tokens: Token[];
    private reporter?: ErrorReporter;
    private current: number = 0;

    constructor(tokens: Token[], reporter?: ErrorReporter) {
        const last = tokens[tokens.length - 1];
        if (!last || last.type !== TokenType.EOF) {
            throw new Error("Token stream must end with an EOF token");
        }
        this.tokens = tokens;
        this.reporter = reporter;
    }

    /**
     * Parses a single expression. On a syntax error the error is reported,
     * the rest of the unit is skipped and null is returned.
     */
    public parse(): Expression | null {
        this.current = 0;
        try {
            return this.expression();
        } catch (e) {
            if (!(e instanceof ParseError)) throw e;

            this.reporter?.report(
                e.token.line,
                e.location,
                e.message,
                e.loc,
            );
            this.synchronize();
            return null;
        }
    }

    private expression(): Expression {
        return this.equality();
    }

    private equality(): Expression {
        return this.binary(() => this.comparison(), EQUALITY_OPERATORS);
    }

    private comparison(): Expression {
        return this.binary(() => this.term(), COMPARISON_OPERATORS);
    }

    private term(): Expression {
        return this.binary(() => this.factor(), TERM_OPERATORS);
    }

    private factor(): Expression {
        return this.binary(() => this.unary(), FACTOR_OPERATORS);
    }

    // Folds `operand (op operand)*` into a left-associative chain.
    private binary<T extends BinaryOperatorType>(
        operand: () => Expression,
        operators: readonly T[],
    ): Expression {
        let left = operand();

        let operator = this.matchOperator(operators);
        while (operator) {
            const right = operand();
            left = {
                type: "BinaryExpression",
                left,
                operator,
                right,
            };
            operator = this.matchOperator(operators);
        }

        return left;
    }

    private unary(): Expression {
        const operator = this.matchOperator<UnaryOperatorType>(UNARY_OPERATORS);
        if (operator) {
            const right = this.unary();
            return { type: "UnaryExpression", operator, right };
        }
        return this.primary();
    }

    private primary(): Expression {
        if (this.match(TokenType.False)) {
            return { type: "LiteralExpression", value: bool(false) };
        }
        if (this.match(TokenType.True)) {
            return { type: "LiteralExpression", value: bool(true) };
        }
        if (this.match(TokenType.Nil)) {
            return { type: "LiteralExpression", value: NIL };
        }

        if (this.match(TokenType.Number, TokenType.String)) {
            const { literal } = this.previous();
            if (typeof literal === "number") {
                return { type: "LiteralExpression", value: num(literal) };
            }
            if (typeof literal === "string") {
                return { type: "LiteralExpression", value: str(literal) };
            }
            throw this.error(this.previous(), "Literal token has no value.");
        }

        if (this.match(TokenType.LeftParen)) {
            const expression = this.expression();
            this.consume(TokenType.RightParen, "Expect ')' after expression.");
            return { type: "GroupingExpression", expression };
        }

        throw this.error(this.peek(), "Expect expression.");
    }

    /**
     * Skips tokens up to the next statement boundary: just past a ';', or
     * right before a keyword that opens a statement.
     */
    private synchronize(): void {
        this.advance();

        while (!this.isAtEnd()) {
            if (this.previous().type === TokenType.Semicolon) return;
            if (STATEMENT_STARTS.includes(this.peek().type)) return;
            this.advance();
        }
    }

    private matchOperator<T extends TokenType>(
        types: readonly T[],
    ): OperatorToken<T> | null {
        const token = this.peek();
        if (this.isAtEnd() || !isOperator(token, types)) return null;
        this.advance();
        return token;
    }

    private match(...types: TokenType[]): boolean {
        for (const type of types) {
            if (this.check(type)) {
                this.advance();
                return true;
            }
        }
        return false;
    }

    private consume(type: TokenType, message: string): Token {
        if (this.check(type)) return this.advance();
        throw this.error(this.peek(), message);
    }

    private check(type: TokenType): boolean {
        if (this.isAtEnd()) return false;
        return this.peek().type === type;
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.previous();
    }

    private isAtEnd(): boolean {
        return this.peek().type === TokenType.EOF;
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private previous(): Token {
        return this.tokens[this.current - 1];
    }

    private error(token: Token, message: string): ParseError {
        return new ParseError(token, message);
    }
}

function isOperator<T extends TokenType>(
    token: Token,
    types: readonly T[],
): token is OperatorToken<T> {
    return types.some((type) => type === token.type);
}
