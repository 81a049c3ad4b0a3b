import { Token } from "./Token";
import { TokenType } from "./TokenType";
import { ErrorReporter } from "../reporter/Reporter";

const KEYWORDS: Record<string, TokenType> = {
    and: TokenType.And,
    class: TokenType.Class,
    else: TokenType.Else,
    false: TokenType.False,
    for: TokenType.For,
    fun: TokenType.Fun,
    if: TokenType.If,
    nil: TokenType.Nil,
    or: TokenType.Or,
    print: TokenType.Print,
    return: TokenType.Return,
    super: TokenType.Super,
    this: TokenType.This,
    true: TokenType.True,
    var: TokenType.Var,
    while: TokenType.While,
};

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
    "(": TokenType.LeftParen,
    ")": TokenType.RightParen,
    "{": TokenType.LeftBrace,
    "}": TokenType.RightBrace,
    ",": TokenType.Comma,
    ".": TokenType.Dot,
    "-": TokenType.Minus,
    "+": TokenType.Plus,
    ";": TokenType.Semicolon,
    "*": TokenType.Star,
};

// Operators that may be followed by '=' to form a two-character token.
const EQUAL_SUFFIXED: Record<string, [TokenType, TokenType]> = {
    "!": [TokenType.Bang, TokenType.BangEqual],
    "=": [TokenType.Equal, TokenType.EqualEqual],
    "<": [TokenType.Less, TokenType.LessEqual],
    ">": [TokenType.Greater, TokenType.GreaterEqual],
};

export class Lexer {
    private input: string;
    private reporter?: ErrorReporter;
    private tokens: Token[] = [];

    private start: number = 0;
    private position: number = 0;
    private line: number = 1;

    constructor(input: string, reporter?: ErrorReporter) {
        this.input = input;
        this.reporter = reporter;
    }

    /**
     * Scans the whole input. Never throws: bad characters and unterminated
     * strings are reported and skipped. The result always ends with EOF.
     */
    public tokenize(): Token[] {
        this.tokens = [];
        this.start = 0;
        this.position = 0;
        this.line = 1;

        while (!this.isAtEnd()) {
            this.start = this.position;
            this.scanToken();
        }

        this.tokens.push({
            type: TokenType.EOF,
            lexeme: "",
            line: this.line,
            col: this.column(this.position),
        });
        return this.tokens;
    }

    private scanToken() {
        const char = this.advance();

        const single = SINGLE_CHAR_TOKENS[char];
        if (single) {
            this.addToken(single);
            return;
        }

        const pair = EQUAL_SUFFIXED[char];
        if (pair) {
            this.addToken(this.match("=") ? pair[1] : pair[0]);
            return;
        }

        switch (char) {
            case "/":
                if (this.match("/")) {
                    this.skipComment();
                } else {
                    this.addToken(TokenType.Slash);
                }
                return;
            case " ":
            case "\r":
            case "\t":
                return;
            case "\n":
                this.line++;
                return;
            case '"':
                this.readString();
                return;
        }

        if (this.isDigit(char)) {
            this.readNumber();
            return;
        }

        if (this.isAlpha(char)) {
            this.readIdentifier();
            return;
        }

        this.error("Unexpected character.");
    }

    private readString() {
        while (this.currentChar() !== '"' && !this.isAtEnd()) {
            if (this.currentChar() === "\n") this.line++;
            this.advance();
        }

        if (this.isAtEnd()) {
            this.error("Unterminated string.");
            return;
        }

        this.advance(); // closing quote

        const value = this.input.substring(this.start + 1, this.position - 1);
        this.addToken(TokenType.String, value);
    }

    private readNumber() {
        while (this.isDigit(this.currentChar())) this.advance();

        // A trailing '.' with no digit after it is not part of the number.
        if (this.currentChar() === "." && this.isDigit(this.peekChar())) {
            this.advance();
            while (this.isDigit(this.currentChar())) this.advance();
        }

        const text = this.input.substring(this.start, this.position);
        this.addToken(TokenType.Number, Number.parseFloat(text));
    }

    private readIdentifier() {
        while (this.isAlphaNumeric(this.currentChar())) this.advance();

        const text = this.input.substring(this.start, this.position);
        const type = Object.prototype.hasOwnProperty.call(KEYWORDS, text)
            ? KEYWORDS[text]
            : TokenType.Identifier;
        this.addToken(type);
    }

    private skipComment() {
        while (this.currentChar() !== "\n" && !this.isAtEnd()) {
            this.advance();
        }
    }

    private addToken(type: TokenType, literal?: number | string) {
        const lexeme = this.input.substring(this.start, this.position);
        const col = this.startColumn();
        const token: Token =
            literal === undefined
                ? { type, lexeme, line: this.line, col }
                : { type, lexeme, literal, line: this.line, col };
        this.tokens.push(token);
    }

    private error(message: string) {
        this.reporter?.report(this.line, "", message, {
            line: this.line,
            col: this.startColumn(),
            len: 1,
        });
    }

    // Column on the current line where the lexeme begins. A lexeme that
    // spans lines is taken to begin at the start of its last line.
    private startColumn(): number {
        const lineStart = this.input.lastIndexOf("\n", this.position - 1) + 1;
        return this.column(Math.max(this.start, lineStart));
    }

    // 1-based column of an offset, counted from the last newline before it.
    private column(offset: number): number {
        return offset - this.input.lastIndexOf("\n", offset - 1);
    }

    // Steps over one code point, so astral characters stay whole.
    private advance(): string {
        const char = this.currentChar();
        this.position += char.length;
        return char;
    }

    private match(expected: string): boolean {
        if (this.isAtEnd() || this.input[this.position] !== expected) {
            return false;
        }
        this.position++;
        return true;
    }

    private isAtEnd(): boolean {
        return this.position >= this.input.length;
    }

    private currentChar(): string {
        return this.charAt(this.position);
    }

    // The code point after the current one.
    private peekChar(): string {
        return this.charAt(this.position + this.currentChar().length);
    }

    private charAt(offset: number): string {
        const codePoint = this.input.codePointAt(offset);
        return codePoint === undefined ? "" : String.fromCodePoint(codePoint);
    }

    private isAlpha(char: string): boolean {
        return /^\p{Alphabetic}$/u.test(char);
    }

    private isAlphaNumeric(char: string): boolean {
        return /^[\p{Alphabetic}\p{N}]$/u.test(char);
    }

    private isDigit(char: string): boolean {
        return /^[0-9]$/.test(char);
    }
}
