import { Lexer } from "../src/lexer/Lexer";
import { Parser } from "../src/parser/Parser";
import { TokenType } from "../src/lexer/TokenType";
import { CollectingReporter } from "../src/reporter/Reporter";
import { printAst } from "../src/utils/ASTUtils";
import {
    BinaryExpression,
    Expression,
    LiteralExpression,
    UnaryExpression,
} from "../src/types/expression";

describe("Parser", () => {
    function parse(input: string) {
        const reporter = new CollectingReporter();
        const tokens = new Lexer(input, reporter).tokenize();
        const ast = new Parser(tokens, reporter).parse();
        return { ast, reporter };
    }

    function print(input: string): string {
        const { ast } = parse(input);
        if (!ast) throw new Error(`failed to parse ${input}`);
        return printAst(ast);
    }

    function expectKind<T extends Expression["type"]>(
        expr: Expression | null,
        type: T,
    ): Extract<Expression, { type: T }> {
        expect(expr?.type).toBe(type);
        const isKind = (e: Expression | null): e is Extract<Expression, { type: T }> =>
            e !== null && e.type === type;
        if (!isKind(expr)) throw new Error(`expected ${type}`);
        return expr;
    }

    test("parse multiplication of a negated literal", () => {
        const { ast, reporter } = parse("-123 * 45.67");
        expect(reporter.diagnostics).toHaveLength(0);

        const binary: BinaryExpression = expectKind(ast, "BinaryExpression");
        expect(binary.operator.type).toBe(TokenType.Star);
        expect(binary.operator.lexeme).toBe("*");

        const left: UnaryExpression = expectKind(binary.left, "UnaryExpression");
        expect(left.operator.type).toBe(TokenType.Minus);
        expect(left.right).toEqual({
            type: "LiteralExpression",
            value: { type: "num", value: 123 },
        });

        const right: LiteralExpression = expectKind(
            binary.right,
            "LiteralExpression",
        );
        expect(right.value).toEqual({ type: "num", value: 45.67 });
    });

    test("literals", () => {
        expect(parse("true").ast).toEqual({
            type: "LiteralExpression",
            value: { type: "bool", value: true },
        });
        expect(parse("false").ast).toEqual({
            type: "LiteralExpression",
            value: { type: "bool", value: false },
        });
        expect(parse("nil").ast).toEqual({
            type: "LiteralExpression",
            value: { type: "nil" },
        });
        expect(parse('"text"').ast).toEqual({
            type: "LiteralExpression",
            value: { type: "str", value: "text" },
        });
    });

    test("factor binds tighter than term", () => {
        expect(print("1 + 2 * 3")).toBe("(+ 1 (* 2 3))");
        expect(print("1 * 2 + 3")).toBe("(+ (* 1 2) 3)");
        expect(print("8 / 4 - 1")).toBe("(- (/ 8 4) 1)");
    });

    test("binary operators are left associative", () => {
        expect(print("1 - 2 - 3")).toBe("(- (- 1 2) 3)");
        expect(print("8 / 4 / 2")).toBe("(/ (/ 8 4) 2)");
        expect(print("1 == 2 == 3")).toBe("(== (== 1 2) 3)");
    });

    test("comparison binds tighter than equality", () => {
        expect(print("1 < 2 == true")).toBe("(== (< 1 2) true)");
        expect(print("1 + 1 >= 2 != false")).toBe(
            "(!= (>= (+ 1 1) 2) false)",
        );
    });

    test("unary operators nest and bind tightest", () => {
        expect(print("!!true")).toBe("(! (! true))");
        expect(print("--1")).toBe("(- (- 1))");
        expect(print("-1 * -2")).toBe("(* (- 1) (- 2))");
    });

    test("grouping overrides precedence", () => {
        expect(print("(1 + 2) * 3")).toBe("(* (group (+ 1 2)) 3)");
        expect(print("((nil))")).toBe("(group (group nil))");
    });

    test("missing operand", () => {
        const { ast, reporter } = parse("1 +");
        expect(ast).toBeNull();
        expect(reporter.diagnostics).toEqual([
            {
                line: 1,
                location: "at end",
                message: "Expect expression.",
                loc: { line: 1, col: 4, len: 1 },
            },
        ]);
    });

    test("unexpected token where an expression should start", () => {
        const { ast, reporter } = parse("* 3");
        expect(ast).toBeNull();
        expect(reporter.messages).toEqual([
            "[line 1] Error at '*': Expect expression.",
        ]);
    });

    test("unclosed group", () => {
        const { ast, reporter } = parse("(1 + 2");
        expect(ast).toBeNull();
        expect(reporter.messages).toEqual([
            "[line 1] Error at end: Expect ')' after expression.",
        ]);
    });

    test("unexpected token inside a group", () => {
        const { reporter } = parse("(1 + 2 3)");
        expect(reporter.messages).toEqual([
            "[line 1] Error at '3': Expect ')' after expression.",
        ]);
    });

    test("error is reported at the offending line", () => {
        const { reporter } = parse("1 +\n\n)");
        expect(reporter.messages).toEqual([
            "[line 3] Error at ')': Expect expression.",
        ]);
    });

    test("error at a string spanning lines points at its last line", () => {
        const { reporter } = parse('(1 "a\nbc")');
        expect(reporter.diagnostics).toEqual([
            {
                line: 2,
                location: `at '"a\nbc"'`,
                message: "Expect ')' after expression.",
                loc: { line: 2, col: 1, len: 3 },
            },
        ]);
    });

    test("only the first error of a unit is reported", () => {
        const { reporter } = parse("(; var ) )");
        expect(reporter.diagnostics).toHaveLength(1);
    });

    test("identifiers are not expressions", () => {
        const { reporter } = parse("foo");
        expect(reporter.messages).toEqual([
            "[line 1] Error at 'foo': Expect expression.",
        ]);
    });

    test("tokens after a complete expression are ignored", () => {
        const { ast, reporter } = parse("1 2");
        expect(ast).toEqual({
            type: "LiteralExpression",
            value: { type: "num", value: 1 },
        });
        expect(reporter.diagnostics).toHaveLength(0);
    });

    test("parse without a reporter", () => {
        const tokens = new Lexer(")").tokenize();
        expect(new Parser(tokens).parse()).toBeNull();
    });

    test("reject a token stream without EOF", () => {
        expect(() => new Parser([])).toThrow(
            "Token stream must end with an EOF token",
        );
    });
});
