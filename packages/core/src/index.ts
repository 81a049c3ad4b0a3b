import { Lexer } from "./lexer/Lexer";
import { Token } from "./lexer/Token";
import { Parser } from "./parser/Parser";
import { Interpreter } from "./interpreter/Interpreter";
import { CollectingReporter, ErrorReporter } from "./reporter/Reporter";
import { Expression } from "./types/expression";
import { Value } from "./types/value";

export { Lexer } from "./lexer/Lexer";
export { Parser } from "./parser/Parser";
export { Interpreter } from "./interpreter/Interpreter";
export { TokenType } from "./lexer/TokenType";
export type { BinaryOperatorType, UnaryOperatorType } from "./lexer/TokenType";
export type { Token, OperatorToken } from "./lexer/Token";
export * from "./types/expression";
export * from "./types/value";
export * from "./reporter/Reporter";
export { TreeloxError, ParseError, RuntimeError } from "./utils/Error";
export type { ErrorLocation } from "./utils/Error";
export { formatExcerpt } from "./utils/err";
export { printAst } from "./utils/ASTUtils";
export {
    isEqual,
    isTruthy,
    stringify,
    stringifyNumber,
} from "./utils/typesystem";

export function scan(source: string, reporter?: ErrorReporter): Token[] {
    return new Lexer(source, reporter).tokenize();
}

export function parse(
    tokens: Token[],
    reporter?: ErrorReporter,
): Expression | null {
    return new Parser(tokens, reporter).parse();
}

export function evaluate(expr: Expression): Value {
    return new Interpreter().evaluate(expr);
}

export interface RunResult {
    ast: Expression | null;
    value: Value | null;
    // A scan or parse error was reported.
    hadError: boolean;
    hadRuntimeError: boolean;
}

/**
 * Runs one unit of source through the whole pipeline. Scan errors do not
 * stop evaluation; a parse error does.
 */
export function run(source: string, reporter?: ErrorReporter): RunResult {
    const collector = new CollectingReporter();
    const forward: ErrorReporter = {
        report(line, location, message, loc) {
            collector.report(line, location, message, loc);
            reporter?.report(line, location, message, loc);
        },
    };

    const tokens = new Lexer(source, forward).tokenize();
    const ast = new Parser(tokens, forward).parse();

    const hadError = collector.diagnostics.length > 0;

    if (!ast) {
        return { ast, value: null, hadError, hadRuntimeError: false };
    }

    const value = new Interpreter(forward).interpret(ast);
    return { ast, value, hadError, hadRuntimeError: value === null };
}
