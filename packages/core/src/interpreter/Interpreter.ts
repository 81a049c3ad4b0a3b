import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import {
    BinaryExpression,
    Expression,
    UnaryExpression,
} from "../types/expression";
import { Value, bool, num, str } from "../types/value";
import { ErrorReporter } from "../reporter/Reporter";
import { RuntimeError } from "../utils/Error";
import { isEqual, isTruthy } from "../utils/typesystem";

// Operators that take two numbers.
const NUMERIC_OPERATORS: ReadonlySet<TokenType> = new Set<TokenType>([
    TokenType.Minus,
    TokenType.Star,
    TokenType.Slash,
    TokenType.Greater,
    TokenType.GreaterEqual,
    TokenType.Less,
    TokenType.LessEqual,
]);

export class Interpreter {
    private reporter?: ErrorReporter;

    constructor(reporter?: ErrorReporter) {
        this.reporter = reporter;
    }

    /**
     * Evaluates an expression, reporting a runtime error instead of
     * throwing it. Returns null when evaluation failed.
     */
    public interpret(expr: Expression): Value | null {
        try {
            return this.evaluate(expr);
        } catch (e) {
            if (!(e instanceof RuntimeError)) throw e;

            this.reporter?.report(e.token.line, "", e.message, e.loc);
            return null;
        }
    }

    public evaluate(expr: Expression): Value {
        switch (expr.type) {
            case "LiteralExpression":
                return expr.value;
            case "GroupingExpression":
                return this.evaluate(expr.expression);
            case "UnaryExpression":
                return this.evaluateUnary(expr);
            case "BinaryExpression":
                return this.evaluateBinary(expr);
        }
    }

    private evaluateUnary(expr: UnaryExpression): Value {
        const right = this.evaluate(expr.right);

        switch (expr.operator.type) {
            case TokenType.Bang:
                return bool(!isTruthy(right));
            case TokenType.Minus:
                return num(-this.numberOperand(expr.operator, right));
            default:
                throw new RuntimeError(expr.operator, "Invalid unary operator.");
        }
    }

    private evaluateBinary(expr: BinaryExpression): Value {
        const left = this.evaluate(expr.left);
        const right = this.evaluate(expr.right);
        const { operator } = expr;

        switch (operator.type) {
            case TokenType.EqualEqual:
                return bool(isEqual(left, right));
            case TokenType.BangEqual:
                return bool(!isEqual(left, right));
            case TokenType.Plus:
                if (left.type === "num" && right.type === "num") {
                    return num(left.value + right.value);
                }
                if (left.type === "str" && right.type === "str") {
                    return str(left.value + right.value);
                }
                throw new RuntimeError(
                    operator,
                    "Operands must be two numbers or two strings.",
                );
        }

        if (!NUMERIC_OPERATORS.has(operator.type)) {
            throw new RuntimeError(operator, "Invalid binary operator.");
        }

        const [l, r] = this.numberOperands(operator, left, right);

        switch (operator.type) {
            case TokenType.Minus:
                return num(l - r);
            case TokenType.Star:
                return num(l * r);
            // Division by zero follows IEEE-754: Infinity or NaN.
            case TokenType.Slash:
                return num(l / r);
            case TokenType.Greater:
                return bool(l > r);
            case TokenType.GreaterEqual:
                return bool(l >= r);
            case TokenType.Less:
                return bool(l < r);
            case TokenType.LessEqual:
                return bool(l <= r);
            default:
                throw new RuntimeError(operator, "Invalid binary operator.");
        }
    }

    private numberOperand(operator: Token, operand: Value): number {
        if (operand.type === "num") return operand.value;
        throw new RuntimeError(operator, "Operand must be a number.");
    }

    private numberOperands(
        operator: Token,
        left: Value,
        right: Value,
    ): [number, number] {
        if (left.type === "num" && right.type === "num") {
            return [left.value, right.value];
        }
        throw new RuntimeError(operator, "Operands must be numbers.");
    }
}
