import { Expression } from "../types/expression";
import { stringify } from "./typesystem";

function parenthesize(name: string, ...parts: Expression[]): string {
    return `(${[name, ...parts.map(printAst)].join(" ")})`;
}

/**
 * Prefix, fully parenthesized rendering of an expression tree, e.g.
 * `(* (- 123) (group 45.67))`.
 */
export function printAst(expr: Expression): string {
    switch (expr.type) {
        case "BinaryExpression":
            return parenthesize(expr.operator.lexeme, expr.left, expr.right);
        case "GroupingExpression":
            return parenthesize("group", expr.expression);
        case "LiteralExpression":
            return stringify(expr.value);
        case "UnaryExpression":
            return parenthesize(expr.operator.lexeme, expr.right);
    }
}
