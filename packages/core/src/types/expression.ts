import { OperatorToken } from "../lexer/Token";
import { BinaryOperatorType, UnaryOperatorType } from "../lexer/TokenType";
import { Value } from "./value";

export type Expression =
    | LiteralExpression
    | GroupingExpression
    | UnaryExpression
    | BinaryExpression;

export interface LiteralExpression {
    readonly type: "LiteralExpression";
    readonly value: Value;
}

export interface GroupingExpression {
    readonly type: "GroupingExpression";
    readonly expression: Expression;
}

export interface UnaryExpression {
    readonly type: "UnaryExpression";
    readonly operator: OperatorToken<UnaryOperatorType>;
    readonly right: Expression;
}

export interface BinaryExpression {
    readonly type: "BinaryExpression";
    readonly left: Expression;
    readonly operator: OperatorToken<BinaryOperatorType>;
    readonly right: Expression;
}
