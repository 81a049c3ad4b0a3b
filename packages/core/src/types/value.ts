export type Value =
    | { readonly type: "num"; readonly value: number }
    | { readonly type: "str"; readonly value: string }
    | { readonly type: "bool"; readonly value: boolean }
    | { readonly type: "nil" };

export const NIL: Value = { type: "nil" };

export function num(value: number): Value {
    return { type: "num", value };
}

export function str(value: string): Value {
    return { type: "str", value };
}

export function bool(value: boolean): Value {
    return { type: "bool", value };
}
