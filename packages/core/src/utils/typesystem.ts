import { Value } from "../types/value";

// Only nil and false are falsy.
export function isTruthy(value: Value): boolean {
    if (value.type === "nil") return false;
    if (value.type === "bool") return value.value;
    return true;
}

/** Type-sensitive equality: values of different types are never equal. */
export function isEqual(a: Value, b: Value): boolean {
    switch (a.type) {
        case "nil":
            return b.type === "nil";
        case "num":
            return b.type === "num" && a.value === b.value;
        case "str":
            return b.type === "str" && a.value === b.value;
        case "bool":
            return b.type === "bool" && a.value === b.value;
    }
}

// Expands "1.5e-7" style output into plain positional digits.
function expandExponent(text: string): string {
    const match = /^(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
    if (!match) return text;

    const [, whole, fraction = "", exponent] = match;
    const digits = whole + fraction;
    const point = whole.length + Number(exponent);

    if (point <= 0) return `0.${"0".repeat(-point)}${digits}`;
    if (point >= digits.length) return digits + "0".repeat(point - digits.length);
    return `${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Shortest round-trip digits, always in positional notation, with no
 * trailing ".0" on integral values.
 */
export function stringifyNumber(value: number): string {
    if (Number.isNaN(value)) return "NaN";
    if (value === Infinity) return "inf";
    if (value === -Infinity) return "-inf";

    const sign = value < 0 || Object.is(value, -0) ? "-" : "";
    return sign + expandExponent(String(Math.abs(value)));
}

export function stringify(value: Value): string {
    switch (value.type) {
        case "nil":
            return "nil";
        case "num":
            return stringifyNumber(value.value);
        case "bool":
            return value.value ? "true" : "false";
        case "str":
            return value.value;
    }
}
