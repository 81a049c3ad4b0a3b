import { isEqual, isTruthy, stringify } from "../src/utils/typesystem";
import { NIL, bool, num, str } from "../src/types/value";

describe("Type system", () => {
    test("stringify numbers", () => {
        expect(stringify(num(3))).toBe("3");
        expect(stringify(num(2.5))).toBe("2.5");
        expect(stringify(num(-7))).toBe("-7");
        expect(stringify(num(-0))).toBe("-0");
        expect(stringify(num(Infinity))).toBe("inf");
        expect(stringify(num(-Infinity))).toBe("-inf");
        expect(stringify(num(NaN))).toBe("NaN");
    });

    test("stringify other values", () => {
        expect(stringify(bool(true))).toBe("true");
        expect(stringify(bool(false))).toBe("false");
        expect(stringify(str("a \"quoted\" text"))).toBe('a "quoted" text');
        expect(stringify(str(""))).toBe("");
        expect(stringify(NIL)).toBe("nil");
    });

    test("only nil and false are falsy", () => {
        expect(isTruthy(NIL)).toBe(false);
        expect(isTruthy(bool(false))).toBe(false);
        expect(isTruthy(bool(true))).toBe(true);
        expect(isTruthy(num(0))).toBe(true);
        expect(isTruthy(str(""))).toBe(true);
    });

    test("equality never coerces", () => {
        expect(isEqual(NIL, NIL)).toBe(true);
        expect(isEqual(NIL, bool(false))).toBe(false);
        expect(isEqual(num(1), num(1))).toBe(true);
        expect(isEqual(num(1), str("1"))).toBe(false);
        expect(isEqual(num(0), bool(false))).toBe(false);
        expect(isEqual(str("a"), str("a"))).toBe(true);
        expect(isEqual(bool(true), bool(true))).toBe(true);
        expect(isEqual(num(NaN), num(NaN))).toBe(false);
    });

    test("large and small numbers stay positional", () => {
        expect(stringify(num(1e21))).toBe("1000000000000000000000");
        expect(stringify(num(-1e21))).toBe("-1000000000000000000000");
        expect(stringify(num(1.2345e22))).toBe("12345000000000000000000");
        expect(stringify(num(1e-7))).toBe("0.0000001");
        expect(stringify(num(1.5e-7))).toBe("0.00000015");
        expect(stringify(num(0.1))).toBe("0.1");
        expect(stringify(num(123456789.25))).toBe("123456789.25");
    });
});
