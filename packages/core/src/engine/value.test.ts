import { describe, it, expect } from "vitest";
import {
  add,
  arrayValue,
  booleanValue,
  compareValues,
  divide,
  emptyOf,
  formatValue,
  fromJson,
  intDivide,
  isEmpty,
  logicalNot,
  modulo,
  multiply,
  negate,
  numberValue,
  stringValue,
  subtract,
  toJson,
  valueEquals,
  valueLength,
  xor,
} from "./value.js";
import { EvaluationError } from "./errors.js";

const n = numberValue;
const s = stringValue;
const b = booleanValue;

describe("value", () => {
  describe("emptiness", () => {
    it("knows the empty value of each kind", () => {
      expect(emptyOf("boolean")).toEqual(b(false));
      expect(emptyOf("number")).toEqual(n(0));
      expect(emptyOf("string")).toEqual(s(""));
      expect(emptyOf("array")).toEqual(arrayValue([]));
    });

    it("treats false, 0, '' and [] as empty", () => {
      expect([b(false), n(0), s(""), arrayValue([])].every(isEmpty)).toBe(true);
      expect([b(true), n(-1), s(" "), arrayValue([b(false)])].some(isEmpty)).toBe(false);
    });

    it("measures strings in code points", () => {
      expect(valueLength(s("a😎"))).toBe(2);
      expect(valueLength(arrayValue([n(1), n(2), n(3)]))).toBe(3);
      expect(valueLength(n(12))).toBe(0);
    });
  });

  describe("equality", () => {
    it("compares within a kind", () => {
      expect(valueEquals(n(1), n(1))).toBe(true);
      expect(valueEquals(s("a"), s("A"))).toBe(false);
    });

    it("never equates different kinds", () => {
      expect(valueEquals(n(0), b(false))).toBe(false);
      expect(valueEquals(s("1"), n(1))).toBe(false);
    });

    it("compares arrays deeply", () => {
      expect(valueEquals(arrayValue([n(1), s("x")]), arrayValue([n(1), s("x")]))).toBe(true);
      expect(valueEquals(arrayValue([n(1)]), arrayValue([n(1), n(2)]))).toBe(false);
    });
  });

  describe("ordering", () => {
    it("orders booleans false before true", () => {
      expect(compareValues(b(false), b(true))).toBe(-1);
    });

    it("orders strings by code point", () => {
      expect(compareValues(s("B"), s("a"))).toBe(-1);
      expect(compareValues(s("ab"), s("a"))).toBe(1);
    });

    it("orders arrays by length first, then element by element", () => {
      expect(compareValues(arrayValue([n(9)]), arrayValue([n(1), n(1)]))).toBe(-1);
      expect(compareValues(arrayValue([n(1), n(3)]), arrayValue([n(1), n(2)]))).toBe(1);
      expect(compareValues(arrayValue([n(1)]), arrayValue([n(1)]))).toBe(0);
    });

    it("has no order across kinds or with NaN", () => {
      expect(compareValues(n(1), s("1"))).toBeUndefined();
      expect(compareValues(n(NaN), n(1))).toBeUndefined();
    });
  });

  describe("operators", () => {
    it("overloads + for numbers, strings and arrays", () => {
      expect(add(n(1), n(2))).toEqual(n(3));
      expect(add(s("a"), s("b"))).toEqual(s("ab"));
      expect(add(arrayValue([n(1)]), arrayValue([n(2)]))).toEqual(arrayValue([n(1), n(2)]));
    });

    it("does plain float arithmetic", () => {
      expect(subtract(n(5), n(7))).toEqual(n(-2));
      expect(multiply(n(2.5), n(4))).toEqual(n(10));
      expect(divide(n(1), n(4))).toEqual(n(0.25));
      expect(divide(n(1), n(0))).toEqual(n(Infinity));
    });

    it("truncates toward zero for div and mod", () => {
      expect(intDivide(n(-7), n(2))).toEqual(n(-3));
      expect(modulo(n(-7), n(2))).toEqual(n(-1));
      expect(modulo(n(7), n(-2))).toEqual(n(1));
    });

    it("applies xor, not and negation", () => {
      expect(xor(b(true), b(false))).toEqual(b(true));
      expect(xor(b(true), b(true))).toEqual(b(false));
      expect(logicalNot(b(false))).toEqual(b(true));
      expect(negate(n(3))).toEqual(n(-3));
    });

    it("raises a type mismatch naming the operator and operand kinds", () => {
      expect(() => add(n(1), s("x"))).toThrow(
        new EvaluationError("TypeMismatch", "Operator '+' cannot be applied to number and string")
      );
      expect(() => subtract(s("a"), s("b"))).toThrow(
        "Operator '-' cannot be applied to string and string"
      );
      expect(() => negate(b(true))).toThrow("Operator '-' cannot be applied to boolean");
      expect(() => logicalNot(n(1))).toThrow("Operator 'not' cannot be applied to number");
    });
  });

  describe("formatValue", () => {
    it("renders scalars", () => {
      expect(formatValue(b(true))).toBe("true");
      expect(formatValue(n(1.5))).toBe("1.5");
      expect(formatValue(s("raw text"))).toBe("raw text");
    });

    it("quotes strings inside arrays", () => {
      expect(formatValue(arrayValue([n(1), s("a"), b(true), arrayValue([])]))).toBe(
        "[1, 'a', true, []]"
      );
    });
  });

  describe("JSON conversion", () => {
    it("maps plain JSON onto values and back", () => {
      const value = fromJson([1, "two", [true]]);
      expect(value).toEqual(arrayValue([n(1), s("two"), arrayValue([b(true)])]));
      expect(toJson(value)).toEqual([1, "two", [true]]);
    });
  });
});
