import { describe, it, expect } from "vitest";
import { createStandardLibrary, parseCsvLine } from "./index.js";
import { evaluate } from "../engine/interpreter.js";
import { parse } from "../engine/parser.js";
import { tokenize } from "../engine/scanner.js";
import { arrayValue, booleanValue, numberValue, stringValue, type Value } from "../engine/value.js";

const env = createStandardLibrary({ seed: 1 });

function run(source: string): Value {
  return evaluate(env, parse(tokenize(source)));
}

function strings(...values: string[]): Value {
  return arrayValue(values.map(stringValue));
}

describe("string functions", () => {
  describe("chr / ord", () => {
    it("convert between ASCII characters and ordinals", () => {
      expect(run("chr(65)")).toEqual(stringValue("A"));
      expect(run("ord('A')")).toEqual(numberValue(65));
    });

    it("stay within ASCII", () => {
      expect(() => run("chr(127)")).toThrow("Function 'chr' failed: number is out of ASCII range");
      expect(() => run("ord('é')")).toThrow(
        "Function 'ord' failed: character is out of ASCII range"
      );
    });

    it("ord requires exactly one character", () => {
      expect(() => run("ord('ab')")).toThrow("Function 'ord' failed: expected a single character");
      expect(() => run("ord('')")).toThrow("Function 'ord' failed: expected a single character");
    });
  });

  it("changes case", () => {
    expect(run("lowercase('AbC')")).toEqual(stringValue("abc"));
    expect(run("uppercase('AbC')")).toEqual(stringValue("ABC"));
  });

  it("compares text case-insensitively", () => {
    expect(run("same_text('Hello', 'hELLO')")).toEqual(booleanValue(true));
    expect(run("same_text('Hello', 'help')")).toEqual(booleanValue(false));
  });

  it("splits on a separator, keeping empty fields", () => {
    expect(run("split('a,b,,c', ',')")).toEqual(strings("a", "b", "", "c"));
  });

  describe("split_csv", () => {
    it("splits on ';' by default and honours quotes", () => {
      expect(run(`split_csv('a;"b;c";d')`)).toEqual(strings("a", "b;c", "d"));
    });

    it("takes a single-character separator", () => {
      expect(run("split_csv('x,y', ',')")).toEqual(strings("x", "y"));
    });

    it("falls back to ';' for longer separators", () => {
      expect(run("split_csv('x,y', ',,')")).toEqual(strings("x,y"));
    });
  });

  it("parseCsvLine keeps a trailing empty field", () => {
    expect(parseCsvLine("a,", ",")).toEqual(["a", ""]);
    expect(parseCsvLine("", ",")).toEqual([""]);
  });

  it("trims whitespace", () => {
    expect(run("trim('  a  ')")).toEqual(stringValue("a"));
    expect(run("trim_left('  a  ')")).toEqual(stringValue("a  "));
    expect(run("trim_right('  a  ')")).toEqual(stringValue("  a"));
  });

  it("rejects non-string parameters", () => {
    expect(() => run("uppercase(1)")).toThrow("Function 'uppercase' failed: wrong parameter type");
  });
});
