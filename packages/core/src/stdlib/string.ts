// ─── String Functions ──────────────────────────────────────────────

import { arity } from "../engine/arity";
import { defineFunction, type FunctionDefinition, type NativeFunction } from "../engine/environment";
import { NativeError } from "../engine/errors";
import { arrayValue, booleanValue, numberValue, stringValue, type Value } from "../engine/value";
import { numberParam, stringParam } from "./helpers";

function text(fn: (value: string) => string): NativeFunction {
  return (params) => stringValue(fn(stringParam(params, 0, 1)));
}

/** ASCII character for an ordinal in [0, 127). */
function chr(params: readonly Value[]): Value {
  const ordinal = numberParam(params, 0, 1);
  if (!(ordinal >= 0 && ordinal < 127)) {
    throw NativeError.custom("number is out of ASCII range");
  }
  return stringValue(String.fromCharCode(Math.trunc(ordinal)));
}

function ord(params: readonly Value[]): Value {
  const chars = Array.from(stringParam(params, 0, 1));
  const [char] = chars;
  if (char === undefined || chars.length > 1) {
    throw NativeError.custom("expected a single character");
  }
  const code = char.codePointAt(0) ?? 0;
  if (code > 127) {
    throw NativeError.custom("character is out of ASCII range");
  }
  return numberValue(code);
}

function sameText(params: readonly Value[]): Value {
  const left = stringParam(params, 0, 2);
  const right = stringParam(params, 1, 2);
  return booleanValue(left.toLowerCase() === right.toLowerCase());
}

function split(params: readonly Value[]): Value {
  const line = stringParam(params, 0, 2);
  const separator = stringParam(params, 1, 2);
  return arrayValue(line.split(separator).map(stringValue));
}

/**
 * Splits one CSV line. Double quotes toggle quoting and are dropped;
 * separators inside quotes belong to the field.
 */
export function parseCsvLine(line: string, separator: string): string[] {
  const fields: string[] = [];
  let field = "";
  let inQuotes = false;

  for (const char of line) {
    if (char === separator && !inQuotes) {
      fields.push(field);
      field = "";
    } else if (char === '"') {
      inQuotes = !inQuotes;
    } else {
      field += char;
    }
  }

  fields.push(field);
  return fields;
}

/** `split_csv(line, separator = ';')`. A separator that is not one character falls back to `;`. */
function splitCsv(params: readonly Value[]): Value {
  const line = stringParam(params, 0, 1);
  const custom = params[1];
  const separator =
    custom?.kind === "string" && Array.from(custom.value).length === 1 ? custom.value : ";";
  return arrayValue(parseCsvLine(line, separator).map(stringValue));
}

// ─── Registration ──────────────────────────────────────────────────

export function stringFunctions(): FunctionDefinition[] {
  return [
    defineFunction(chr, arity.required(1), "chr(ord: Number): String"),
    defineFunction(ord, arity.required(1), "ord(char: String): Number"),
    defineFunction(text((s) => s.toLowerCase()), arity.required(1), "lowercase(text: String): String"),
    defineFunction(text((s) => s.toUpperCase()), arity.required(1), "uppercase(text: String): String"),
    defineFunction(sameText, arity.required(2), "same_text(left: String, right: String): Boolean"),
    defineFunction(split, arity.required(2), "split(line: String, separator: String): Array<String>"),
    defineFunction(splitCsv, arity.optional(1, 1), "split_csv(line: String, separator: String = ';'): Array<String>"),
    defineFunction(text((s) => s.trim()), arity.required(1), "trim(text: String): String"),
    defineFunction(text((s) => s.trimStart()), arity.required(1), "trim_left(text: String): String"),
    defineFunction(text((s) => s.trimEnd()), arity.required(1), "trim_right(text: String): String"),
  ];
}
