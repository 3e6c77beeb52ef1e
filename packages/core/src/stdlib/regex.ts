// ─── Regex Functions ───────────────────────────────────────────────
// Matching and replacement on Strings. Patterns use JavaScript RegExp
// syntax and are compiled with the `u` flag.

import { arity } from "../engine/arity";
import { defineFunction, type FunctionDefinition } from "../engine/environment";
import { NativeError } from "../engine/errors";
import { arrayValue, booleanValue, stringValue, type Value } from "../engine/value";
import { defaultNumber, defaultString, stringParam } from "./helpers";

function compilePattern(pattern: string, flags: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    if (error instanceof SyntaxError) throw NativeError.custom(error.message);
    throw error;
  }
}

/** Number of capture groups, counted by matching the empty string. */
function groupCount(pattern: string): number {
  const match = compilePattern(`(?:${pattern})|`, "u").exec("");
  return match === null ? 0 : match.length - 1;
}

function isMatch(params: readonly Value[]): Value {
  const haystack = stringParam(params, 0, 2);
  const pattern = compilePattern(stringParam(params, 1, 2), "u");
  return booleanValue(pattern.test(haystack));
}

/** Every non-overlapping match, left to right. */
function find(params: readonly Value[]): Value {
  const haystack = stringParam(params, 0, 2);
  const pattern = compilePattern(stringParam(params, 1, 2), "gu");
  return arrayValue(Array.from(haystack.matchAll(pattern), (match) => stringValue(match[0])));
}

/**
 * The first match followed by each capture group. Groups that took no part
 * are empty strings; without a match every entry is empty.
 */
function capture(params: readonly Value[]): Value {
  const haystack = stringParam(params, 0, 2);
  const source = stringParam(params, 1, 2);
  const match = compilePattern(source, "u").exec(haystack);
  if (match === null) {
    return arrayValue(Array.from({ length: groupCount(source) + 1 }, () => stringValue("")));
  }
  return arrayValue(Array.from(match, (group) => stringValue(group ?? "")));
}

/**
 * Expands `$n`, `${n}`, `$name` and `${name}` from the match; `$$` is a
 * literal dollar. Unknown groups expand to nothing.
 */
function expandReplacement(template: string, match: RegExpMatchArray): string {
  return template.replace(
    /\$(?:(\$)|\{([^}]*)\}|([A-Za-z0-9_]+))/g,
    (_text, dollar: string | undefined, braced: string | undefined, bare: string | undefined) => {
      if (dollar !== undefined) return "$";
      const name = braced ?? bare ?? "";
      if (/^\d+$/.test(name)) return match[Number(name)] ?? "";
      return match.groups?.[name] ?? "";
    }
  );
}

/** `re_replace(haystack, pattern, replacement = '', limit = 0)`; a limit of 0 replaces all. */
function replace(params: readonly Value[]): Value {
  const haystack = stringParam(params, 0, 2);
  const pattern = compilePattern(stringParam(params, 1, 2), "gu");
  const replacement = defaultString(params, 2, "");
  const limit = Math.max(0, Math.trunc(defaultNumber(params, 3, 0)));

  let result = "";
  let last = 0;
  let replaced = 0;
  for (const match of haystack.matchAll(pattern)) {
    if (limit > 0 && replaced === limit) break;
    const start = match.index ?? last;
    result += haystack.slice(last, start) + expandReplacement(replacement, match);
    last = start + match[0].length;
    replaced++;
  }
  return stringValue(result + haystack.slice(last));
}

// ─── Registration ──────────────────────────────────────────────────

export function regexFunctions(): FunctionDefinition[] {
  return [
    defineFunction(isMatch, arity.required(2), "re_is_match(haystack: String, pattern: String): Boolean"),
    defineFunction(find, arity.required(2), "re_find(haystack: String, pattern: String): Array<String>"),
    defineFunction(capture, arity.required(2), "re_capture(haystack: String, pattern: String): Array<String>"),
    defineFunction(replace, arity.optional(2, 2), "re_replace(haystack: String, pattern: String, replacement: String = '', limit: Number = 0): String"),
  ];
}
