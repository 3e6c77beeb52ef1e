// ─── Environment ───────────────────────────────────────────────────
// The host-supplied binding of names to variables and native functions.
// The engine only reads it: lookups are case-insensitive.

import type { Arity } from "./arity";
import type { Value } from "./value";

/**
 * A native function callable from expressions.
 * Receives already-evaluated parameters; signals failure by throwing a NativeError.
 */
export type NativeFunction = (params: readonly Value[]) => Value;

export interface FunctionDefinition {
  readonly name: string;
  readonly arity: Arity;
  readonly call: NativeFunction;
  /** Parameter list as declared, e.g. `(value: Number): Number`. */
  readonly params: string;
  /** Pure functions may be evaluated ahead of time by constant folding. */
  readonly pure: boolean;
}

/** Lookup contract the validator, optimizer and interpreter consult. */
export interface Environment {
  variable(name: string): Value | undefined;
  function(name: string): FunctionDefinition | undefined;
}

function parseDeclaration(declaration: string): { name: string; params: string } {
  const open = declaration.indexOf("(");
  if (open === -1) {
    return { name: declaration.trim(), params: "" };
  }
  return {
    name: declaration.slice(0, open).trim(),
    params: declaration.slice(open),
  };
}

/**
 * Builds a pure function definition from a declaration such as
 * `"max(left: Number, right: Number): Number"`. Without a `(` the whole
 * declaration is the name.
 */
export function defineFunction(
  call: NativeFunction,
  shape: Arity,
  declaration: string
): FunctionDefinition {
  return { ...parseDeclaration(declaration), arity: shape, call, pure: true };
}

/** Like {@link defineFunction}, for functions with side effects or randomness. */
export function defineImpure(
  call: NativeFunction,
  shape: Arity,
  declaration: string
): FunctionDefinition {
  return { ...defineFunction(call, shape, declaration), pure: false };
}

// ─── Static Environment ────────────────────────────────────────────

/**
 * An Environment whose variables and functions are all registered ahead of
 * evaluation. Names are stored lower-cased; the last registration wins.
 */
export class StaticEnvironment implements Environment {
  private readonly variables = new Map<string, Value>();
  private readonly functions = new Map<string, FunctionDefinition>();

  variable(name: string): Value | undefined {
    return this.variables.get(name.toLowerCase());
  }

  function(name: string): FunctionDefinition | undefined {
    return this.functions.get(name.toLowerCase());
  }

  addVariable(name: string, value: Value): this {
    this.variables.set(name.toLowerCase(), value);
    return this;
  }

  addVariables(variables: Readonly<Record<string, Value>>): this {
    for (const [name, value] of Object.entries(variables)) {
      this.addVariable(name, value);
    }
    return this;
  }

  /** Returns true if the variable existed. */
  removeVariable(name: string): boolean {
    return this.variables.delete(name.toLowerCase());
  }

  clearVariables(): void {
    this.variables.clear();
  }

  addFunction(definition: FunctionDefinition): this {
    const key = definition.name.toLowerCase();
    if (this.functions.has(key)) {
      console.warn(`[Environment] Replacing function "${definition.name}"`);
    }
    this.functions.set(key, definition);
    return this;
  }

  addFunctions(definitions: readonly FunctionDefinition[]): this {
    for (const definition of definitions) {
      this.addFunction(definition);
    }
    return this;
  }

  /** Returns true if the function existed. */
  removeFunction(name: string): boolean {
    return this.functions.delete(name.toLowerCase());
  }

  /** All registered functions, sorted by name. */
  listFunctions(): readonly FunctionDefinition[] {
    return Array.from(this.functions.entries())
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, definition]) => definition);
  }
}
