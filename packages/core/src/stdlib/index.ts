// ─── Standard Library ──────────────────────────────────────────────

import { StaticEnvironment, type FunctionDefinition } from "../engine/environment";
import { commonFunctions } from "./common";
import { mathFunctions } from "./math";
import { createRng } from "./prng";
import { regexFunctions } from "./regex";
import { stringFunctions } from "./string";
import { timeFunctions } from "./time";

export interface StandardLibraryOptions {
  /** Seed for `random` and `choice`. Defaults to the current time. */
  readonly seed?: number;
}

/** All standard library functions, in registration order. */
export function builtins(options: StandardLibraryOptions = {}): FunctionDefinition[] {
  const rng = createRng(options.seed ?? Date.now());
  return [
    ...commonFunctions(),
    ...mathFunctions(rng),
    ...stringFunctions(),
    ...timeFunctions(),
    ...regexFunctions(),
  ];
}

/** Registers every standard library function on an existing environment. */
export function extendEnvironment(
  environment: StaticEnvironment,
  options: StandardLibraryOptions = {}
): StaticEnvironment {
  return environment.addFunctions(builtins(options));
}

/** A fresh environment holding the standard library and no variables. */
export function createStandardLibrary(options: StandardLibraryOptions = {}): StaticEnvironment {
  return extendEnvironment(new StaticEnvironment(), options);
}

export { commonFunctions } from "./common";
export { mathFunctions } from "./math";
export { stringFunctions, parseCsvLine } from "./string";
export { timeFunctions } from "./time";
export { regexFunctions } from "./regex";
export { SeededRng, createRng } from "./prng";
export { STRING_OFFSET } from "./helpers";
