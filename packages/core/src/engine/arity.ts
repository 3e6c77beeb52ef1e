// ─── Arity ─────────────────────────────────────────────────────────
// Accepted parameter-count shape of a native function. An exact count
// is the degenerate polyadic case with no optional parameters.

export type Arity =
  | { readonly kind: "polyadic"; readonly required: number; readonly optional: number }
  | { readonly kind: "variadic" }
  | { readonly kind: "none" };

export const arity = {
  /** Exactly `count` parameters. */
  required(count: number): Arity {
    return { kind: "polyadic", required: count, optional: 0 };
  },

  /** Between `required` and `required + optional` parameters. */
  optional(required: number, optional: number): Arity {
    return { kind: "polyadic", required, optional };
  },

  /** Any number of parameters, including none. */
  variadic(): Arity {
    return { kind: "variadic" };
  },

  /** No parameters at all. */
  none(): Arity {
    return { kind: "none" };
  },
} as const;

export function acceptsParamCount(shape: Arity, count: number): boolean {
  switch (shape.kind) {
    case "variadic":
      return true;
    case "none":
      return count === 0;
    case "polyadic":
      return count >= shape.required && count <= shape.required + shape.optional;
  }
}

/** "2", "1-2", "any" or "0". */
export function formatArity(shape: Arity): string {
  switch (shape.kind) {
    case "variadic":
      return "any";
    case "none":
      return "0";
    case "polyadic":
      return shape.optional === 0
        ? String(shape.required)
        : `${shape.required}-${shape.required + shape.optional}`;
  }
}
