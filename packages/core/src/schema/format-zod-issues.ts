// ─── Issue Formatting ──────────────────────────────────────────────
// One-line messages for zod failures at the parse boundaries (wire trees,
// variables files).

/** The part of a zod issue the message needs. */
interface IssueLike {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

function formatPath(path: readonly (string | number)[]): string {
  let text = "";
  for (const segment of path) {
    if (typeof segment === "number") text += `[${segment}]`;
    else text += text.length > 0 ? `.${segment}` : segment;
  }
  return text.length > 0 ? text : "(root)";
}

/**
 * Renders each issue as `path: message`, where array indices are
 * bracketed and an empty path reads `(root)`.
 *
 * @example
 * formatZodIssues("expression tree", [{ path: ["params", 0, "type"], message: "Required" }])
 * // => "Invalid expression tree: params[0].type: Required"
 */
export function formatZodIssues(subject: string, issues: readonly IssueLike[]): string {
  const details = issues.map((issue) => `${formatPath(issue.path)}: ${issue.message}`);
  return `Invalid ${subject}: ${details.join("; ")}`;
}
