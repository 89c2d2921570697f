/**
 * Classification of yq stderr.
 *
 * The patterns match messages of the pinned release (see DEFAULT_YQ_VERSION) and must be
 * rechecked whenever it changes. Anything unmatched lands in NON_ZERO_EXIT.
 */

import type { QueryErrorKind } from "../errors";

export type DiagnosticTag =
  | "toml-scalars-only"
  | "unknown-format"
  | "expression-lexer"
  | "expression-syntax"
  | "expression-arguments"
  | "expression-unknown-operator";

export interface DiagnosticRule {
  readonly tag: DiagnosticTag;
  readonly kind: Extract<QueryErrorKind, "MALFORMED_EXPRESSION" | "UNSUPPORTED_FORMAT">;
  readonly pattern: RegExp;
}

export const YQ_DIAGNOSTICS: readonly DiagnosticRule[] = [
  // TOML encoder cannot write tables or arrays of tables
  { tag: "toml-scalars-only", kind: "UNSUPPORTED_FORMAT", pattern: /only scalars/i },
  {
    tag: "unknown-format",
    kind: "UNSUPPORTED_FORMAT",
    pattern: /unknown (?:input |output )?format|unsupported format/i,
  },
  { tag: "expression-lexer", kind: "MALFORMED_EXPRESSION", pattern: /lexer: invalid input/i },
  { tag: "expression-syntax", kind: "MALFORMED_EXPRESSION", pattern: /bad expression/i },
  {
    tag: "expression-arguments",
    kind: "MALFORMED_EXPRESSION",
    pattern: /expects? \d+ args?|wrong number of arguments/i,
  },
  {
    tag: "expression-unknown-operator",
    kind: "MALFORMED_EXPRESSION",
    pattern: /unknown operator|could not find matching/i,
  },
];

export interface Diagnosis {
  readonly kind: QueryErrorKind;
  /** Matching rule, null for the unclassified bucket */
  readonly tag: DiagnosticTag | null;
}

/**
 * Classify the stderr of a failed run. The first matching rule wins.
 */
export function classifyStderr(stderr: string): Diagnosis {
  const rule = YQ_DIAGNOSTICS.find((candidate) => candidate.pattern.test(stderr));
  return rule ? { kind: rule.kind, tag: rule.tag } : { kind: "NON_ZERO_EXIT", tag: null };
}

/**
 * Readable one-line message from yq stderr: the first line without its `Error: `
 * prefix, followed by up to two more lines in parentheses.
 *
 * @example
 * cleanStderr("Error: bad expression\nat line 1\n")  // "bad expression (at line 1)"
 */
export function cleanStderr(stderr: string): string {
  if (stderr === "") {
    return "Unknown error (no stderr output)";
  }

  const lines = stderr
    .trim()
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "");
  const [first, ...rest] = lines;
  if (first === undefined) {
    return "Unknown error (empty stderr)";
  }

  const main = first.startsWith("Error: ") ? first.slice("Error: ".length) : first;
  return rest.length > 0 ? `${main} (${rest.slice(0, 2).join(" | ")})` : main;
}
