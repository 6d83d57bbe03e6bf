/**
 * Include and conditional directive parsing
 * Only the directive lines the assembler cares about are recognised;
 * everything else is passed through as plain text.
 */

export interface IncludeDirective {
  type: "include";
  raw: string; // Directive text as written, trimmed
  target: string;
  attributes: string;
}

export type ConditionalKind = "ifdef" | "ifndef" | "ifeval" | "endif";

export interface ConditionalDirective {
  type: "conditional";
  kind: ConditionalKind;
  raw: string;
  names: string; // "a", "a,b" (any) or "a+b" (all); expression for ifeval
  content: string; // Inline content of the single-line form
}

const INCLUDE_PATTERN = /^include::([^\[\s][^\[]*)\[(.*)\]\s*$/;
const CONDITIONAL_PATTERN = /^(ifdef|ifndef|ifeval|endif)::([^\[]*)\[(.*)\]\s*$/;

export function parseInclude(line: string): IncludeDirective | null {
  const match = line.match(INCLUDE_PATTERN);
  if (!match) return null;

  return {
    type: "include",
    raw: line.trim(),
    target: match[1].trim(),
    attributes: match[2],
  };
}

export function parseConditional(line: string): ConditionalDirective | null {
  const match = line.match(CONDITIONAL_PATTERN);
  if (!match) return null;

  const kind = match[1];
  if (kind !== "ifdef" && kind !== "ifndef" && kind !== "ifeval" && kind !== "endif") {
    return null;
  }

  return {
    type: "conditional",
    kind,
    raw: line.trim(),
    names: kind === "ifeval" ? match[3] : match[2].trim(),
    content: kind === "ifeval" ? "" : match[3],
  };
}

/**
 * Decide whether an ifdef-style name list is satisfied.
 * "a,b" is satisfied when any name is defined, "a+b" when all are.
 */
export function namesDefined(names: string, defined: ReadonlySet<string>): boolean {
  if (names.includes(",")) {
    return names
      .split(",")
      .map((n) => n.trim())
      .some((n) => n.length > 0 && defined.has(n));
  }
  if (names.includes("+")) {
    return names
      .split("+")
      .map((n) => n.trim())
      .every((n) => n.length > 0 && defined.has(n));
  }
  return defined.has(names);
}

/**
 * Replace {name} references with attribute values.
 * Unknown references are left as written.
 */
export function substituteAttributes(text: string, values: Readonly<Record<string, string>>): string {
  return text.replace(/\{([A-Za-z0-9_][A-Za-z0-9_-]*)\}/g, (reference, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : reference,
  );
}
