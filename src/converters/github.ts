/**
 * GitHub post-processing for generated Markdown
 */

const ALERTS: Record<string, string> = {
  Note: "NOTE",
  Warning: "WARNING",
  Important: "IMPORTANT",
  Tip: "TIP",
  Caution: "CAUTION",
};

/**
 * Convert an anchor to the lower-case hyphenated form GitHub generates
 * for headings
 *
 * @example
 * githubAnchor("Quality Goals (Top 3)") // "quality-goals-top-3"
 */
export function githubAnchor(anchor: string): string {
  return anchor
    .toLowerCase()
    .replace(/ /g, "-")
    .replace(/[^\w\s-]/g, "")
    .replace(/[-\s]+/g, "-");
}

/**
 * Rewrite internal anchor links and turn bold admonition labels
 * into GitHub alert blocks
 */
export function optimizeForGithub(markdown: string): string {
  let content = markdown.replace(/\(#([^)]+)\)/g, (_match, anchor: string) => `(#${githubAnchor(anchor)})`);

  for (const [label, alert] of Object.entries(ALERTS)) {
    content = content.replace(new RegExp(`^\\*\\*${label}:\\*\\*`, "gm"), `> [!${alert}]`);
  }

  return content;
}
