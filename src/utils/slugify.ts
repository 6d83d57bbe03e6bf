/**
 * Turn a heading into a file-name slug
 * Drops non-word characters and collapses whitespace/hyphen runs into "-"
 *
 * @example
 * slugify("1. Introduction and Goals") // "1-introduction-and-goals"
 */
export function slugify(title: string): string {
  return title
    .replace(/[^\w\s-]/g, "")
    .trim()
    .replace(/[-\s]+/g, "-")
    .toLowerCase();
}
