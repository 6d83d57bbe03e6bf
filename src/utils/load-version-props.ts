import { readFile } from "fs/promises";
import { fileExists } from "./fs";
import type { Logger } from "./logger";

/**
 * Parse `key=value` lines into a flat map.
 * The first "=" separates key from value; lines without one are ignored.
 *
 * @example
 * parseVersionProps("revnumber=9.0-EN\nrevdate=July 2025")
 * // { revnumber: "9.0-EN", revdate: "July 2025" }
 */
export function parseVersionProps(content: string): Record<string, string> {
  const props: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const separator = line.indexOf("=");
    if (separator === -1) continue;

    const key = line.slice(0, separator).trim();
    if (!key) continue;
    props[key] = line.slice(separator + 1).trim();
  }

  return props;
}

/**
 * Load a language's version metadata.
 * A missing file is not an error: it logs a warning and yields an empty map.
 */
export async function loadVersionProps(
  path: string,
  logger: Logger,
): Promise<Record<string, string>> {
  if (!(await fileExists(path))) {
    logger.warn(`Version metadata not found: ${path}`);
    return {};
  }

  return parseVersionProps(await readFile(path, "utf-8"));
}
