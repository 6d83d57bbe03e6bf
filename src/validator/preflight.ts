/**
 * Pre-flight Checks
 * Verifies the template tree and the build environment before any task runs
 */

import { readFile } from "fs/promises";
import { join, resolve } from "node:path";
import glob from "fast-glob";
import {
  CommandError,
  ValidationError,
  fileExists,
  isDirectory,
  isFile,
  languageLayout,
} from "../utils";
import type { CommandRunner, LanguageLayout, Logger } from "../utils";
import type { BuildConfig } from "../types/config";

const IMAGE_PATTERN = /image::?([^\[\]\s][^\[\]]*)\[/g;

// ============================================================================
// Template structure
// ============================================================================

/**
 * Check the template root and, for every language, its directory,
 * version file, source directory and main document.
 * Throws one ValidationError listing every missing path.
 */
export async function checkTemplateStructure(config: BuildConfig): Promise<LanguageLayout[]> {
  const root = resolve(config.template.path);
  if (!(await isDirectory(root))) {
    throw new ValidationError(`Template directory not found: ${root}`, { path: root });
  }

  const layouts = config.languages.map((language) => languageLayout(config.template, language));
  const problems: string[] = [];

  for (const layout of layouts) {
    if (!(await isDirectory(layout.directory))) {
      problems.push(`Language directory not found for ${layout.language}: ${layout.directory}`);
      continue;
    }
    if (!(await isFile(layout.versionFile))) {
      problems.push(`Version file not found for ${layout.language}: ${layout.versionFile}`);
    }
    if (!(await isDirectory(layout.sourceDirectory))) {
      problems.push(`Source directory not found for ${layout.language}: ${layout.sourceDirectory}`);
    } else if (!(await isFile(layout.mainDocument))) {
      problems.push(`Main document not found for ${layout.language}: ${layout.mainDocument}`);
    }
  }

  if (problems.length > 0) {
    throw new ValidationError(`Template structure is invalid:\n  - ${problems.join("\n  - ")}`, {
      problems,
    });
  }

  return layouts;
}

// ============================================================================
// References
// ============================================================================

/**
 * Dry-run asciidoctor over the main document, failing on any warning
 * (missing includes, unresolved references)
 */
export async function checkReferences(
  layout: LanguageLayout,
  runner: CommandRunner,
  logger: Logger,
): Promise<void> {
  const args = [layout.mainDocument, "-o", "/dev/null", "--failure-level", "WARN"];

  try {
    await runner("asciidoctor", args, { cwd: layout.sourceDirectory });
    logger.debug(`References resolved for ${layout.language}`);
  } catch (error) {
    if (!(error instanceof CommandError)) throw error;

    if (error.result.notFound) {
      logger.warn(`asciidoctor not found; skipping reference check for ${layout.language}`);
      return;
    }

    logger.error(`Reference check failed for ${layout.mainDocument}:\n${error.diagnostics}`);
    throw new ValidationError(`Broken references detected in ${layout.mainDocument}`, {
      language: layout.language,
      diagnostics: error.diagnostics,
    });
  }
}

/**
 * Find image references that exist neither relative to the language
 * directory nor inside its images/ directory. Missing images are warnings.
 */
export async function checkImages(layout: LanguageLayout, logger: Logger): Promise<string[]> {
  const imagesDir = join(layout.directory, "images");
  if (!(await isDirectory(imagesDir))) {
    logger.debug(`No images directory for ${layout.language}; skipping image check`);
    return [];
  }

  const files = await glob("**/*.adoc", { cwd: layout.directory, absolute: true });
  const references = new Set<string>();

  for (const file of files) {
    const content = await readFile(file, "utf-8");
    for (const match of content.matchAll(IMAGE_PATTERN)) {
      references.add(match[1].trim());
    }
  }

  const missing: string[] = [];
  for (const reference of [...references].sort()) {
    const found =
      (await fileExists(join(layout.directory, reference))) ||
      (await fileExists(join(imagesDir, reference)));
    if (!found) missing.push(reference);
  }

  if (missing.length > 0) {
    logger.warn(`Missing image files for ${layout.language}:\n  ${missing.join("\n  ")}`);
  } else {
    logger.debug(`All ${references.size} referenced images found for ${layout.language}`);
  }

  return missing;
}

// ============================================================================
// Fonts
// ============================================================================

/**
 * Parse `fc-list : family` output into the set of installed family names
 */
export function parseFontFamilies(output: string): Set<string> {
  const families = new Set<string>();
  for (const line of output.split("\n")) {
    for (const family of line.split(",")) {
      const name = family.replace(/\\-/g, "-").trim();
      if (name) families.add(name);
    }
  }
  return families;
}

/**
 * Verify required font families are installed.
 * Skipped with a warning when fc-list cannot run.
 */
export async function checkFonts(
  required: readonly string[],
  runner: CommandRunner,
  logger: Logger,
): Promise<void> {
  let output: string;
  try {
    output = (await runner("fc-list", [":", "family"])).stdout;
  } catch (error) {
    if (!(error instanceof CommandError)) throw error;
    logger.warn("fc-list is unavailable; the font environment can't be checked");
    return;
  }

  const installed = parseFontFamilies(output);
  const missing = required.filter((font) => !installed.has(font));

  if (missing.length > 0) {
    throw new ValidationError(`Missing required fonts: ${missing.join(", ")}`, { missing });
  }

  logger.debug(`All ${required.length} required fonts are installed`);
}

// ============================================================================
// Suite
// ============================================================================

export async function runPreflight(
  config: BuildConfig,
  runner: CommandRunner,
  logger: Logger,
): Promise<void> {
  logger.info("Running pre-flight validation...");

  const layouts = await checkTemplateStructure(config);

  for (const layout of layouts) {
    await checkReferences(layout, runner, logger);
    if (config.validation.checkImages) {
      await checkImages(layout, logger);
    }
  }

  if (config.build.verifyFonts) {
    await checkFonts(config.validation.requiredFonts, runner, logger);
  } else {
    logger.warn("Skipping font verification");
  }

  logger.info("All validations passed");
}
