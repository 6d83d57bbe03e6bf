/**
 * Artifact Validation
 * Post-build checks over a build output tree
 */

import { readFile } from "fs/promises";
import { dirname, join, relative } from "node:path";
import glob from "fast-glob";
import * as cheerio from "cheerio";
import AdmZip from "adm-zip";
import { ArtifactValidationError, CommandError, ValidationError, fileExists, isDirectory } from "../utils";
import type { CommandRunner, Logger } from "../utils";

const REQUIRED_DOCX_ENTRIES = ["[Content_Types].xml", "word/document.xml"];
const REMOTE_SOURCE = /^(https?:\/\/|\/\/|data:)/;

async function findArtifacts(buildDir: string, pattern: string): Promise<string[]> {
  const files = await glob(pattern, { cwd: buildDir, absolute: true });
  return files.sort();
}

// ============================================================================
// Markdown
// ============================================================================

/**
 * Parse every Markdown file with pandoc
 */
export async function validateMarkdownArtifacts(
  buildDir: string,
  runner: CommandRunner,
  logger: Logger,
): Promise<void> {
  const files = await findArtifacts(buildDir, "**/*.md");
  if (files.length === 0) {
    logger.warn("No Markdown files found to validate");
    return;
  }

  const problems: string[] = [];
  for (const file of files) {
    try {
      await runner("pandoc", [file, "-t", "html", "-o", "/dev/null"]);
    } catch (error) {
      if (!(error instanceof CommandError)) throw error;
      if (error.result.notFound) {
        logger.warn("pandoc not found; skipping Markdown validation");
        return;
      }
      problems.push(`${relative(buildDir, file)}: ${error.diagnostics}`);
    }
  }

  if (problems.length > 0) {
    throw new ArtifactValidationError("Markdown", problems);
  }
  logger.info(`All ${files.length} Markdown files validated successfully`);
}

// ============================================================================
// HTML
// ============================================================================

/**
 * File path of a relative image reference: query and fragment dropped,
 * percent-escapes decoded (left as-is when malformed)
 */
export function localImagePath(src: string): string {
  const path = src.replace(/[?#].*$/, "");
  try {
    return decodeURIComponent(path);
  } catch (error) {
    if (!(error instanceof URIError)) throw error;
    return path;
  }
}

/**
 * Check every <img src> in HTML artifacts: remote sources are skipped,
 * absolute paths are flagged, relative paths must exist
 */
export async function validateHtmlArtifacts(buildDir: string, logger: Logger): Promise<void> {
  const files = await findArtifacts(buildDir, "**/*.html");
  if (files.length === 0) {
    logger.warn("No HTML files found to validate");
    return;
  }

  const problems: string[] = [];
  for (const file of files) {
    const name = relative(buildDir, file);
    const $ = cheerio.load(await readFile(file, "utf-8"));
    const sources = $("img[src]")
      .map((_, element) => $(element).attr("src") ?? "")
      .get();

    for (const src of sources) {
      if (REMOTE_SOURCE.test(src)) continue;

      if (src.startsWith("/")) {
        problems.push(`${name}: Image uses absolute path: ${src}`);
        continue;
      }

      if (!(await fileExists(join(dirname(file), localImagePath(src))))) {
        problems.push(`${name}: Missing image: ${src}`);
      }
    }

    logger.debug(`${name}: ${sources.length} image(s) checked`);
  }

  if (problems.length > 0) {
    throw new ArtifactValidationError("HTML", problems);
  }
  logger.info(`All ${files.length} HTML files validated successfully`);
}

// ============================================================================
// DOCX
// ============================================================================

/**
 * Open every DOCX as a ZIP archive and check its core parts
 */
export async function validateDocxArtifacts(buildDir: string, logger: Logger): Promise<void> {
  const files = await findArtifacts(buildDir, "**/*.docx");
  if (files.length === 0) {
    logger.warn("No DOCX files found to validate");
    return;
  }

  const problems: string[] = [];
  for (const file of files) {
    const name = relative(buildDir, file);

    let entries: string[];
    try {
      entries = new AdmZip(file).getEntries().map((entry) => entry.entryName);
    } catch {
      problems.push(`${name}: File is not a valid DOCX (corrupted ZIP)`);
      continue;
    }

    const missing = REQUIRED_DOCX_ENTRIES.filter((entry) => !entries.includes(entry));
    if (missing.length > 0) {
      problems.push(`${name}: Missing ${missing.join(", ")}`);
      continue;
    }

    const media = entries.filter((entry) => entry.startsWith("word/media/")).length;
    logger.debug(`${name}: ${media} embedded media file(s)`);
  }

  if (problems.length > 0) {
    throw new ArtifactValidationError("DOCX", problems);
  }
  logger.info(`All ${files.length} DOCX files validated successfully`);
}

// ============================================================================
// Suite
// ============================================================================

/**
 * Run every artifact check and raise one error listing all problems
 */
export async function validateArtifacts(
  buildDir: string,
  runner: CommandRunner,
  logger: Logger,
): Promise<void> {
  if (!(await isDirectory(buildDir))) {
    throw new ValidationError(`Build directory not found: ${buildDir}`, { path: buildDir });
  }

  logger.info("Validating build artifacts...");

  const checks = [
    () => validateMarkdownArtifacts(buildDir, runner, logger),
    () => validateHtmlArtifacts(buildDir, logger),
    () => validateDocxArtifacts(buildDir, logger),
  ];

  const problems: string[] = [];
  for (const check of checks) {
    try {
      await check();
    } catch (error) {
      if (!(error instanceof ArtifactValidationError)) throw error;
      problems.push(...error.problems.map((problem) => `[${error.artifactType}] ${problem}`));
    }
  }

  if (problems.length > 0) {
    throw new ArtifactValidationError("Build artifact", problems);
  }
  logger.info("Build artifact validation passed");
}
