/**
 * Package Module
 * Zips every built format directory into the distribution tree
 */

import { mkdir, writeFile } from "fs/promises";
import { join, resolve } from "node:path";
import glob from "fast-glob";
import AdmZip from "adm-zip";
import { ValidationError, isDirectory } from "../utils";
import type { Logger } from "../utils";

/**
 * Write {distDir}/{lang}/{flavor}/{format}/{artifactName}-{lang}-{flavor}-{format}.zip
 * for each {buildDir}/{lang}/{flavor}/{format} directory.
 * Entries are stored relative to the format directory.
 */
export async function createDistributions(
  buildDir: string,
  distDir: string,
  artifactName: string,
  logger: Logger,
): Promise<string[]> {
  const buildRoot = resolve(buildDir);
  if (!(await isDirectory(buildRoot))) {
    throw new ValidationError(`Build directory not found: ${buildRoot}`, { path: buildRoot });
  }

  const formatDirs = (await glob("*/*/*", { cwd: buildRoot, onlyDirectories: true })).sort();
  if (formatDirs.length === 0) {
    logger.warn(`No build output found in ${buildRoot}`);
    return [];
  }

  const archives: string[] = [];
  for (const relativeDir of formatDirs) {
    const [language, flavor, format] = relativeDir.split("/");

    const zip = new AdmZip();
    zip.addLocalFolder(join(buildRoot, relativeDir));

    const targetDir = join(resolve(distDir), language, flavor, format);
    const target = join(targetDir, `${artifactName}-${language}-${flavor}-${format}.zip`);
    await mkdir(targetDir, { recursive: true });
    await writeFile(target, zip.toBuffer());

    logger.debug(`Packaged ${relativeDir} into ${target}`);
    archives.push(target);
  }

  logger.info(`Created ${archives.length} distribution archive(s) in ${resolve(distDir)}`);
  return archives;
}
