import { cp, rename, rm } from "fs/promises";
import { fileExists } from "./fs";
import { IdGenerator } from "./id-generator";

const ids = new IdGenerator(8);

/**
 * Copy a directory tree into place through a unique staging directory.
 *
 * Concurrent tasks may populate the same destination; each copies into its
 * own sibling and renames it over the destination. When another copy wins
 * the rename, the staging copy is dropped.
 */
export async function copyDirectory(
  source: string,
  destination: string,
): Promise<void> {
  const staging = `${destination}.${ids.generate()}.tmp`;
  await cp(source, staging, { recursive: true });

  try {
    await rm(destination, { recursive: true, force: true });
    await rename(staging, destination);
  } catch (error) {
    await rm(staging, { recursive: true, force: true });
    if (!(await fileExists(destination))) {
      throw error;
    }
  }
}
