import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import AdmZip from "adm-zip";
import { Logger, ValidationError } from "../utils";
import { createDistributions } from "./package";

const logger = new Logger("error");
let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "docmatrix-package-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("createDistributions", () => {
  it("zips each format directory with paths relative to it", async () => {
    const formatDir = join(root, "build", "EN", "plain", "markdown_mp");
    await mkdir(join(formatDir, "chapters"), { recursive: true });
    await writeFile(join(formatDir, "index.md"), "# Index\n");
    await writeFile(join(formatDir, "chapters", "01-intro.md"), "# Intro\n");
    await mkdir(join(root, "build", "EN", "plain", "html"), { recursive: true });
    await writeFile(join(root, "build", "EN", "plain", "html", "doc.html"), "<p></p>");
    await writeFile(join(root, "build", "build-summary.json"), "{}");

    const archives = await createDistributions(join(root, "build"), join(root, "dist"), "template", logger);

    expect(archives).toEqual([
      join(root, "dist", "EN", "plain", "html", "template-EN-plain-html.zip"),
      join(root, "dist", "EN", "plain", "markdown_mp", "template-EN-plain-markdown_mp.zip"),
    ]);
    const entries = new AdmZip(archives[1])
      .getEntries()
      .filter((entry) => !entry.isDirectory)
      .map((entry) => entry.entryName)
      .sort();
    expect(entries).toEqual(["chapters/01-intro.md", "index.md"]);
  });

  it("returns nothing for an empty build tree", async () => {
    await mkdir(join(root, "build"));
    expect(await createDistributions(join(root, "build"), join(root, "dist"), "template", logger)).toEqual([]);
  });

  it("rejects a missing build directory", async () => {
    await expect(
      createDistributions(join(root, "missing"), join(root, "dist"), "template", logger),
    ).rejects.toBeInstanceOf(ValidationError);
  });
});
