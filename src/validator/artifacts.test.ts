import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import AdmZip from "adm-zip";
import { ArtifactValidationError, CommandError, Logger, ValidationError } from "../utils";
import type { CommandRunner } from "../utils";
import {
  localImagePath,
  validateArtifacts,
  validateDocxArtifacts,
  validateHtmlArtifacts,
  validateMarkdownArtifacts,
} from "./artifacts";

const logger = new Logger("error");
let buildDir: string;

async function write(relative: string, content: string | Buffer): Promise<string> {
  const path = join(buildDir, relative);
  await mkdir(join(path, ".."), { recursive: true });
  await writeFile(path, content);
  return path;
}

function docx(entries: string[]): Buffer {
  const zip = new AdmZip();
  for (const entry of entries) {
    zip.addFile(entry, Buffer.from("<xml/>"));
  }
  return zip.toBuffer();
}

async function problemsOf(promise: Promise<void>): Promise<string[]> {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof ArtifactValidationError)) {
    throw new Error(`Expected ArtifactValidationError, got ${String(error)}`);
  }
  return error.problems;
}

const okRunner: CommandRunner = async () => ({ stdout: "", stderr: "" });

beforeEach(async () => {
  buildDir = await mkdtemp(join(tmpdir(), "docmatrix-artifacts-"));
});

afterEach(async () => {
  await rm(buildDir, { recursive: true, force: true });
});

describe("validateMarkdownArtifacts", () => {
  it("collects every file pandoc rejects", async () => {
    await write("EN/plain/markdown/a.md", "# A\n");
    await write("EN/plain/markdown/b.md", "# B\n");
    await write("EN/plain/markdown/c.md", "# C\n");
    const runner: CommandRunner = async (command, args) => {
      if (args[0].endsWith("b.md") || args[0].endsWith("c.md")) {
        throw new CommandError(command, args, {
          exitCode: 64,
          stdout: "",
          stderr: "parse error",
          notFound: false,
          aborted: false,
        });
      }
      return { stdout: "", stderr: "" };
    };

    expect(await problemsOf(validateMarkdownArtifacts(buildDir, runner, logger))).toEqual([
      join("EN", "plain", "markdown", "b.md") + ": parse error",
      join("EN", "plain", "markdown", "c.md") + ": parse error",
    ]);
  });

  it("skips validation when pandoc is absent", async () => {
    await write("a.md", "# A\n");
    const runner: CommandRunner = async (command, args) => {
      throw new CommandError(command, args, {
        exitCode: null,
        stdout: "",
        stderr: "",
        notFound: true,
        aborted: false,
      });
    };

    await expect(validateMarkdownArtifacts(buildDir, runner, logger)).resolves.toBeUndefined();
  });
});

describe("validateHtmlArtifacts", () => {
  it("flags absolute and missing images and ignores remote ones", async () => {
    await write("EN/plain/html/images/ok.png", "png");
    await write(
      "EN/plain/html/page.html",
      [
        "<html><body>",
        '<img src="images/ok.png">',
        '<img src="images/missing.png">',
        '<img src="/abs/logo.png">',
        '<img src="https://example.com/x.png">',
        '<img src="//cdn.example.com/y.png">',
        '<img src="data:image/png;base64,AAAA">',
        "</body></html>",
      ].join("\n"),
    );

    const name = join("EN", "plain", "html", "page.html");
    expect(await problemsOf(validateHtmlArtifacts(buildDir, logger))).toEqual([
      `${name}: Missing image: images/missing.png`,
      `${name}: Image uses absolute path: /abs/logo.png`,
    ]);
  });

  it("passes pages without images", async () => {
    await write("index.html", "<p>text</p>");
    await expect(validateHtmlArtifacts(buildDir, logger)).resolves.toBeUndefined();
  });

  it("resolves encoded names and ignores query strings and fragments", async () => {
    await write("EN/plain/html/images/a b.png", "png");
    await write(
      "EN/plain/html/page.html",
      '<img src="images/a%20b.png"><img src="images/a%20b.png?v=1"><img src="images/a%20b.png#top">',
    );

    await expect(validateHtmlArtifacts(buildDir, logger)).resolves.toBeUndefined();
  });
});

describe("localImagePath", () => {
  it("drops the query and fragment and decodes escapes", () => {
    expect(localImagePath("images/a%20b.png?v=1#x")).toBe("images/a b.png");
  });

  it("keeps malformed escapes as written", () => {
    expect(localImagePath("images/100%.png")).toBe("images/100%.png");
  });
});

describe("validateDocxArtifacts", () => {
  it("accepts a document with its core parts", async () => {
    await write("doc.docx", docx(["[Content_Types].xml", "word/document.xml", "word/media/image1.png"]));
    await expect(validateDocxArtifacts(buildDir, logger)).resolves.toBeUndefined();
  });

  it("reports corrupted and incomplete documents together", async () => {
    await write("a-broken.docx", "not a zip");
    await write("b-partial.docx", docx(["[Content_Types].xml"]));

    expect(await problemsOf(validateDocxArtifacts(buildDir, logger))).toEqual([
      "a-broken.docx: File is not a valid DOCX (corrupted ZIP)",
      "b-partial.docx: Missing word/document.xml",
    ]);
  });
});

describe("validateArtifacts", () => {
  it("combines the problems of every check", async () => {
    await write("page.html", '<img src="/abs.png">');
    await write("doc.docx", "not a zip");

    const error = await validateArtifacts(buildDir, okRunner, logger).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ArtifactValidationError);
    if (!(error instanceof ArtifactValidationError)) return;
    expect(error.problems).toEqual([
      "[HTML] page.html: Image uses absolute path: /abs.png",
      "[DOCX] doc.docx: File is not a valid DOCX (corrupted ZIP)",
    ]);
    expect(error.message).toBe(
      "Build artifact validation failed for 2 issue(s):\n" +
        "[HTML] page.html: Image uses absolute path: /abs.png\n" +
        "[DOCX] doc.docx: File is not a valid DOCX (corrupted ZIP)",
    );
  });

  it("passes an empty build tree", async () => {
    await expect(validateArtifacts(buildDir, okRunner, logger)).resolves.toBeUndefined();
  });

  it("rejects a missing build directory", async () => {
    await expect(validateArtifacts(join(buildDir, "nope"), okRunner, logger)).rejects.toBeInstanceOf(
      ValidationError,
    );
  });
});
