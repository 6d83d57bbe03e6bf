import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CommandError, Logger, ValidationError, finalizeConfig, loadDefaultConfig, mergeConfig } from "../utils";
import type { CommandRunner } from "../utils";
import type { BuildConfig, PartialBuildConfig } from "../types/config";
import {
  checkFonts,
  checkImages,
  checkReferences,
  checkTemplateStructure,
  parseFontFamilies,
  runPreflight,
} from "./preflight";

const logger = new Logger("error");
let root: string;

async function configFor(override: PartialBuildConfig = {}): Promise<BuildConfig> {
  const base = await loadDefaultConfig();
  return finalizeConfig(
    mergeConfig(base, { ...override, template: { path: join(root, "template"), ...override.template } }),
  );
}

async function createLanguage(language: string): Promise<void> {
  const directory = join(root, "template", language);
  await mkdir(join(directory, "asciidoc"), { recursive: true });
  await writeFile(join(directory, "version.properties"), "revnumber=1.0\n");
  await writeFile(join(directory, "asciidoc", "template.adoc"), "= Template\n");
}

function notFound(command: string, args: string[]): CommandError {
  return new CommandError(command, args, {
    exitCode: null,
    stdout: "",
    stderr: "",
    notFound: true,
    aborted: false,
  });
}

const FONTS = "Noto Sans\nNoto Sans CJK SC,Noto Sans CJK SC Regular\nNoto Sans Mono\nLiberation Sans\n";

const passingRunner: CommandRunner = async (command) => ({
  stdout: command === "fc-list" ? FONTS : "",
  stderr: "",
});

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "docmatrix-preflight-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("checkTemplateStructure", () => {
  it("fails when the template root is missing", async () => {
    const config = await configFor();
    await expect(checkTemplateStructure(config)).rejects.toThrow(
      `Template directory not found: ${join(root, "template")}`,
    );
  });

  it("returns the layout of every language", async () => {
    await createLanguage("EN");
    await createLanguage("DE");
    const config = await configFor({ languages: ["EN", "DE"] });

    const layouts = await checkTemplateStructure(config);

    expect(layouts.map((l) => l.mainDocument)).toEqual([
      join(root, "template", "EN", "asciidoc", "template.adoc"),
      join(root, "template", "DE", "asciidoc", "template.adoc"),
    ]);
  });

  it("lists every missing path", async () => {
    await createLanguage("EN");
    await rm(join(root, "template", "EN", "version.properties"));
    await mkdir(join(root, "template", "FR"), { recursive: true });
    const config = await configFor({ languages: ["EN", "DE", "FR"] });

    const error = await checkTemplateStructure(config).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    if (!(error instanceof ValidationError)) return;
    expect(error.message.split("\n")).toEqual([
      "Template structure is invalid:",
      `  - Version file not found for EN: ${join(root, "template", "EN", "version.properties")}`,
      `  - Language directory not found for DE: ${join(root, "template", "DE")}`,
      `  - Version file not found for FR: ${join(root, "template", "FR", "version.properties")}`,
      `  - Source directory not found for FR: ${join(root, "template", "FR", "asciidoc")}`,
    ]);
  });
});

describe("checkReferences", () => {
  it("runs asciidoctor with warnings treated as failures", async () => {
    await createLanguage("EN");
    const [layout] = await checkTemplateStructure(await configFor());
    const calls: string[][] = [];
    const runner: CommandRunner = async (command, args) => {
      calls.push([command, ...args]);
      return { stdout: "", stderr: "" };
    };

    await checkReferences(layout, runner, logger);

    expect(calls).toEqual([["asciidoctor", layout.mainDocument, "-o", "/dev/null", "--failure-level", "WARN"]]);
  });

  it("raises a ValidationError carrying the diagnostics", async () => {
    await createLanguage("EN");
    const [layout] = await checkTemplateStructure(await configFor());
    const runner: CommandRunner = async (command, args) => {
      throw new CommandError(command, args, {
        exitCode: 1,
        stdout: "",
        stderr: "asciidoctor: WARNING: include file not found",
        notFound: false,
        aborted: false,
      });
    };

    const error = await checkReferences(layout, runner, logger).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    if (!(error instanceof ValidationError)) return;
    expect(error.message).toBe(`Broken references detected in ${layout.mainDocument}`);
    expect(error.details?.diagnostics).toBe("asciidoctor: WARNING: include file not found");
  });

  it("skips the check when asciidoctor is absent", async () => {
    await createLanguage("EN");
    const [layout] = await checkTemplateStructure(await configFor());
    const runner: CommandRunner = async (command, args) => {
      throw notFound(command, args);
    };

    await expect(checkReferences(layout, runner, logger)).resolves.toBeUndefined();
  });
});

describe("checkImages", () => {
  it("reports references found neither beside the sources nor under images/", async () => {
    await createLanguage("EN");
    const directory = join(root, "template", "EN");
    await mkdir(join(directory, "images"));
    await writeFile(join(directory, "images", "logo.png"), "png");
    await writeFile(join(directory, "diagram.svg"), "svg");
    await writeFile(
      join(directory, "asciidoc", "chapter.adoc"),
      "image::logo.png[Logo]\nimage::missing.png[]\nSee image:diagram.svg[] and image:gone.svg[].\n",
    );
    const [layout] = await checkTemplateStructure(await configFor());

    expect(await checkImages(layout, logger)).toEqual(["gone.svg", "missing.png"]);
  });

  it("skips languages without an images directory", async () => {
    await createLanguage("EN");
    await writeFile(join(root, "template", "EN", "asciidoc", "chapter.adoc"), "image::missing.png[]\n");
    const [layout] = await checkTemplateStructure(await configFor());

    expect(await checkImages(layout, logger)).toEqual([]);
  });
});

describe("parseFontFamilies", () => {
  it("splits comma-separated aliases", () => {
    expect([...parseFontFamilies("Noto Sans CJK SC,Noto Sans CJK SC Regular\nDejaVu Sans\n")]).toEqual([
      "Noto Sans CJK SC",
      "Noto Sans CJK SC Regular",
      "DejaVu Sans",
    ]);
  });
});

describe("checkFonts", () => {
  it("passes when every family is installed", async () => {
    await expect(checkFonts(["Noto Sans", "Liberation Sans"], passingRunner, logger)).resolves.toBeUndefined();
  });

  it("does not treat a longer family name as the required one", async () => {
    const runner: CommandRunner = async () => ({ stdout: "Noto Sans CJK SC\n", stderr: "" });
    await expect(checkFonts(["Noto Sans"], runner, logger)).rejects.toThrow("Missing required fonts: Noto Sans");
  });

  it("skips the check when fc-list cannot run", async () => {
    const runner: CommandRunner = async (command, args) => {
      throw notFound(command, args);
    };
    await expect(checkFonts(["Noto Sans"], runner, logger)).resolves.toBeUndefined();
  });
});

describe("runPreflight", () => {
  it("passes on a complete template", async () => {
    await createLanguage("EN");
    await expect(runPreflight(await configFor(), passingRunner, logger)).resolves.toBeUndefined();
  });

  it("does not ask for fonts when font verification is off", async () => {
    await createLanguage("EN");
    const commands: string[] = [];
    const runner: CommandRunner = async (command) => {
      commands.push(command);
      return { stdout: "", stderr: "" };
    };

    await runPreflight(await configFor({ build: { verifyFonts: false } }), runner, logger);

    expect(commands).toEqual(["asciidoctor"]);
  });
});
