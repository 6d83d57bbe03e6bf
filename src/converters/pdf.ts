import { z } from "zod";
import { BaseConverter } from "./base";
import type { RenderScope } from "./base";
import type { ConversionContext } from "../types/converter";

const PdfOptionsSchema = z.object({
  theme: z.string().optional(), // Path to an asciidoctor-pdf theme file
  fontsDir: z.string().optional(),
});

const CJK_LANGUAGES = new Set(["ZH", "JA", "KO"]);
const CYRILLIC_LANGUAGES = new Set(["RU", "UKR"]);

/**
 * Font script set asciidoctor-pdf needs for a language, if any
 */
export function scriptsFor(language: string): string | undefined {
  const code = language.toUpperCase();
  if (CJK_LANGUAGES.has(code)) return "cjk";
  if (CYRILLIC_LANGUAGES.has(code)) return "cyrillic";
  return undefined;
}

export class PdfConverter extends BaseConverter {
  readonly name = "pdf";
  readonly priority = 1;
  protected readonly tools = ["asciidoctor-pdf"];

  protected async render(context: ConversionContext, scope: RenderScope): Promise<string> {
    const options = this.parseOptions(PdfOptionsSchema, context);
    const overrides: Record<string, string> = { imagesdir: this.imagesDirectory(context) };

    const scripts = scriptsFor(context.language);
    if (scripts) overrides.scripts = scripts;

    if (options.theme) {
      overrides["pdf-theme"] = options.theme;
      if (options.fontsDir) overrides["pdf-fontsdir"] = options.fontsDir;
    } else {
      context.logger.debug(`Using the default PDF theme for ${context.language}`);
    }

    await this.exec(context, "asciidoctor-pdf", [
      "-b",
      "pdf",
      ...this.attributeArgs(context, overrides),
      "-o",
      scope.artifact,
      context.mainDocument,
    ]);
    return scope.artifact;
  }
}
