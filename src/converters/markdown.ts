import { join } from "node:path";
import { z } from "zod";
import { BaseConverter } from "./base";
import type { RenderScope } from "./base";
import type { ConversionContext } from "../types/converter";

export const MarkdownOptionsSchema = z.object({
  variant: z.string().min(1).default("gfm"), // Pandoc writer, e.g. gfm, commonmark, markdown_strict
});

export class MarkdownConverter extends BaseConverter {
  readonly name = "markdown";
  readonly priority = 1;
  protected readonly tools = ["asciidoctor", "pandoc"];

  outputExtension(): string {
    return ".md";
  }

  protected async render(context: ConversionContext, scope: RenderScope): Promise<string> {
    const { variant } = this.parseOptions(MarkdownOptionsSchema, context);

    const imagesdir = await this.publishImages(context);
    if (imagesdir === "images") scope.output(join(context.outputDirectory, "images"));

    const html = await this.renderHtml(context, scope, { imagesdir });
    await this.pandoc(context, html, scope.artifact, variant);
    return scope.artifact;
  }
}
