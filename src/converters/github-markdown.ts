import { join } from "node:path";
import { readFile, writeFile } from "fs/promises";
import { z } from "zod";
import { BaseConverter } from "./base";
import type { RenderScope } from "./base";
import { optimizeForGithub } from "./github";
import type { ConversionContext } from "../types/converter";

export const GithubMarkdownOptionsSchema = z.object({
  optimizeForGithub: z.boolean().default(true),
});

export const GITHUB_PANDOC_ARGS = ["--wrap=preserve", "--markdown-headings=atx"];

/**
 * GitHub Flavored Markdown with GitHub anchors and alert blocks
 */
export class GithubMarkdownConverter extends BaseConverter {
  readonly name = "github_markdown";
  readonly priority = 2;
  protected readonly tools = ["asciidoctor", "pandoc"];

  outputExtension(): string {
    return ".md";
  }

  protected async render(context: ConversionContext, scope: RenderScope): Promise<string> {
    const options = this.parseOptions(GithubMarkdownOptionsSchema, context);

    const imagesdir = await this.publishImages(context);
    if (imagesdir === "images") scope.output(join(context.outputDirectory, "images"));

    const html = await this.renderHtml(context, scope, { imagesdir, sectids: true, toc: "left" });
    await this.pandoc(context, html, scope.artifact, "gfm", [
      ...GITHUB_PANDOC_ARGS,
      "--resource-path",
      context.outputDirectory,
    ]);

    if (options.optimizeForGithub) {
      const markdown = await readFile(scope.artifact, "utf-8");
      await writeFile(scope.artifact, optimizeForGithub(markdown), "utf-8");
    }

    return scope.artifact;
  }
}
