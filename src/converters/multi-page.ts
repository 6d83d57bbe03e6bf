/**
 * Multi-page Markdown
 * Renders one HTML document, splits it into chapters and converts each
 * chapter to its own Markdown file under chapters/, plus an index page
 */

import { readFile, writeFile, mkdir } from "fs/promises";
import { join } from "node:path";
import { BaseConverter } from "./base";
import type { RenderScope } from "./base";
import { splitChapters } from "./chapters";
import type { Chapter } from "./chapters";
import type { ConversionContext } from "../types/converter";

export interface IndexPage {
  title: string;
  language: string;
  flavor: string;
  chapters: Chapter[];
}

export abstract class MultiPageConverter extends BaseConverter {
  protected readonly tools = ["asciidoctor", "pandoc"];

  /** File name of the index page, relative to the output directory */
  protected abstract readonly indexFile: string;

  outputExtension(): string {
    return ".md";
  }

  protected artifactPath(context: ConversionContext): string {
    return join(context.outputDirectory, this.indexFile);
  }

  /** Pandoc writer and extra arguments for each chapter */
  protected abstract pandocTarget(context: ConversionContext): { to: string; args: string[] };

  protected abstract renderIndex(page: IndexPage): string;

  protected postProcess(_context: ConversionContext, markdown: string): string {
    return markdown;
  }

  protected async render(context: ConversionContext, scope: RenderScope): Promise<string> {
    const { to, args } = this.pandocTarget(context);

    const imagesdir = await this.publishImages(context);
    if (imagesdir === "images") scope.output(join(context.outputDirectory, "images"));

    const html = await this.renderHtml(context, scope, { imagesdir, sectids: true });
    const document = splitChapters(await readFile(html, "utf-8"));
    if (document.chapters.length === 0) {
      context.logger.warn("No level-2 headings found; the index page will list no chapters");
    }

    const chaptersDir = scope.output(join(context.outputDirectory, "chapters"));
    await mkdir(chaptersDir, { recursive: true });

    for (const chapter of document.chapters) {
      const chapterHtml = scope.intermediate(`chapter-${chapter.number}.html`);
      await writeFile(chapterHtml, chapter.html, "utf-8");

      const output = join(chaptersDir, chapter.fileName);
      await this.pandoc(context, chapterHtml, output, to, args);

      const markdown = await readFile(output, "utf-8");
      const processed = this.postProcess(context, markdown);
      if (processed !== markdown) {
        await writeFile(output, processed, "utf-8");
      }
      context.logger.debug(`Created chapter ${chapter.fileName}`);
    }

    await writeFile(
      scope.artifact,
      this.renderIndex({
        title: document.title || context.artifactName,
        language: context.language,
        flavor: context.flavor,
        chapters: document.chapters,
      }),
      "utf-8",
    );

    return scope.artifact;
  }
}
