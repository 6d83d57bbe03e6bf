import { MarkdownOptionsSchema } from "./markdown";
import { MultiPageConverter } from "./multi-page";
import type { IndexPage } from "./multi-page";
import type { ConversionContext } from "../types/converter";

export class MarkdownMultiPageConverter extends MultiPageConverter {
  readonly name = "markdown_mp";
  readonly priority = 1;
  protected readonly indexFile = "index.md";

  protected pandocTarget(context: ConversionContext): { to: string; args: string[] } {
    const { variant } = this.parseOptions(MarkdownOptionsSchema, context);
    return { to: variant, args: [] };
  }

  protected renderIndex(page: IndexPage): string {
    const lines = [`# ${page.title} - ${page.language} (${page.flavor})`, "", "## Chapters", ""];
    for (const chapter of page.chapters) {
      lines.push(`- [${chapter.title}](chapters/${chapter.fileName})`);
    }
    return lines.join("\n") + "\n";
  }
}
