import { GITHUB_PANDOC_ARGS, GithubMarkdownOptionsSchema } from "./github-markdown";
import { optimizeForGithub } from "./github";
import { MultiPageConverter } from "./multi-page";
import type { IndexPage } from "./multi-page";
import type { ConversionContext } from "../types/converter";

/**
 * Multi-page GitHub Markdown with a README.md table of contents
 */
export class GithubMarkdownMultiPageConverter extends MultiPageConverter {
  readonly name = "github_markdown_mp";
  readonly priority = 2;
  protected readonly indexFile = "README.md";

  protected pandocTarget(_context: ConversionContext): { to: string; args: string[] } {
    return { to: "gfm", args: GITHUB_PANDOC_ARGS };
  }

  protected postProcess(context: ConversionContext, markdown: string): string {
    const options = this.parseOptions(GithubMarkdownOptionsSchema, context);
    return options.optimizeForGithub ? optimizeForGithub(markdown) : markdown;
  }

  protected renderIndex(page: IndexPage): string {
    const lines = [
      `# ${page.title} - ${page.language} (${page.flavor})`,
      "",
      "## Table of Contents",
      "",
    ];
    for (const chapter of page.chapters) {
      lines.push(`${chapter.number}. [${chapter.title}](chapters/${chapter.fileName})`);
    }
    return lines.join("\n") + "\n";
  }
}
