import { describe, it, expect } from "vitest";
import { chapterFileName, splitChapters } from "./chapters";
import { githubAnchor, optimizeForGithub } from "./github";

describe("splitChapters", () => {
  it("splits asciidoctor sections on h2", () => {
    const html = [
      "<body><h1>Guide</h1>",
      '<div class="sect1"><h2>Intro</h2><div class="sectionbody"><p>one</p></div></div>',
      '<div class="sect1"><h2>Usage</h2><div class="sectionbody"><p>two</p></div></div>',
      "</body>",
    ].join("");

    const document = splitChapters(html);

    expect(document.title).toBe("Guide");
    expect(document.chapters.map((c) => [c.number, c.title, c.fileName])).toEqual([
      [1, "Intro", "01-intro.md"],
      [2, "Usage", "02-usage.md"],
    ]);
    expect(document.chapters[0].html).toContain("<p>one</p>");
    expect(document.chapters[0].html).not.toContain("<p>two</p>");
  });

  it("splits flat documents on sibling headings", () => {
    const document = splitChapters("<body><h2>A</h2><p>x</p><h2>B</h2><p>y</p></body>");

    expect(document.title).toBe("");
    expect(document.chapters[0].html).toContain("<h2>A</h2><p>x</p>");
    expect(document.chapters[0].html).not.toContain("<p>y</p>");
  });

  it("returns no chapters without h2 headings", () => {
    expect(splitChapters("<p>plain</p>").chapters).toEqual([]);
  });
});

describe("chapterFileName", () => {
  it("pads the number and slugifies the title", () => {
    expect(chapterFileName(3, "Context & Scope")).toBe("03-context-scope.md");
    expect(chapterFileName(12, "Glossary")).toBe("12-glossary.md");
  });
});

describe("githubAnchor", () => {
  it("lowercases and hyphenates", () => {
    expect(githubAnchor("Quality Goals (Top 3)")).toBe("quality-goals-top-3");
  });
});

describe("optimizeForGithub", () => {
  it("converts every supported admonition label", () => {
    const input = ["**Note:** a", "**Warning:** b", "**Important:** c", "**Tip:** d", "**Caution:** e"].join("\n");
    expect(optimizeForGithub(input)).toBe(
      ["> [!NOTE] a", "> [!WARNING] b", "> [!IMPORTANT] c", "> [!TIP] d", "> [!CAUTION] e"].join("\n"),
    );
  });

  it("only converts labels at the start of a line", () => {
    expect(optimizeForGithub("text **Note:** inline")).toBe("text **Note:** inline");
  });
});
