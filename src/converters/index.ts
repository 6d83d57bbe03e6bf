/**
 * Converter exports and the default registry
 */

import { ConverterRegistry } from "./registry";
import type { ConverterOptions } from "./base";
import type { Converter, FormatName } from "../types/converter";
import { HtmlConverter } from "./html";
import { PdfConverter } from "./pdf";
import { DocxConverter } from "./docx";
import { MarkdownConverter } from "./markdown";
import { MarkdownMultiPageConverter } from "./markdown-multi-page";
import { AsciidocConverter } from "./asciidoc";
import { GithubMarkdownConverter } from "./github-markdown";
import { GithubMarkdownMultiPageConverter } from "./github-markdown-multi-page";
import { RstConverter } from "./rst";
import { TextileConverter } from "./textile";
import { ConfluenceConverter } from "./confluence";

export { ConverterRegistry } from "./registry";
export { BaseConverter, RenderScope } from "./base";
export type { ConverterOptions } from "./base";
export {
  HtmlConverter,
  PdfConverter,
  DocxConverter,
  MarkdownConverter,
  MarkdownMultiPageConverter,
  AsciidocConverter,
  GithubMarkdownConverter,
  GithubMarkdownMultiPageConverter,
  RstConverter,
  TextileConverter,
  ConfluenceConverter,
};

/**
 * Every supported format, in declaration order
 */
export const CONVERTERS = {
  html: (options) => new HtmlConverter(options),
  pdf: (options) => new PdfConverter(options),
  docx: (options) => new DocxConverter(options),
  markdown: (options) => new MarkdownConverter(options),
  markdown_mp: (options) => new MarkdownMultiPageConverter(options),
  asciidoc: (options) => new AsciidocConverter(options),
  github_markdown: (options) => new GithubMarkdownConverter(options),
  github_markdown_mp: (options) => new GithubMarkdownMultiPageConverter(options),
  rst: (options) => new RstConverter(options),
  textile: (options) => new TextileConverter(options),
  confluence: (options) => new ConfluenceConverter(options),
} satisfies Record<FormatName, (options: ConverterOptions) => Converter>;

/**
 * Build a frozen registry holding every converter
 */
export function createDefaultRegistry(options: ConverterOptions = {}): ConverterRegistry {
  const registry = new ConverterRegistry();
  for (const [name, create] of Object.entries(CONVERTERS)) {
    registry.register(name, create(options));
  }
  return registry.freeze();
}
