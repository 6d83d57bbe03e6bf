import { assembleToFile } from "../assembly";
import { BaseConverter } from "./base";
import type { RenderScope } from "./base";
import type { ConversionContext } from "../types/converter";

/**
 * Single self-contained AsciiDoc file with every include inlined.
 * Needs no external tool.
 */
export class AsciidocConverter extends BaseConverter {
  readonly name = "asciidoc";
  readonly priority = 1;
  protected readonly tools: readonly string[] = [];

  outputExtension(): string {
    return ".adoc";
  }

  protected async render(context: ConversionContext, scope: RenderScope): Promise<string> {
    const result = await assembleToFile(context.mainDocument, scope.artifact, {
      baseDirectory: context.sourceDirectory,
      flavor: context.flavor,
      attributes: context.attributes,
      values: context.versionProps,
      maxDepth: context.assembly.maxDepth,
      mode: context.assembly.mode,
    });

    for (const diagnostic of result.diagnostics) {
      context.logger.warn(`${diagnostic.file}:${diagnostic.line}: ${diagnostic.message}`);
    }
    context.logger.debug(`Inlined ${result.includes} include(s) from ${result.files.length} file(s)`);

    return scope.artifact;
  }
}
