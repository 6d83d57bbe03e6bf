import { BaseConverter } from "./base";
import type { RenderScope } from "./base";
import type { ConversionContext } from "../types/converter";

/**
 * Standalone HTML5 page rendered by asciidoctor
 */
export class HtmlConverter extends BaseConverter {
  readonly name = "html";
  readonly priority = 1;
  protected readonly tools = ["asciidoctor"];

  protected async render(context: ConversionContext, scope: RenderScope): Promise<string> {
    await this.exec(context, "asciidoctor", [
      "-b",
      "html5",
      ...this.attributeArgs(context, { imagesdir: this.imagesDirectory(context) }),
      "-o",
      scope.artifact,
      context.mainDocument,
    ]);
    return scope.artifact;
  }
}
