import { BaseConverter } from "./base";
import type { RenderScope } from "./base";
import type { ConversionContext } from "../types/converter";

/**
 * Word document: asciidoctor renders HTML, pandoc converts it
 */
export class DocxConverter extends BaseConverter {
  readonly name = "docx";
  readonly priority = 1;
  protected readonly tools = ["asciidoctor", "pandoc"];

  protected async render(context: ConversionContext, scope: RenderScope): Promise<string> {
    const html = await this.renderHtml(context, scope);
    await this.pandoc(context, html, scope.artifact, "docx", [
      "--resource-path",
      this.imagesDirectory(context),
    ]);
    return scope.artifact;
  }
}
