import { BaseConverter } from "./base";
import type { RenderScope } from "./base";
import type { ConversionContext } from "../types/converter";

export class TextileConverter extends BaseConverter {
  readonly name = "textile";
  readonly priority = 3;
  protected readonly tools = ["asciidoctor", "pandoc"];

  protected async render(context: ConversionContext, scope: RenderScope): Promise<string> {
    const html = await this.renderHtml(context, scope);
    await this.pandoc(context, html, scope.artifact, "textile");
    return scope.artifact;
  }
}
