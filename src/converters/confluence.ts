import { CommandError } from "../utils";
import type { Logger } from "../utils";
import { BaseConverter } from "./base";
import type { RenderScope } from "./base";
import type { ConversionContext } from "../types/converter";

const GEM = "asciidoctor-confluence";

/**
 * Confluence storage-format XHTML through the asciidoctor-confluence backend
 */
export class ConfluenceConverter extends BaseConverter {
  readonly name = "confluence";
  readonly priority = 2;
  protected readonly tools = ["asciidoctor"];

  outputExtension(): string {
    return ".xhtml";
  }

  async checkDependencies(logger: Logger): Promise<boolean> {
    try {
      const { stdout } = await this.run("gem", ["list", GEM]);
      if (!stdout.includes(GEM)) {
        logger.error(`${GEM} gem not found. Install with: gem install ${GEM}`);
        return false;
      }
    } catch (error) {
      if (!(error instanceof CommandError)) throw error;
      logger.error(`Confluence conversion requires RubyGems and the ${GEM} gem`);
      return false;
    }

    return super.checkDependencies(logger);
  }

  protected async render(context: ConversionContext, scope: RenderScope): Promise<string> {
    await this.exec(context, "asciidoctor", [
      "-r",
      GEM,
      "-b",
      "confluence",
      ...this.attributeArgs(context, { imagesdir: this.imagesDirectory(context) }),
      "-o",
      scope.artifact,
      context.mainDocument,
    ]);
    return scope.artifact;
  }
}
