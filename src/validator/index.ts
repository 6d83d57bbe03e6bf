/**
 * Validator
 * Pre-flight checks before a build and artifact checks after one
 */

import { runCommand } from "../utils";
import type { CommandRunner, Logger } from "../utils";
import type { BuildConfig } from "../types/config";
import { runPreflight } from "./preflight";
import { validateArtifacts } from "./artifacts";

export class Validator {
  constructor(
    private logger: Logger,
    private runner: CommandRunner = runCommand,
  ) {}

  preflight(config: BuildConfig): Promise<void> {
    return runPreflight(config, this.runner, this.logger);
  }

  validateArtifacts(buildDir: string): Promise<void> {
    return validateArtifacts(buildDir, this.runner, this.logger);
  }
}

export {
  checkTemplateStructure,
  checkReferences,
  checkImages,
  checkFonts,
  parseFontFamilies,
  runPreflight,
} from "./preflight";
export {
  validateMarkdownArtifacts,
  validateHtmlArtifacts,
  validateDocxArtifacts,
  validateArtifacts,
} from "./artifacts";
