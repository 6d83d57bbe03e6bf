import { join, resolve } from "node:path";
import type { TemplateConfig } from "../types/config";

export interface LanguageLayout {
  language: string;
  directory: string; // {template}/{language}
  versionFile: string;
  sourceDirectory: string; // {template}/{language}/{sourceDir}
  mainDocument: string;
}

/**
 * Where a language's sources live inside the template tree
 */
export function languageLayout(template: TemplateConfig, language: string): LanguageLayout {
  const directory = join(resolve(template.path), language);
  const sourceDirectory = join(directory, template.sourceDir);

  return {
    language,
    directory,
    versionFile: join(directory, template.versionFile),
    sourceDirectory,
    mainDocument: join(sourceDirectory, template.mainDocument),
  };
}
