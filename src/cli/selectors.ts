/**
 * Build selectors - narrow the configured matrix from the command line
 */

import { finalizeConfig, mergeConfig } from "../utils";
import type { Logger } from "../utils";
import { isFormatName } from "../types";
import type { BuildConfig, FormatSpec } from "../types";
import { CONVERTERS } from "../converters";

export interface BuildSelectors {
  lang?: string[];
  format?: string[];
  flavor?: string[];
  all?: boolean;
}

export function hasSelectors(selectors: BuildSelectors): boolean {
  return Boolean(selectors.all || selectors.lang?.length || selectors.format?.length || selectors.flavor?.length);
}

function narrow(kind: string, configured: readonly string[], selected: string[] | undefined, logger: Logger): string[] {
  if (!selected?.length) return [...configured];

  for (const value of selected) {
    if (!configured.includes(value)) {
      logger.warn(`Ignoring ${kind} not in the configuration: ${value}`);
    }
  }
  return configured.filter((value) => selected.includes(value));
}

/**
 * Keep only the selected languages, flavors and formats.
 * A selected format is enabled even when the configuration disables it;
 * unknown format names are ignored with a warning.
 */
export function narrowConfig(config: BuildConfig, selectors: BuildSelectors, logger: Logger): BuildConfig {
  let formats: Record<string, FormatSpec> = { ...config.formats };

  if (selectors.format?.length) {
    formats = {};
    for (const name of selectors.format) {
      if (!isFormatName(name)) {
        logger.warn(`Ignoring unknown format: ${name}`);
        continue;
      }
      const spec = config.formats[name];
      formats[name] = spec
        ? { ...spec, enabled: true }
        : { enabled: true, priority: CONVERTERS[name]({}).priority, options: {} };
    }
  }

  return finalizeConfig(
    mergeConfig(config, {
      languages: narrow("language", config.languages, selectors.lang?.map((l) => l.toUpperCase()), logger),
      flavors: narrow("flavor", config.flavors, selectors.flavor, logger),
      formats,
    }),
  );
}
